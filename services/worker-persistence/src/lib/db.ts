/**
 * Database Operations
 *
 * Writes one document's extraction outcome: the document row and its
 * extracted data, replaced as a whole inside one transaction so a retried
 * job never leaves duplicate rows behind.
 */

import { Pool, PoolClient } from 'pg';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  type DocumentExtraction,
  type DocumentInfo,
} from '@formsift/shared';
import { extractedDataValues } from './rows';

const pool = new Pool({
  connectionString: process.env.DATABASE_URL || config.databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
});

/**
 * Persist an extraction outcome for a document
 */
export async function persistExtraction(
  document: DocumentInfo,
  extraction: DocumentExtraction,
  correlationId: string
): Promise<void> {
  const client = await pool.connect();
  const startTime = Date.now();

  try {
    await client.query('BEGIN');

    await upsertDocument(client, document, extraction, correlationId);
    await client.query('DELETE FROM extracted_data WHERE document_id = $1', [document.document_id]);
    await insertExtractedData(client, document.document_id, extraction);

    await client.query('COMMIT');

    const duration = (Date.now() - startTime) / 1000;
    dbQueryDurationHistogram.observe({ operation: 'persist_extraction' }, duration);

    logger.info('Persisted extraction', {
      document_id: document.document_id,
      status: extraction.status,
      record_count: extraction.records.length,
      duration_seconds: duration,
    });
  } catch (error) {
    await client.query('ROLLBACK');
    logger.error('Failed to persist extraction', error);
    throw error;
  } finally {
    client.release();
  }
}

async function upsertDocument(
  client: PoolClient,
  document: DocumentInfo,
  extraction: DocumentExtraction,
  correlationId: string
): Promise<void> {
  await client.query(
    `INSERT INTO documents (id, filename, upload_time, processing_method, status, form_type, correlation_id, updated_at)
     VALUES ($1, $2, $3, $4, $5, $6, $7, NOW())
     ON CONFLICT (id) DO UPDATE SET
       processing_method = EXCLUDED.processing_method,
       status = EXCLUDED.status,
       form_type = EXCLUDED.form_type,
       correlation_id = EXCLUDED.correlation_id,
       updated_at = NOW()`,
    [
      document.document_id,
      document.source_filename,
      document.submitted_at,
      extraction.method ?? null,
      extraction.status,
      extraction.formType,
      correlationId,
    ]
  );
}

async function insertExtractedData(
  client: PoolClient,
  documentId: string,
  extraction: DocumentExtraction
): Promise<void> {
  if (extraction.records.length === 0) return;

  const { clause, params } = extractedDataValues(documentId, extraction.records);
  await client.query(
    `INSERT INTO extracted_data (document_id, key, value, source_page, source_coordinates, extraction_method)
     VALUES ${clause}`,
    params
  );
}

export { pool };
