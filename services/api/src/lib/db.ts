/**
 * Database Queries
 *
 * Read access to documents and their extracted data, plus the PROCESSING
 * row written at intake.
 */

import { Pool } from 'pg';
import {
  logger,
  config,
  dbQueryDurationHistogram,
  type DocumentListResponse,
  type DocumentRecord,
  type DocumentRow,
  type ExtractedDataRow,
} from '@formsift/shared';
import type { DocumentRepository } from './repository';

const pool = new Pool({
  connectionString: process.env.DATABASE_URL || config.databaseUrl,
  max: 20,
  idleTimeoutMillis: 30000,
});

const DOCUMENT_COLUMNS = `id, filename, upload_time, processing_method, status, form_type`;

interface DocumentRowResult extends Omit<DocumentRow, 'upload_time'> {
  upload_time: Date | string;
}

function toDocumentRow(row: DocumentRowResult): DocumentRow {
  return {
    ...row,
    upload_time: row.upload_time instanceof Date ? row.upload_time.toISOString() : row.upload_time,
  };
}

async function timed<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  const startTime = Date.now();
  try {
    return await fn();
  } finally {
    dbQueryDurationHistogram.observe({ operation }, (Date.now() - startTime) / 1000);
  }
}

async function createDocument(
  document: Pick<DocumentRow, 'id' | 'filename' | 'upload_time'>,
  correlationId: string
): Promise<void> {
  await timed('create_document', () =>
    pool.query(
      `INSERT INTO documents (id, filename, upload_time, status, correlation_id)
       VALUES ($1, $2, $3, 'PROCESSING', $4)
       ON CONFLICT (id) DO NOTHING`,
      [document.id, document.filename, document.upload_time, correlationId]
    )
  );
}

/**
 * Newest first. The cursor is the last id of the previous page; ids are
 * ULIDs so id order is submission order.
 */
async function listDocuments(limit: number, cursor?: string): Promise<DocumentListResponse> {
  const params: Array<string | number> = [];
  let whereClause = '';
  if (cursor) {
    params.push(cursor);
    whereClause = `WHERE id < $1`;
  }
  params.push(limit + 1); // Fetch one extra to check for more

  const result = await timed('list_documents', () =>
    pool.query<DocumentRowResult>(
      `SELECT ${DOCUMENT_COLUMNS}
       FROM documents
       ${whereClause}
       ORDER BY id DESC
       LIMIT $${params.length}`,
      params
    )
  );

  const hasMore = result.rows.length > limit;
  const rows = (hasMore ? result.rows.slice(0, limit) : result.rows).map(toDocumentRow);

  return {
    items: rows,
    next_cursor: hasMore && rows.length > 0 ? rows[rows.length - 1].id : null,
  };
}

async function getExtractedData(documentId: string): Promise<ExtractedDataRow[] | null> {
  const exists = await timed('get_document', () =>
    pool.query('SELECT 1 FROM documents WHERE id = $1', [documentId])
  );
  if (exists.rows.length === 0) return null;

  const result = await timed('get_extracted_data', () =>
    pool.query<ExtractedDataRow>(
      `SELECT id, key, value, source_page, source_coordinates, extraction_method
       FROM extracted_data
       WHERE document_id = $1
       ORDER BY id`,
      [documentId]
    )
  );
  return result.rows;
}

async function getDocument(id: string): Promise<DocumentRecord | null> {
  const result = await timed('get_document', () =>
    pool.query<DocumentRowResult>(`SELECT ${DOCUMENT_COLUMNS} FROM documents WHERE id = $1`, [id])
  );
  if (result.rows.length === 0) return null;

  const extracted = await getExtractedData(id);
  if (!extracted) {
    logger.warn('Document disappeared while loading', { document_id: id });
    return null;
  }

  return { ...toDocumentRow(result.rows[0]), extracted_data: extracted };
}

async function ping(): Promise<void> {
  await pool.query('SELECT 1');
}

export const postgresRepository: DocumentRepository = {
  createDocument,
  listDocuments,
  getDocument,
  getExtractedData,
  ping,
};

export { pool };
