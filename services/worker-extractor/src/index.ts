/**
 * Extractor Worker
 *
 * Opens a submitted PDF, runs the extraction engine in the requested mode
 * and enqueues the resulting records for persistence.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  createQueue,
  serveMetrics,
  extractFile,
  validateExtractionRecords,
  QUEUE_NAMES,
  type ExtractDocumentJob,
  type PersistExtractionsJob,
  type DocumentInfo,
  jobsProcessedCounter,
  jobDurationHistogram,
  extractionDurationHistogram,
  documentsProcessedCounter,
} from '@formsift/shared';
import { openPdf } from './lib/pdf';
import { loadTemplateDirectory } from './lib/templates';

const persistQueue = createQueue<PersistExtractionsJob, void>(QUEUE_NAMES.PERSIST_EXTRACTIONS);

/**
 * Process extract_document job
 */
async function processExtractDocument(job: Job<ExtractDocumentJob, void>): Promise<void> {
  const { correlation_id, document_id, source_filename, file_path, mode, submitted_at } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, documentId: document_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing extract_document', {
      jobId: job.id,
      document_id,
      source_filename,
      mode,
      attempt: job.attemptsMade + 1,
    });

    try {
      const extraction = await extractFile(source_filename, () => openPdf(file_path), { mode });

      const validation = validateExtractionRecords(extraction.records);
      if (!validation.valid) {
        throw new Error(`Extraction records failed validation: ${validation.errors.join('; ')}`);
      }

      logger.info('Extraction completed', {
        document_id,
        status: extraction.status,
        method: extraction.method,
        form_type: extraction.formType,
        record_count: extraction.records.length,
        warning_count: extraction.warnings.length,
      });

      const document: DocumentInfo = { document_id, source_filename, file_path, mode, submitted_at };
      const payload: PersistExtractionsJob = {
        event_type: 'extraction.complete',
        correlation_id,
        document,
        extraction,
      };

      await persistQueue.add('persist_extractions', payload, {
        jobId: `persist_${document_id}`,
      });

      logger.info('Enqueued persist_extractions', { document_id });

      // Record metrics
      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'success' });
      jobDurationHistogram.observe({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'success' }, duration);
      extractionDurationHistogram.observe({ mode }, duration);
      documentsProcessedCounter.inc({ mode, status: extraction.status });
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.EXTRACT_DOCUMENT, status: 'failed' });
      documentsProcessedCounter.inc({ mode, status: 'error' });
      throw error;
    }
  });
}

loadTemplateDirectory();

const worker = createWorker<ExtractDocumentJob, void>(QUEUE_NAMES.EXTRACT_DOCUMENT, processExtractDocument);
serveMetrics(config.extractorMetricsPort);

logger.info('Extractor worker started', { default_mode: config.defaultMode });

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await persistQueue.close();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
