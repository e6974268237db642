/**
 * Persistence Worker
 *
 * Consumes persist_extractions queue and writes documents and their
 * extracted data to Postgres.
 */

import { Job } from 'bullmq';
import {
  logger,
  config,
  runWithContextAsync,
  createWorker,
  serveMetrics,
  QUEUE_NAMES,
  type PersistExtractionsJob,
  jobsProcessedCounter,
  jobDurationHistogram,
} from '@formsift/shared';
import { persistExtraction, pool } from './lib/db';

/**
 * Process persist_extractions job
 */
async function processPersistExtractions(job: Job<PersistExtractionsJob, void>): Promise<void> {
  const { correlation_id, document, extraction } = job.data;

  return runWithContextAsync({ correlationId: correlation_id, documentId: document.document_id }, async () => {
    const startTime = Date.now();

    logger.info('Processing persist_extractions', {
      jobId: job.id,
      document_id: document.document_id,
      status: extraction.status,
      record_count: extraction.records.length,
      attempt: job.attemptsMade + 1,
    });

    try {
      await persistExtraction(document, extraction, correlation_id);

      // Record metrics
      const duration = (Date.now() - startTime) / 1000;
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_EXTRACTIONS, status: 'success' });
      jobDurationHistogram.observe({ queue: QUEUE_NAMES.PERSIST_EXTRACTIONS, status: 'success' }, duration);

      logger.info('Persist complete', {
        document_id: document.document_id,
        duration_seconds: duration,
      });
    } catch (error) {
      jobsProcessedCounter.inc({ queue: QUEUE_NAMES.PERSIST_EXTRACTIONS, status: 'failed' });
      throw error;
    }
  });
}

// Expose /metrics for Prometheus
serveMetrics(config.persistenceMetricsPort);

const worker = createWorker<PersistExtractionsJob, void>(QUEUE_NAMES.PERSIST_EXTRACTIONS, processPersistExtractions);

logger.info('Persistence worker started');

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
