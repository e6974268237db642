/**
 * API Server
 */

import {
  logger,
  config,
  createQueue,
  QUEUE_NAMES,
  type ExtractDocumentJob,
} from '@formsift/shared';
import { createApp } from './app';
import { postgresRepository, pool } from './lib/db';
import { bullExtractionQueue } from './lib/repository';

const extractQueue = createQueue<ExtractDocumentJob, void>(QUEUE_NAMES.EXTRACT_DOCUMENT);

const app = createApp({
  repository: postgresRepository,
  queue: bullExtractionQueue(extractQueue),
  defaultMode: config.defaultMode,
});

const server = app.listen(config.apiPort, () => {
  logger.info('API started', { port: config.apiPort });
});

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  server.close();
  await extractQueue.close();
  await pool.end();
  process.exit(0);
}

process.on('SIGTERM', () => void shutdown('SIGTERM'));
process.on('SIGINT', () => void shutdown('SIGINT'));
