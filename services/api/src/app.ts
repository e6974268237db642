/**
 * HTTP API
 *
 * Document intake plus read access to extraction results. Built by
 * `createApp` over a repository and a queue so it can run against fakes.
 */

import express, { Request, Response, NextFunction, Express } from 'express';
import { ulid } from 'ulid';
import {
  logger,
  runWithContext,
  getCorrelationId,
  getMetrics,
  getMetricsContentType,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  backpressureRejectionsCounter,
  type ErrorEnvelope,
  type ExtractDocumentJob,
  type ExtractionMode,
} from '@formsift/shared';
import type { DocumentRepository, ExtractionQueue } from './lib/repository';
import { validateIntake } from './lib/intake';
import { highlightsForPage } from './lib/provenance';

export interface ApiDependencies {
  repository: DocumentRepository;
  queue: ExtractionQueue;
  defaultMode: ExtractionMode;
  /** Clock and id source, replaceable in tests. */
  now?: () => Date;
  newId?: () => string;
}

function correlationIdOf(res: Response): string {
  const header = res.getHeader('X-Correlation-Id');
  return typeof header === 'string' ? header : getCorrelationId();
}

function sendError(res: Response, status: number, code: ErrorEnvelope['error']['code'], message: string): void {
  const error: ErrorEnvelope = {
    error: {
      code,
      message,
      correlation_id: correlationIdOf(res),
    },
  };
  res.status(status).json(error);
}

function queryString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

export function createApp(deps: ApiDependencies): Express {
  const { repository, queue, defaultMode } = deps;
  const now = deps.now ?? (() => new Date());
  const newId = deps.newId ?? (() => ulid());

  const app = express();

  // Middleware
  app.use(express.json());

  // Correlation ID middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const correlationId = req.get('x-correlation-id') || ulid();
    res.setHeader('X-Correlation-Id', correlationId);

    runWithContext({ correlationId }, () => {
      next();
    });
  });

  // Request timing middleware
  app.use((req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();

    res.on('finish', () => {
      const duration = (Date.now() - start) / 1000;
      const path: string = req.route?.path || req.path;
      const status = res.statusCode.toString();

      httpRequestDurationHistogram.observe({ method: req.method, path, status }, duration);
      httpRequestsCounter.inc({ method: req.method, path, status });

      logger.info('Request completed', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        duration_ms: Math.round(duration * 1000),
      });
    });

    next();
  });

  // Health check
  app.get('/health', async (req: Request, res: Response) => {
    try {
      await repository.ping();
      const backpressure = await queue.backpressure();

      res.json({
        status: 'healthy',
        service: 'api',
        database: 'connected',
        queue_depth: backpressure.depth,
        timestamp: now().toISOString(),
      });
    } catch (error) {
      res.status(503).json({
        status: 'unhealthy',
        service: 'api',
        error: error instanceof Error ? error.message : 'Unknown error',
        timestamp: now().toISOString(),
      });
    }
  });

  // Metrics endpoint
  app.get('/metrics', async (req: Request, res: Response) => {
    await queue.reportMetrics();
    res.setHeader('Content-Type', getMetricsContentType());
    res.send(await getMetrics());
  });

  /**
   * POST /documents
   * Registers a PDF for extraction and enqueues it
   */
  app.post('/documents', async (req: Request, res: Response) => {
    const validation = validateIntake(req.body, defaultMode);
    if (!validation.valid) {
      sendError(res, 400, 'invalid_request', validation.message);
      return;
    }

    try {
      const backpressure = await queue.backpressure();
      if (backpressure.shouldReject) {
        backpressureRejectionsCounter.inc();
        logger.warn('Request rejected due to backpressure', { queue_depth: backpressure.depth });
        sendError(res, 503, 'backpressure', 'Extraction queue is full, retry later');
        return;
      }
      if (backpressure.shouldWarn) {
        logger.warn('Extraction queue depth approaching limit', { queue_depth: backpressure.depth });
      }

      const { file_path, mode, source_filename } = validation.request;
      const correlationId = correlationIdOf(res);
      const documentId = newId();
      const submittedAt = now().toISOString();

      await repository.createDocument(
        { id: documentId, filename: source_filename, upload_time: submittedAt },
        correlationId
      );

      const job: ExtractDocumentJob = {
        event_type: 'document.submitted',
        correlation_id: correlationId,
        document_id: documentId,
        source_filename,
        file_path,
        mode,
        submitted_at: submittedAt,
      };
      await queue.enqueue(job);

      logger.info('Document accepted', { document_id: documentId, mode });

      res.status(202).json({
        document_id: documentId,
        status: 'PROCESSING',
        correlation_id: correlationId,
      });
    } catch (error) {
      logger.error('Failed to accept document', error);
      sendError(res, 500, 'internal_error', 'Failed to accept document');
    }
  });

  /**
   * GET /documents
   * Newest first, cursor paginated
   */
  app.get('/documents', async (req: Request, res: Response) => {
    try {
      const limit = Math.min(parseInt(queryString(req.query.limit) ?? '', 10) || 20, 100);
      const cursor = queryString(req.query.cursor);

      res.json(await repository.listDocuments(limit, cursor));
    } catch (error) {
      logger.error('Failed to list documents', error);
      sendError(res, 500, 'internal_error', 'Failed to list documents');
    }
  });

  /**
   * GET /documents/:id
   * Returns the document with its extracted data
   */
  app.get('/documents/:id', async (req: Request, res: Response) => {
    const { id } = req.params;

    try {
      const record = await repository.getDocument(id);
      if (!record) {
        sendError(res, 404, 'not_found', `Document ${id} not found`);
        return;
      }
      res.json(record);
    } catch (error) {
      logger.error('Failed to get document', error, { document_id: id });
      sendError(res, 500, 'internal_error', 'Failed to retrieve document');
    }
  });

  /**
   * GET /documents/:id/highlights?page=N
   * Overlay rectangles for one page, coloured by extraction method
   */
  app.get('/documents/:id/highlights', async (req: Request, res: Response) => {
    const { id } = req.params;
    const pageParam = queryString(req.query.page) ?? '0';

    if (!/^\d+$/.test(pageParam)) {
      sendError(res, 400, 'invalid_request', 'page must be a non-negative integer');
      return;
    }
    const page = parseInt(pageParam, 10);

    try {
      const rows = await repository.getExtractedData(id);
      if (!rows) {
        sendError(res, 404, 'not_found', `Document ${id} not found`);
        return;
      }
      res.json({ document_id: id, page, highlights: highlightsForPage(rows, page) });
    } catch (error) {
      logger.error('Failed to build highlights', error, { document_id: id });
      sendError(res, 500, 'internal_error', 'Failed to build highlights');
    }
  });

  return app;
}
