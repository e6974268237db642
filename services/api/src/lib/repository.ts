/**
 * Storage seams used by the HTTP layer.
 */

import type { Queue } from 'bullmq';
import { QUEUE_NAMES, checkBackpressure, reportQueueMetrics } from '@formsift/shared';
import type {
  DocumentListResponse,
  DocumentRecord,
  DocumentRow,
  ExtractDocumentJob,
  ExtractedDataRow,
} from '@formsift/shared';

export interface DocumentRepository {
  createDocument(document: Pick<DocumentRow, 'id' | 'filename' | 'upload_time'>, correlationId: string): Promise<void>;
  listDocuments(limit: number, cursor?: string): Promise<DocumentListResponse>;
  getDocument(id: string): Promise<DocumentRecord | null>;
  getExtractedData(documentId: string): Promise<ExtractedDataRow[] | null>;
  ping(): Promise<void>;
}

export interface Backpressure {
  shouldWarn: boolean;
  shouldReject: boolean;
  depth: number;
}

export interface ExtractionQueue {
  backpressure(): Promise<Backpressure>;
  enqueue(job: ExtractDocumentJob): Promise<void>;
  /** Refresh the queue gauges before a metrics scrape. */
  reportMetrics(): Promise<void>;
}

/**
 * ExtractionQueue over a BullMQ queue.
 */
export function bullExtractionQueue(queue: Queue<ExtractDocumentJob, void>): ExtractionQueue {
  return {
    backpressure: () => checkBackpressure(queue),
    enqueue: async (job) => {
      await queue.add(QUEUE_NAMES.EXTRACT_DOCUMENT, job, { jobId: `extract_${job.document_id}` });
    },
    reportMetrics: () => reportQueueMetrics([{ name: QUEUE_NAMES.EXTRACT_DOCUMENT, queue }]),
  };
}
