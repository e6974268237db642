/**
 * API Tests
 *
 * Intake validation, highlight overlays and the HTTP routes, run against an
 * in-memory repository and queue.
 */

import type { Server } from 'node:http';
import type {
  DocumentListResponse,
  DocumentRecord,
  DocumentRow,
  ExtractDocumentJob,
  ExtractedDataRow,
} from '@formsift/shared';
import { createApp } from '../../services/api/src/app';
import { validateIntake } from '../../services/api/src/lib/intake';
import { highlightsForPage, methodColor } from '../../services/api/src/lib/provenance';
import type { Backpressure, DocumentRepository, ExtractionQueue } from '../../services/api/src/lib/repository';

function row(id: number, page: number, coordinates: string, method = 'Form Field'): ExtractedDataRow {
  return {
    id,
    key: `Key ${id}`,
    value: `Value ${id}`,
    source_page: page,
    source_coordinates: coordinates,
    extraction_method: method,
  };
}

describe('validateIntake', () => {
  it('should default the mode and the source filename', () => {
    expect(validateIntake({ file_path: '/data/in/loan form.PDF' }, 'config')).toEqual({
      valid: true,
      request: { file_path: '/data/in/loan form.PDF', mode: 'config', source_filename: 'loan form.PDF' },
    });
  });

  it('should reject bad requests with a reason', () => {
    expect(validateIntake(null, 'config')).toEqual({ valid: false, message: 'Request body must be a JSON object' });
    expect(validateIntake({}, 'config')).toEqual({ valid: false, message: 'file_path is required' });
    expect(validateIntake({ file_path: 'scan.png' }, 'config')).toEqual({
      valid: false,
      message: 'file_path must point to a PDF',
    });
    expect(validateIntake({ file_path: 'a.pdf', mode: 'smart' }, 'config')).toEqual({
      valid: false,
      message: 'mode must be config or dynamic',
    });
    expect(validateIntake({ file_path: 'a.pdf', source_filename: 7 }, 'config')).toEqual({
      valid: false,
      message: 'source_filename must be a string',
    });
  });
});

describe('highlightsForPage', () => {
  it('should colour overlays by method and skip rows without a usable location', () => {
    const rows = [
      row(1, 0, '10.0,20.0,30.0,40.0', 'Config Field'),
      row(2, 0, '0,0,0,0'),
      row(3, 0, 'not,a,rect'),
      row(4, 1, '1,1,5,5'),
      row(5, 0, '1,2,3,4', 'Widget'),
    ];

    expect(highlightsForPage(rows, 0)).toEqual([
      {
        key: 'Key 1',
        value: 'Value 1',
        method: 'Config Field',
        page: 0,
        rect: { x0: 10, y0: 20, x1: 30, y1: 40 },
        color: [1, 1, 0],
      },
      {
        key: 'Key 5',
        value: 'Value 5',
        method: 'Widget',
        page: 0,
        rect: { x0: 1, y0: 2, x1: 3, y1: 4 },
        color: [0, 0, 1],
      },
    ]);
  });

  it('should use red for methods it does not know', () => {
    expect(methodColor('Handwriting')).toEqual([1, 0, 0]);
    expect(methodColor('Label Match')).toEqual([1, 0.5, 0]);
  });
});

class MemoryRepository implements DocumentRepository {
  documents = new Map<string, DocumentRecord>();
  correlations = new Map<string, string>();

  async createDocument(document: Pick<DocumentRow, 'id' | 'filename' | 'upload_time'>, correlationId: string) {
    this.documents.set(document.id, {
      ...document,
      processing_method: null,
      status: 'PROCESSING',
      form_type: null,
      extracted_data: [],
    });
    this.correlations.set(document.id, correlationId);
  }

  async listDocuments(limit: number, cursor?: string): Promise<DocumentListResponse> {
    const ids = Array.from(this.documents.keys())
      .sort()
      .reverse()
      .filter((id) => cursor === undefined || id < cursor);
    const items: DocumentRow[] = ids.slice(0, limit).map((id) => {
      const document = this.documents.get(id) ?? fail(id);
      return {
        id: document.id,
        filename: document.filename,
        upload_time: document.upload_time,
        processing_method: document.processing_method,
        status: document.status,
        form_type: document.form_type,
      };
    });
    return { items, next_cursor: ids.length > limit ? items[items.length - 1].id : null };
  }

  async getDocument(id: string) {
    return this.documents.get(id) ?? null;
  }

  async getExtractedData(documentId: string) {
    return this.documents.get(documentId)?.extracted_data ?? null;
  }

  async ping() {}
}

function fail(id: string): never {
  throw new Error(`missing ${id}`);
}

class MemoryQueue implements ExtractionQueue {
  jobs: ExtractDocumentJob[] = [];
  state: Backpressure = { shouldWarn: false, shouldReject: false, depth: 0 };

  async backpressure() {
    return this.state;
  }

  async enqueue(job: ExtractDocumentJob) {
    this.jobs.push(job);
  }

  async reportMetrics() {}
}

describe('HTTP routes', () => {
  let repository: MemoryRepository;
  let queue: MemoryQueue;
  let server: Server;
  let baseUrl: string;
  let nextId: number;

  beforeEach(async () => {
    repository = new MemoryRepository();
    queue = new MemoryQueue();
    nextId = 0;

    const app = createApp({
      repository,
      queue,
      defaultMode: 'config',
      now: () => new Date('2026-01-02T03:04:05.000Z'),
      newId: () => `doc-${++nextId}`,
    });
    server = await new Promise<Server>((resolve) => {
      const s = app.listen(0, '127.0.0.1', () => resolve(s));
    });
    const address = server.address();
    if (!address || typeof address === 'string') throw new Error('Server has no TCP address');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  });

  function post(body: unknown) {
    return fetch(`${baseUrl}/documents`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json', 'X-Correlation-Id': 'corr-test' },
      body: JSON.stringify(body),
    });
  }

  it('should accept a document and enqueue its extraction', async () => {
    const res = await post({ file_path: '/data/in/loan.pdf', mode: 'dynamic' });

    expect(res.status).toBe(202);
    expect(await res.json()).toEqual({ document_id: 'doc-1', status: 'PROCESSING', correlation_id: 'corr-test' });
    expect(repository.documents.get('doc-1')?.filename).toBe('loan.pdf');
    expect(queue.jobs).toEqual([
      {
        event_type: 'document.submitted',
        correlation_id: 'corr-test',
        document_id: 'doc-1',
        source_filename: 'loan.pdf',
        file_path: '/data/in/loan.pdf',
        mode: 'dynamic',
        submitted_at: '2026-01-02T03:04:05.000Z',
      },
    ]);
  });

  it('should answer an invalid request with an error envelope', async () => {
    const res = await post({ mode: 'config' });

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: { code: 'invalid_request', message: 'file_path is required', correlation_id: 'corr-test' },
    });
    expect(queue.jobs).toEqual([]);
  });

  it('should shed load when the queue is full', async () => {
    queue.state = { shouldWarn: true, shouldReject: true, depth: 5000 };

    const res = await post({ file_path: 'a.pdf' });

    expect(res.status).toBe(503);
    expect(await res.json()).toEqual({
      error: { code: 'backpressure', message: 'Extraction queue is full, retry later', correlation_id: 'corr-test' },
    });
    expect(repository.documents.size).toBe(0);
  });

  it('should list documents newest first with a cursor', async () => {
    await post({ file_path: 'a.pdf' });
    await post({ file_path: 'b.pdf' });
    await post({ file_path: 'c.pdf' });

    const first = await fetch(`${baseUrl}/documents?limit=2`);
    expect(await first.json()).toEqual({
      items: [
        expect.objectContaining({ id: 'doc-3', filename: 'c.pdf', status: 'PROCESSING' }),
        expect.objectContaining({ id: 'doc-2', filename: 'b.pdf', status: 'PROCESSING' }),
      ],
      next_cursor: 'doc-2',
    });

    const second = await fetch(`${baseUrl}/documents?limit=2&cursor=doc-2`);
    expect(await second.json()).toEqual({
      items: [
        {
          id: 'doc-1',
          filename: 'a.pdf',
          upload_time: '2026-01-02T03:04:05.000Z',
          processing_method: null,
          status: 'PROCESSING',
          form_type: null,
        },
      ],
      next_cursor: null,
    });
  });

  it('should return 404 for an unknown document', async () => {
    const res = await fetch(`${baseUrl}/documents/missing`, { headers: { 'X-Correlation-Id': 'corr-test' } });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({
      error: { code: 'not_found', message: 'Document missing not found', correlation_id: 'corr-test' },
    });
  });

  it('should serve highlight overlays for a page', async () => {
    await post({ file_path: 'a.pdf' });
    repository.documents.get('doc-1')?.extracted_data.push(row(1, 1, '5.0,5.0,25.0,15.0', 'Table'));

    const res = await fetch(`${baseUrl}/documents/doc-1/highlights?page=1`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      document_id: 'doc-1',
      page: 1,
      highlights: [
        {
          key: 'Key 1',
          value: 'Value 1',
          method: 'Table',
          page: 1,
          rect: { x0: 5, y0: 5, x1: 25, y1: 15 },
          color: [0, 1, 0],
        },
      ],
    });
  });

  it('should reject a page that is not a number', async () => {
    await post({ file_path: 'a.pdf' });

    const res = await fetch(`${baseUrl}/documents/doc-1/highlights?page=first`);
    expect(res.status).toBe(400);
  });
});
