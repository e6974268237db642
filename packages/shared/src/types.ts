/**
 * Shared TypeScript Types
 *
 * Types for the form extraction pipeline, matching JSON schemas in docs/contracts/
 */

// ============================================================================
// Geometry & Page Primitives
// ============================================================================

/** Axis-aligned rectangle in page space (origin top-left, y grows downward). */
export interface Rect {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

export interface Point {
  x: number;
  y: number;
}

/** A positioned word as reported by the document engine. */
export interface WordBox extends Rect {
  text: string;
}

/** Atomic positioned word. Never mutated after creation. */
export interface Token {
  readonly text: string;
  readonly rect: Rect;
  readonly page: number;
}

export type WidgetFieldType = 'text' | 'checkbox' | 'radio' | 'combo' | 'list';

export interface WidgetRecord {
  fieldName: string;
  fieldType: WidgetFieldType;
  fieldValue: string;
  rect: Rect;
}

/** A detected table: first row is the header. */
export interface TableGrid {
  rows: Array<Array<string | null>>;
  cellRect(row: number, col: number): Rect | null;
}

/**
 * Read-only view of one page, supplied by the document engine.
 * Page numbers are 0-based.
 */
export interface PageSource {
  readonly pageNumber: number;
  words(): WordBox[];
  searchText(phrase: string): Rect[];
  vectorShapes(): Rect[];
  tables(): TableGrid[];
  widgets(): WidgetRecord[];
  textInRegion(rect: Rect): string;
}

/** Scoped document handle. `close` may throw if the handle is already invalid. */
export interface DocumentSource {
  readonly pageCount: number;
  page(index: number): PageSource;
  close(): void | Promise<void>;
}

// ============================================================================
// Labels & Values
// ============================================================================

export interface LabelMatch {
  text: string;
  rect: Rect;
  consumedTokenIndices: number[];
}

export interface ValueSpan {
  text: string;
  rect: Rect;
  tokenIndices: number[];
}

// ============================================================================
// Extraction Output
// ============================================================================

export type ExtractionMethod =
  | 'Widget'
  | 'Table'
  | 'Compound Label'
  | 'Form Field'
  | 'Label Match'
  | 'Checkbox Option'
  | 'Config Field'
  | 'Config Checkbox';

export interface ExtractionRecord {
  key: string;
  value: string;
  page: number;
  rect?: Rect;
  method: ExtractionMethod;
}

export type CheckboxState = 'Checked' | 'Unchecked' | 'Not Found';

// ============================================================================
// Form Templates
// ============================================================================

export type FieldType =
  | 'text'
  | 'name'
  | 'date'
  | 'id'
  | 'email'
  | 'money'
  | 'education'
  | 'nationality'
  | 'count'
  | 'phone';

export interface FieldConfig {
  name: string;
  label: string;
  pageNum: number;
  /** Selects the n-th occurrence of `label` on the page (0-based). */
  instance: number;
  fieldType: FieldType;
  /** Record the field even when no value follows the label. */
  allowEmpty: boolean;
}

export interface CheckboxConfig {
  name: string;
  label: string;
  pageNum: number;
  instance: number;
}

export interface FormTemplate {
  formType: string;
  identificationString: string;
  fields: FieldConfig[];
  checkboxes: CheckboxConfig[];
}

// ============================================================================
// Document Processing
// ============================================================================

export type ExtractionMode = 'config' | 'dynamic';

export type DocumentStatus =
  | 'PROCESSING'
  | 'SUCCESS'
  | 'SUCCESS_NO_DATA'
  | 'ERROR_OPENING_FILE'
  | 'CONFIG_ERROR';

export type ProcessingMethod = `Config: ${string}` | 'Dynamic Heuristic' | 'Dynamic (Fallback)';

export interface DocumentExtraction {
  status: DocumentStatus;
  /** Not set when the document could not be opened. */
  method?: ProcessingMethod;
  formType: string | null;
  pageCount: number;
  records: ExtractionRecord[];
  warnings: string[];
}

export interface DocumentInfo {
  document_id: string;
  source_filename: string;
  file_path: string;
  mode: ExtractionMode;
  submitted_at: string;
}

// ============================================================================
// API Types
// ============================================================================

export interface ErrorEnvelope {
  error: {
    code: 'invalid_request' | 'not_found' | 'backpressure' | 'internal_error';
    message: string;
    correlation_id: string;
  };
}

export interface IntakeRequest {
  file_path: string;
  mode?: ExtractionMode;
  source_filename?: string;
}

export interface ExtractedDataRow {
  id: number;
  key: string;
  value: string;
  source_page: number;
  source_coordinates: string;
  extraction_method: string;
}

export interface DocumentRow {
  id: string;
  filename: string;
  upload_time: string;
  processing_method: string | null;
  status: DocumentStatus;
  form_type: string | null;
}

export interface DocumentRecord extends DocumentRow {
  extracted_data: ExtractedDataRow[];
}

export interface DocumentListResponse {
  items: DocumentRow[];
  next_cursor: string | null;
}

export interface HighlightOverlay {
  key: string;
  value: string;
  method: string;
  page: number;
  rect: Rect;
  color: [number, number, number];
}
