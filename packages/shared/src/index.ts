/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContext,
  runWithContextAsync,
  runWithPage,
  asyncLocalStorage,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config } from './config';

// Types
export * from './types';

// Errors
export {
  StrategyFaultError,
  MalformedTableError,
  TemplateValidationError,
  DocumentOpenError,
} from './errors';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ExtractDocumentJob,
  type PersistExtractionsJob,
  getRedisConnection,
  createQueue,
  createWorker,
  getQueueMetrics,
  checkBackpressure,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  queueDepthGauge,
  queueMetricsGauge,
  jobDurationHistogram,
  jobsProcessedCounter,
  documentsProcessedCounter,
  extractionDurationHistogram,
  recordsExtractedCounter,
  strategyFaultsCounter,
  backpressureRejectionsCounter,
  httpRequestDurationHistogram,
  httpRequestsCounter,
  dbQueryDurationHistogram,
  reportQueueMetrics,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateFormTemplate,
  validateLabelDictionary,
  validateExtractionRecords,
  schemas,
  SCHEMA_FILES,
  type Validated,
  type LabelDictionary,
  type CheckboxGroup,
  type FormTemplateInput,
} from './schemas';

// Extraction primitives
export {
  rect,
  width,
  height,
  isEmptyRect,
  centroid,
  centroidDistance,
  intersects,
  containsPoint,
  contains,
  union,
  unionAll,
  expand,
  horizontalGap,
  verticalCenter,
  formatRect,
  parseRect,
} from './extraction/geometry';
export { cleanKey, cleanValue, isFillArtifact, type CleanKeyOptions } from './extraction/text-normalizer';
export {
  toTokens,
  groupIntoLines,
  lineBucketOf,
  pageText,
  PageLayout,
  type TextLine,
  type TokenPosition,
} from './extraction/tokens';
export { defaultExtractionSettings, type ExtractionSettings } from './extraction/settings';

// Extraction engine
export {
  LabelMatcher,
  labelBoundary,
  isColonLabelText,
  phraseLabelAt,
  colonLabelAt,
  findCompoundLabels,
  findColonLabels,
  findStandaloneLabels,
  overlapsEmittedKey,
  type LabelBoundary,
  type LabelMatcherOptions,
  type PhraseMatch,
  type ConsumedPredicate,
} from './extraction/label-detector';
export { associateValue, searchRegions, type ValueSearch, type SearchRegions } from './extraction/value-associator';
export {
  resolveCheckbox,
  createClaims,
  isCheckboxMarker,
  containsMarker,
  isBoxSized,
  type CheckboxClaims,
  type CheckboxResolution,
  type CheckboxSignal,
  type ResolveOptions,
} from './extraction/checkbox-resolver';
export { normalizeTable, tableKey } from './extraction/table-normalizer';
export {
  TemplateLineParser,
  parseTemplatePage,
  type TemplateFieldMatch,
} from './extraction/template-parser';
export {
  FIELD_TYPES,
  isFieldType,
  isValidFieldValue,
  findTypedValue,
  refineTypedValue,
  type TypedValue,
} from './extraction/field-types';
export { getLabelDictionary, setLabelDictionary, parseLabelDictionary } from './extraction/label-dictionary';
export { PageExtractionContext, type Checkpoint } from './extraction/page-context';
export {
  extractPage,
  extractPages,
  type PageExtractionResult,
  type ExtractionOutput,
  type PlanForPage,
} from './extraction/orchestrator';
export {
  processDocument,
  withDocument,
  extractFile,
  registryTemplates,
  templateList,
  type ProcessOptions,
  type TemplateSource,
} from './extraction/document-processor';

// Strategies
export * from './strategies';

// Form templates
export * from './templates';

// Documents
export {
  StaticPage,
  StaticDocument,
  tableGrid,
  type PageSnapshot,
  type TableSnapshot,
} from './document/static-page';
