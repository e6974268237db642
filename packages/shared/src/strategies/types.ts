/**
 * Extraction Strategy Types
 *
 * A strategy is one self-contained way of pulling records out of a page.
 * The set is closed: every kind below has exactly one implementation, and
 * plans list strategy instances in priority order.
 */

import type { ExtractionMethod, ExtractionRecord } from '../types';
import type { PageExtractionContext } from '../extraction/page-context';

export type StrategyKind =
  | 'widget'
  | 'table'
  | 'checkbox-group'
  | 'compound-label'
  | 'colon-label'
  | 'standalone-label'
  | 'template-field'
  | 'template-checkbox';

/**
 * Result of one strategy run on one page, before the merge.
 */
export interface StrategyResult {
  records: ExtractionRecord[];
  warnings: string[];
}

export interface ExtractionStrategy {
  readonly kind: StrategyKind;
  /** Method name stamped on every record the strategy produces. */
  readonly method: ExtractionMethod;
  readonly description: string;

  /**
   * Extract records from the page. May consume tokens through the context;
   * may throw, in which case the orchestrator rolls its consumption back.
   */
  run(ctx: PageExtractionContext): StrategyResult;
}
