/**
 * Base Extraction Strategy
 *
 * Abstract base class providing timing and logging around a strategy's
 * page extraction.
 */

import type { ExtractionMethod, ExtractionRecord, Rect } from '../types';
import type { ExtractionStrategy, StrategyKind, StrategyResult } from './types';
import type { PageExtractionContext } from '../extraction/page-context';
import { logger } from '../logger';

export abstract class BaseStrategy implements ExtractionStrategy {
  abstract readonly kind: StrategyKind;
  abstract readonly method: ExtractionMethod;
  abstract readonly description: string;

  run(ctx: PageExtractionContext): StrategyResult {
    const startTime = Date.now();

    logger.debug('Running strategy', {
      strategy: this.kind,
      token_count: ctx.tokens.length,
    });

    const result = this.extract(ctx);

    logger.debug('Strategy complete', {
      strategy: this.kind,
      record_count: result.records.length,
      warning_count: result.warnings.length,
      duration_ms: Date.now() - startTime,
    });

    return result;
  }

  /**
   * Strategy-specific extraction. Subclasses consume the tokens they use
   * through `ctx` so later strategies skip them.
   */
  protected abstract extract(ctx: PageExtractionContext): StrategyResult;

  protected record(ctx: PageExtractionContext, key: string, value: string, rect?: Rect): ExtractionRecord {
    return {
      key,
      value,
      page: ctx.pageNumber,
      rect,
      method: this.method,
    };
  }
}
