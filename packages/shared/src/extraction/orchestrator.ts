/**
 * Extraction Orchestrator
 *
 * Runs a plan's strategies over each page in order and merges their records
 * first-writer-wins on (key, page). A strategy that throws is rolled back
 * and reported; the remaining strategies still run.
 */

import type { DocumentSource, ExtractionRecord, PageSource } from '../types';
import type { ExtractionStrategy } from '../strategies/types';
import type { ExtractionSettings } from './settings';
import { PageExtractionContext } from './page-context';
import { StrategyFaultError } from '../errors';
import { runWithPage } from '../context';
import { logger } from '../logger';
import { recordsExtractedCounter, strategyFaultsCounter } from '../metrics';

export interface PageExtractionResult {
  page: number;
  records: ExtractionRecord[];
  warnings: string[];
}

export interface ExtractionOutput {
  records: ExtractionRecord[];
  warnings: string[];
}

/** Strategies to run on a page; an empty list skips the page. */
export type PlanForPage = (pageNumber: number) => ExtractionStrategy[];

export function extractPage(
  page: PageSource,
  strategies: ExtractionStrategy[],
  settings: ExtractionSettings
): PageExtractionResult {
  return runWithPage(page.pageNumber, () => {
    const ctx = new PageExtractionContext(page, settings);

    for (const strategy of strategies) {
      const checkpoint = ctx.checkpoint();
      try {
        const result = strategy.run(ctx);
        const kept = ctx.merge(result.records);
        ctx.warnings.push(...result.warnings);
        if (kept.length > 0) {
          recordsExtractedCounter.inc({ method: strategy.method }, kept.length);
        }
      } catch (error) {
        ctx.restore(checkpoint);
        const fault = new StrategyFaultError(strategy.kind, page.pageNumber, error);
        ctx.warnings.push(fault.message);
        strategyFaultsCounter.inc({ strategy: strategy.kind });
        logger.warn('Strategy fault isolated', {
          strategy: strategy.kind,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }

    logger.debug('Page extracted', {
      record_count: ctx.records.length,
      warning_count: ctx.warnings.length,
    });

    return { page: page.pageNumber, records: ctx.records, warnings: [...ctx.warnings] };
  });
}

/**
 * Extract every page of a document, strictly in page order.
 */
export function extractPages(
  document: DocumentSource,
  plan: PlanForPage,
  settings: ExtractionSettings
): ExtractionOutput {
  const records: ExtractionRecord[] = [];
  const warnings: string[] = [];

  for (let pageNumber = 0; pageNumber < document.pageCount; pageNumber++) {
    const strategies = plan(pageNumber);
    if (strategies.length === 0) continue;

    const result = extractPage(document.page(pageNumber), strategies, settings);
    records.push(...result.records);
    warnings.push(...result.warnings);
  }

  return { records, warnings };
}
