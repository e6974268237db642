/**
 * Label Strategy Base
 *
 * Shared walk for the three label-driven heuristics: visit every line
 * position in reading order, ask the subclass for a label there, and pair
 * it with the value the associator finds.
 */

import type { ExtractionRecord, LabelMatch } from '../types';
import type { StrategyResult } from './types';
import type { LabelDictionary } from '../schemas';
import type { LabelBoundary } from '../extraction/label-detector';
import type { PageExtractionContext } from '../extraction/page-context';
import type { ValueSearch } from '../extraction/value-associator';
import { LabelMatcher, labelBoundary } from '../extraction/label-detector';
import { associateValue } from '../extraction/value-associator';
import { cleanKey } from '../extraction/text-normalizer';
import { BaseStrategy } from './base-strategy';

/**
 * Dictionary matchers shared by the heuristic strategies of one plan.
 */
export interface DictionaryLabels {
  compound: LabelMatcher;
  standalone: LabelMatcher;
  /** Stops a value at any known label or colon-terminated token. */
  boundary: LabelBoundary;
}

export function dictionaryLabels(dictionary: LabelDictionary): DictionaryLabels {
  const compound = new LabelMatcher(dictionary.compoundLabels, { caseSensitive: false });
  const standalone = new LabelMatcher(dictionary.standaloneLabels, { caseSensitive: false });
  return { compound, standalone, boundary: labelBoundary(compound, standalone) };
}

export abstract class LabelStrategy extends BaseStrategy {
  constructor(protected readonly labels: DictionaryLabels) {
    super();
  }

  /** Label at a line position, or null. */
  protected abstract labelAt(
    ctx: PageExtractionContext,
    lineIndex: number,
    pos: number,
    emittedKeys: string[]
  ): LabelMatch | null;

  protected extract(ctx: PageExtractionContext): StrategyResult {
    const search: ValueSearch = {
      layout: ctx.layout,
      settings: ctx.settings,
      boundary: this.labels.boundary,
      isConsumed: ctx.isConsumed,
    };
    const records: ExtractionRecord[] = [];
    const emittedKeys = ctx.emittedKeys;

    ctx.layout.lines.forEach((line, lineIndex) => {
      line.tokenIndices.forEach((tokenIndex, pos) => {
        if (ctx.isConsumed(tokenIndex)) return;

        const label = this.labelAt(ctx, lineIndex, pos, emittedKeys);
        if (!label) return;

        const key = cleanKey(label.text, { titleCase: true });
        ctx.consume(label.consumedTokenIndices);
        if (!key || emittedKeys.includes(key)) return;

        const value = associateValue(search, label);
        if (!value.text) return;

        ctx.consume(value.tokenIndices);
        emittedKeys.push(key);
        records.push(this.record(ctx, key, value.text, value.rect));
      });
    });

    return { records, warnings: [] };
  }
}
