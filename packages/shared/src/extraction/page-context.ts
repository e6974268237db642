/**
 * Page Extraction Context
 *
 * Mutable state of one page's extraction pass: the tokens consumed so far,
 * the keys already emitted and the merged records. Owned by the orchestrator
 * for the duration of one page and discarded afterwards.
 */

import type { ExtractionRecord, PageSource, Rect, Token } from '../types';
import type { ExtractionSettings } from './settings';
import { PageLayout, toTokens } from './tokens';
import { centroid, containsPoint } from './geometry';

export type Checkpoint = ReadonlySet<number>;

export class PageExtractionContext {
  readonly layout: PageLayout;
  readonly warnings: string[] = [];

  private processedIndices = new Set<number>();
  private readonly processedKeys = new Set<string>();
  private readonly merged: ExtractionRecord[] = [];

  constructor(
    readonly page: PageSource,
    readonly settings: ExtractionSettings
  ) {
    this.layout = new PageLayout(toTokens(page.words(), page.pageNumber), settings.lineBucket);
  }

  get pageNumber(): number {
    return this.page.pageNumber;
  }

  get tokens(): Token[] {
    return this.layout.tokens;
  }

  get records(): ExtractionRecord[] {
    return [...this.merged];
  }

  get emittedKeys(): string[] {
    return Array.from(this.processedKeys);
  }

  /** Bound so it can be handed around as a predicate. */
  readonly isConsumed = (tokenIndex: number): boolean => this.processedIndices.has(tokenIndex);

  consume(tokenIndices: Iterable<number>): void {
    for (const index of tokenIndices) {
      this.processedIndices.add(index);
    }
  }

  /** Consume every token whose centre lies inside one of `rects`. */
  consumeWithin(rects: Rect[]): void {
    if (rects.length === 0) return;
    this.tokens.forEach((token, index) => {
      const centre = centroid(token.rect);
      if (rects.some((r) => containsPoint(r, centre))) this.processedIndices.add(index);
    });
  }

  hasKey(key: string): boolean {
    return this.processedKeys.has(key);
  }

  checkpoint(): Checkpoint {
    return new Set(this.processedIndices);
  }

  restore(checkpoint: Checkpoint): void {
    this.processedIndices = new Set(checkpoint);
  }

  /**
   * Merge a strategy's records. The first record for a key wins; later ones
   * are dropped. Returns the records that were kept.
   */
  merge(records: ExtractionRecord[]): ExtractionRecord[] {
    const kept: ExtractionRecord[] = [];
    for (const record of records) {
      if (this.processedKeys.has(record.key)) continue;
      this.processedKeys.add(record.key);
      this.merged.push(record);
      kept.push(record);
    }
    return kept;
  }
}
