/**
 * In-Memory Page
 *
 * PageSource over a snapshot of a page's primitives. The PDF adapter builds
 * these once per page; tests build them by hand.
 */

import type { DocumentSource, PageSource, Rect, TableGrid, WidgetRecord, WordBox } from '../types';
import { centroid, containsPoint, unionAll } from '../extraction/geometry';
import { groupIntoLines, pageText, toTokens } from '../extraction/tokens';

export interface TableSnapshot {
  rows: Array<Array<string | null>>;
  /** Cell rectangles, same shape as `rows`; missing entries mean unknown. */
  cells?: Array<Array<Rect | null>>;
}

export interface PageSnapshot {
  pageNumber: number;
  words: WordBox[];
  shapes?: Rect[];
  tables?: TableSnapshot[];
  widgets?: WidgetRecord[];
  /** Baseline rounding used by `searchText` to keep a phrase on one line. */
  lineBucket?: number;
}

export function tableGrid(table: TableSnapshot): TableGrid {
  return {
    rows: table.rows,
    cellRect: (row, col) => table.cells?.[row]?.[col] ?? null,
  };
}

export class StaticPage implements PageSource {
  readonly pageNumber: number;
  private readonly snapshot: PageSnapshot;

  constructor(snapshot: PageSnapshot) {
    this.snapshot = snapshot;
    this.pageNumber = snapshot.pageNumber;
  }

  words(): WordBox[] {
    return this.snapshot.words.map((w) => ({ ...w }));
  }

  /**
   * Every occurrence of `phrase` as consecutive words on one line, compared
   * case-insensitively. A trailing colon on the last word is ignored.
   */
  searchText(phrase: string): Rect[] {
    const wanted = phrase.trim().toLowerCase().split(/\s+/).filter(Boolean);
    if (wanted.length === 0) return [];

    const tokens = toTokens(this.snapshot.words, this.pageNumber);
    const lines = groupIntoLines(tokens, this.snapshot.lineBucket ?? 4);
    const found: Rect[] = [];

    for (const line of lines) {
      const order = line.tokenIndices;
      for (let pos = 0; pos + wanted.length <= order.length; pos++) {
        const matched = wanted.every((word, k) => {
          const text = tokens[order[pos + k]].text.toLowerCase();
          return text === word || (k === wanted.length - 1 && text === `${word}:`);
        });
        if (!matched) continue;

        const rect = unionAll(order.slice(pos, pos + wanted.length).map((i) => tokens[i].rect));
        if (rect) found.push(rect);
      }
    }

    return found;
  }

  vectorShapes(): Rect[] {
    return [...(this.snapshot.shapes ?? [])];
  }

  tables(): TableGrid[] {
    return (this.snapshot.tables ?? []).map(tableGrid);
  }

  widgets(): WidgetRecord[] {
    return [...(this.snapshot.widgets ?? [])];
  }

  /** Words whose centre lies inside `rect`, in reading order. */
  textInRegion(rect: Rect): string {
    const tokens = toTokens(this.snapshot.words, this.pageNumber).filter((t) =>
      containsPoint(rect, centroid(t.rect))
    );
    return pageText(tokens, this.snapshot.lineBucket ?? 4);
  }
}

/**
 * DocumentSource over already captured pages.
 */
export class StaticDocument implements DocumentSource {
  private closed = false;

  constructor(private readonly pages: PageSource[]) {}

  get pageCount(): number {
    return this.pages.length;
  }

  page(index: number): PageSource {
    if (this.closed) {
      throw new Error('Document is closed');
    }
    const page = this.pages[index];
    if (!page) {
      throw new RangeError(`Page ${index} out of range (0-${this.pages.length - 1})`);
    }
    return page;
  }

  close(): void {
    if (this.closed) {
      throw new Error('Document is already closed');
    }
    this.closed = true;
  }
}
