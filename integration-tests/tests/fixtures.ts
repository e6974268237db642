/**
 * Page Fixtures
 *
 * Builders for hand-laid pages. Words are 10 units tall with their bottom
 * edge on the given baseline, 6 units per character, 4 units apart.
 */

import {
  StaticDocument,
  StaticPage,
  defaultExtractionSettings,
  type ExtractionSettings,
  type FieldConfig,
  type PageSnapshot,
  type Rect,
  type WordBox,
} from '@formsift/shared';

export const CHAR_WIDTH = 6;
export const WORD_GAP = 4;
export const LINE_HEIGHT = 10;

export function word(text: string, x0: number, baseline: number): WordBox {
  return { text, x0, y0: baseline - LINE_HEIGHT, x1: x0 + text.length * CHAR_WIDTH, y1: baseline };
}

/**
 * Words laid left to right from `x0` on one baseline.
 */
export function line(baseline: number, x0: number, ...texts: string[]): WordBox[] {
  const words: WordBox[] = [];
  let x = x0;
  for (const text of texts) {
    const w = word(text, x, baseline);
    words.push(w);
    x = w.x1 + WORD_GAP;
  }
  return words;
}

export function box(x0: number, y0: number, x1: number, y1: number): Rect {
  return { x0, y0, x1, y1 };
}

export function page(words: WordBox[], extras: Omit<PageSnapshot, 'pageNumber' | 'words'> = {}, pageNumber = 0): StaticPage {
  return new StaticPage({ pageNumber, words, ...extras });
}

export function documentOf(...pages: StaticPage[]): StaticDocument {
  return new StaticDocument(pages);
}

export function settings(overrides: Partial<ExtractionSettings> = {}): ExtractionSettings {
  return {
    ...defaultExtractionSettings(),
    lineBucket: 4,
    maxHorizontalDistance: 300,
    sameLineTolerance: 3,
    maxVerticalGap: 20,
    nextLineSlack: 20,
    maxWordGap: 10,
    labelWordGap: 6,
    misalignmentWeight: 0.5,
    checkboxSearchRadius: 50,
    ...overrides,
  };
}

export function field(name: string, label: string, extra: Partial<FieldConfig> = {}): FieldConfig {
  return { name, label, pageNum: 0, instance: 0, fieldType: 'text', allowEmpty: false, ...extra };
}
