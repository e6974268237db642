/**
 * Text Items to Word Boxes
 *
 * pdfjs reports text as runs ("items") positioned by a transform in PDF
 * space (origin bottom-left). The extraction engine wants single words in
 * top-left page space, so each run is split on whitespace and its width is
 * shared out by character count.
 */

import type { WordBox } from '@formsift/shared';

export interface TextRun {
  str: string;
  /** [a, b, c, d, e, f]; (e, f) is the baseline origin. */
  transform: number[];
  width: number;
  height: number;
}

/** Visible page box in PDF space: [x0, y0, x1, y1]. */
export type PageView = [number, number, number, number];

export function isTextRun(item: unknown): item is TextRun {
  if (typeof item !== 'object' || item === null) return false;
  if (!('str' in item) || !('transform' in item) || !('width' in item) || !('height' in item)) return false;
  return (
    typeof item.str === 'string' &&
    Array.isArray(item.transform) &&
    item.transform.length >= 6 &&
    typeof item.width === 'number' &&
    typeof item.height === 'number'
  );
}

function fontHeight(run: TextRun): number {
  if (run.height > 0) return run.height;
  // Some fonts report zero height; fall back to the vertical scale
  return Math.hypot(run.transform[2], run.transform[3]);
}

/**
 * Split one text run into word boxes in top-left coordinates.
 */
export function runToWords(run: TextRun, view: PageView): WordBox[] {
  const text = run.str;
  if (!text.trim()) return [];

  const originX = run.transform[4] - view[0];
  const baseline = view[3] - run.transform[5];
  const top = baseline - fontHeight(run);
  const charWidth = text.length > 0 ? run.width / text.length : 0;

  const words: WordBox[] = [];
  const wordPattern = /\S+/g;
  let match: RegExpExecArray | null;
  while ((match = wordPattern.exec(text)) !== null) {
    const start = match.index;
    words.push({
      text: match[0],
      x0: originX + start * charWidth,
      y0: top,
      x1: originX + (start + match[0].length) * charWidth,
      y1: baseline,
    });
  }
  return words;
}

export function runsToWords(items: unknown[], view: PageView): WordBox[] {
  return items.filter(isTextRun).flatMap((run) => runToWords(run, view));
}
