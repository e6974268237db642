/**
 * Token Model
 *
 * Normalized view of a page's positioned words, grouped into printed lines.
 */

import type { Token, WordBox } from '../types';

export interface TextLine {
  /** Rounded baseline bucket; lines sort top to bottom by it. */
  bucket: number;
  /** Indices into the page token array, left to right. */
  tokenIndices: number[];
}

export function toTokens(words: WordBox[], page: number): Token[] {
  const tokens: Token[] = [];
  for (const word of words) {
    const text = word.text.trim();
    if (!text) continue;
    tokens.push({
      text,
      rect: { x0: word.x0, y0: word.y0, x1: word.x1, y1: word.y1 },
      page,
    });
  }
  return tokens;
}

export function lineBucketOf(token: Token, lineBucket: number): number {
  return Math.round(token.rect.y1 / lineBucket);
}

/**
 * Group tokens into lines by rounding each token's baseline (bottom edge)
 * to `lineBucket` units.
 */
export function groupIntoLines(tokens: Token[], lineBucket: number): TextLine[] {
  const byBucket = new Map<number, number[]>();

  tokens.forEach((token, index) => {
    const bucket = lineBucketOf(token, lineBucket);
    const line = byBucket.get(bucket);
    if (line) {
      line.push(index);
    } else {
      byBucket.set(bucket, [index]);
    }
  });

  return Array.from(byBucket.entries())
    .sort(([a], [b]) => a - b)
    .map(([bucket, indices]) => ({
      bucket,
      tokenIndices: indices.sort((a, b) => tokens[a].rect.x0 - tokens[b].rect.x0 || a - b),
    }));
}

/**
 * Page text in reading order: one line per printed line, words joined by spaces.
 */
export function pageText(tokens: Token[], lineBucket: number): string {
  return groupIntoLines(tokens, lineBucket)
    .map((line) => line.tokenIndices.map((i) => tokens[i].text).join(' '))
    .join('\n');
}

export interface TokenPosition {
  line: number;
  pos: number;
}

/**
 * Tokens of one page together with their line grouping, so that a token's
 * line and reading-order neighbours can be looked up by index.
 */
export class PageLayout {
  readonly lines: TextLine[];
  private readonly positions = new Map<number, TokenPosition>();

  constructor(readonly tokens: Token[], lineBucket: number) {
    this.lines = groupIntoLines(tokens, lineBucket);
    this.lines.forEach((line, lineIndex) => {
      line.tokenIndices.forEach((tokenIndex, pos) => {
        this.positions.set(tokenIndex, { line: lineIndex, pos });
      });
    });
  }

  locate(tokenIndex: number): TokenPosition | undefined {
    return this.positions.get(tokenIndex);
  }

  lineOrder(lineIndex: number): number[] {
    return this.lines[lineIndex]?.tokenIndices ?? [];
  }
}
