/**
 * Label Detector
 *
 * Finds label anchors among a page's tokens. Three sources feed it:
 * phrase dictionaries (config-declared or compound), colon-terminated tokens,
 * and bare single-word labels. Consumed tokens never take part in a match.
 */

import type { LabelMatch, Token } from '../types';
import type { PageLayout } from './tokens';
import { unionAll } from './geometry';

export type ConsumedPredicate = (tokenIndex: number) => boolean;

const NEVER_CONSUMED: ConsumedPredicate = () => false;

export interface LabelMatcherOptions {
  /** Config-declared labels match exactly; dictionary labels ignore case. */
  caseSensitive: boolean;
}

export interface PhraseMatch {
  phrase: string;
  /** Number of tokens the phrase covers. */
  length: number;
}

interface Phrase {
  text: string;
  words: string[];
}

/**
 * Matches a fixed set of label phrases against token runs on one line,
 * always preferring the longest phrase.
 */
export class LabelMatcher {
  private readonly phrases: Phrase[];

  constructor(phrases: Iterable<string>, private readonly options: LabelMatcherOptions) {
    const seen = new Set<string>();
    const list: Phrase[] = [];

    for (const raw of phrases) {
      const words = raw.trim().split(/\s+/).filter(Boolean);
      const text = words.join(' ');
      if (!text || seen.has(text)) continue;
      seen.add(text);
      list.push({
        text,
        words: options.caseSensitive ? words : words.map((w) => w.toLowerCase()),
      });
    }

    // Longest first so "Tel No." is tried before "Tel"
    this.phrases = list.sort(
      (a, b) => b.words.length - a.words.length || b.text.length - a.text.length
    );
  }

  get size(): number {
    return this.phrases.length;
  }

  get labels(): string[] {
    return this.phrases.map((p) => p.text);
  }

  /**
   * Longest phrase whose words equal the token texts starting at `order[pos]`.
   */
  matchAt(
    tokens: Token[],
    order: number[],
    pos: number,
    isConsumed: ConsumedPredicate = NEVER_CONSUMED
  ): PhraseMatch | null {
    for (const phrase of this.phrases) {
      if (pos + phrase.words.length > order.length) continue;

      let matched = true;
      for (let k = 0; k < phrase.words.length; k++) {
        const index = order[pos + k];
        if (isConsumed(index)) {
          matched = false;
          break;
        }
        const isLast = k === phrase.words.length - 1;
        if (!this.wordMatches(tokens[index].text, phrase.words[k], isLast)) {
          matched = false;
          break;
        }
      }

      if (matched) {
        return { phrase: phrase.text, length: phrase.words.length };
      }
    }
    return null;
  }

  private wordMatches(tokenText: string, word: string, isLast: boolean): boolean {
    const text = this.options.caseSensitive ? tokenText : tokenText.toLowerCase();
    if (text === word) return true;
    return isLast && text === `${word}:`;
  }
}

/**
 * Anything that can tell whether a known label starts at a line position.
 * The value associator stops extending a value there.
 */
export interface LabelBoundary {
  startsAt(tokens: Token[], order: number[], pos: number): boolean;
}

export function labelBoundary(...matchers: LabelMatcher[]): LabelBoundary {
  return {
    startsAt(tokens, order, pos) {
      const index = order[pos];
      if (index === undefined) return false;
      if (isColonLabelText(tokens[index].text)) return true;
      return matchers.some((m) => m.matchAt(tokens, order, pos) !== null);
    },
  };
}

/** "Name:" is a label; ":", "12:" and "10:30:" are not. */
export function isColonLabelText(text: string): boolean {
  if (text.length <= 1 || !text.endsWith(':')) return false;
  const body = text.slice(0, -1);
  return !/^[\d.,:]*$/.test(body);
}

function toLabelMatch(tokens: Token[], indices: number[], text: string): LabelMatch | null {
  const rect = unionAll(indices.map((i) => tokens[i].rect));
  if (!rect) return null;
  return { text, rect, consumedTokenIndices: indices };
}

/**
 * Phrase label starting at a line position, if any.
 */
export function phraseLabelAt(
  layout: PageLayout,
  lineIndex: number,
  pos: number,
  matcher: LabelMatcher,
  isConsumed: ConsumedPredicate = NEVER_CONSUMED
): LabelMatch | null {
  const order = layout.lineOrder(lineIndex);
  const match = matcher.matchAt(layout.tokens, order, pos, isConsumed);
  if (!match) return null;
  return toLabelMatch(layout.tokens, order.slice(pos, pos + match.length), match.phrase);
}

/**
 * Colon label ending at a line position. A tight run of plain words before the
 * colon token joins the label when the run opens the line, or follows a token
 * that is already consumed ("Place of Birth:").
 */
export function colonLabelAt(
  layout: PageLayout,
  lineIndex: number,
  pos: number,
  labelWordGap: number,
  isConsumed: ConsumedPredicate = NEVER_CONSUMED
): LabelMatch | null {
  const { tokens } = layout;
  const order = layout.lineOrder(lineIndex);
  const index = order[pos];
  if (index === undefined || isConsumed(index) || !isColonLabelText(tokens[index].text)) {
    return null;
  }

  let start = pos;
  while (start > 0 && pos - start < 4) {
    const prev = order[start - 1];
    const next = order[start];
    if (isConsumed(prev) || isColonLabelText(tokens[prev].text)) break;
    if (tokens[next].rect.x0 - tokens[prev].rect.x1 > labelWordGap) break;
    start--;
  }

  if (start < pos) {
    const opensRun = start === 0 || isConsumed(order[start - 1]);
    if (!opensRun) start = pos;
  }

  const indices = order.slice(start, pos + 1);
  const text = indices.map((i) => tokens[i].text).join(' ');
  return toLabelMatch(tokens, indices, text);
}

/**
 * Every unconsumed phrase label on the page, scanned in reading order.
 */
export function findCompoundLabels(
  layout: PageLayout,
  matcher: LabelMatcher,
  isConsumed: ConsumedPredicate = NEVER_CONSUMED
): LabelMatch[] {
  const found: LabelMatch[] = [];
  layout.lines.forEach((line, lineIndex) => {
    let pos = 0;
    while (pos < line.tokenIndices.length) {
      const match = phraseLabelAt(layout, lineIndex, pos, matcher, isConsumed);
      if (match) {
        found.push(match);
        pos += match.consumedTokenIndices.length;
      } else {
        pos++;
      }
    }
  });
  return found;
}

export function findColonLabels(
  layout: PageLayout,
  labelWordGap: number,
  isConsumed: ConsumedPredicate = NEVER_CONSUMED
): LabelMatch[] {
  const found: LabelMatch[] = [];
  layout.lines.forEach((line, lineIndex) => {
    line.tokenIndices.forEach((_, pos) => {
      const match = colonLabelAt(layout, lineIndex, pos, labelWordGap, isConsumed);
      if (match) found.push(match);
    });
  });
  return found;
}

/**
 * True when a key already emitted on the page overlaps `label`
 * ("Surname" against "Surname Of Applicant", either way round).
 */
export function overlapsEmittedKey(label: string, emittedKeys: Iterable<string>): boolean {
  const needle = label.toLowerCase();
  if (!needle) return false;
  for (const key of emittedKeys) {
    const haystack = key.toLowerCase();
    if (!haystack) continue;
    if (haystack.includes(needle) || needle.includes(haystack)) return true;
  }
  return false;
}

export function findStandaloneLabels(
  layout: PageLayout,
  matcher: LabelMatcher,
  emittedKeys: Iterable<string>,
  isConsumed: ConsumedPredicate = NEVER_CONSUMED
): LabelMatch[] {
  const keys = Array.from(emittedKeys);
  return findCompoundLabels(layout, matcher, isConsumed).filter(
    (match) => !overlapsEmittedKey(match.text, keys)
  );
}
