/**
 * Value Associator
 *
 * Given a label anchor, finds the run of tokens that answers it. The value
 * starts at the nearest eligible token to the right of the label on the same
 * line, or below it on the next line, and extends rightward over its line.
 */

import type { LabelMatch, Rect, Token, ValueSpan } from '../types';
import type { ExtractionSettings } from './settings';
import type { PageLayout } from './tokens';
import type { ConsumedPredicate, LabelBoundary } from './label-detector';
import { isColonLabelText } from './label-detector';
import { isCheckboxMarker } from './checkbox-resolver';
import { centroid, centroidDistance, intersects, rect, unionAll, verticalCenter } from './geometry';
import { cleanValue } from './text-normalizer';

export interface ValueSearch {
  layout: PageLayout;
  settings: ExtractionSettings;
  boundary: LabelBoundary;
  isConsumed: ConsumedPredicate;
}

export interface SearchRegions {
  sameLine: Rect;
  nextLine: Rect;
}

interface Candidate {
  index: number;
  distance: number;
  tieBreak: number;
}

export function searchRegions(anchor: Rect, settings: ExtractionSettings): SearchRegions {
  const cy = verticalCenter(anchor);
  return {
    sameLine: rect(
      anchor.x1,
      cy - settings.sameLineTolerance,
      anchor.x1 + settings.maxHorizontalDistance,
      cy + settings.sameLineTolerance
    ),
    nextLine: rect(
      anchor.x0 - settings.nextLineSlack,
      anchor.y1,
      anchor.x1 + settings.nextLineSlack,
      anchor.y1 + settings.maxVerticalGap
    ),
  };
}

function startsLabel(search: ValueSearch, tokenIndex: number): boolean {
  const { layout, boundary } = search;
  const token = layout.tokens[tokenIndex];
  if (isCheckboxMarker(token.text) || isColonLabelText(token.text)) return true;
  const position = layout.locate(tokenIndex);
  if (!position) return false;
  return boundary.startsAt(layout.tokens, layout.lineOrder(position.line), position.pos);
}

// The token already answers a label to its left on its own line.
function followsLabel(search: ValueSearch, tokenIndex: number): boolean {
  const { layout, settings } = search;
  const position = layout.locate(tokenIndex);
  if (!position) return false;
  const order = layout.lineOrder(position.line);
  const x0 = layout.tokens[tokenIndex].rect.x0;
  return order
    .slice(0, position.pos)
    .some((i) => x0 - layout.tokens[i].rect.x1 <= settings.maxHorizontalDistance && startsLabel(search, i));
}

function collectCandidates(search: ValueSearch, label: LabelMatch, excluded: Set<number>): Candidate[] {
  const { layout, settings } = search;
  const anchor = label.rect;
  const regions = searchRegions(anchor, settings);
  const candidates: Candidate[] = [];

  layout.tokens.forEach((token: Token, index: number) => {
    if (excluded.has(index) || search.isConsumed(index)) return;

    let distance: number;
    if (intersects(regions.sameLine, token.rect) && token.rect.x0 >= anchor.x1 - settings.sameLineTolerance) {
      distance = Math.max(0, token.rect.x0 - anchor.x1);
    } else if (
      intersects(regions.nextLine, token.rect) &&
      centroid(token.rect).y > anchor.y1 &&
      !followsLabel(search, index)
    ) {
      const verticalGap = Math.max(0, token.rect.y0 - anchor.y1);
      distance = verticalGap + settings.misalignmentWeight * Math.abs(token.rect.x0 - anchor.x0);
    } else {
      return;
    }

    if (startsLabel(search, index)) return;
    candidates.push({ index, distance, tieBreak: centroidDistance(anchor, token.rect) });
  });

  return candidates;
}

function pickStart(candidates: Candidate[]): Candidate | null {
  let best: Candidate | null = null;
  for (const c of candidates) {
    if (
      !best ||
      c.distance < best.distance ||
      (c.distance === best.distance &&
        (c.tieBreak < best.tieBreak || (c.tieBreak === best.tieBreak && c.index < best.index)))
    ) {
      best = c;
    }
  }
  return best;
}

/**
 * Associate a value with `label`. Returns an empty span anchored on the label
 * when nothing qualifies; callers decide whether an empty value is kept.
 */
export function associateValue(search: ValueSearch, label: LabelMatch): ValueSpan {
  const { layout, settings } = search;
  const anchor = label.rect;
  const excluded = new Set(label.consumedTokenIndices);

  const start = pickStart(collectCandidates(search, label, excluded));
  const position = start ? layout.locate(start.index) : undefined;
  if (!start || !position) {
    return { text: '', rect: anchor, tokenIndices: [] };
  }

  const order = layout.lineOrder(position.line);
  const regionEnd = anchor.x1 + settings.maxHorizontalDistance;
  const absorbed = [start.index];

  for (let pos = position.pos + 1; pos < order.length; pos++) {
    const index = order[pos];
    const token = layout.tokens[index];
    const previous = layout.tokens[absorbed[absorbed.length - 1]];

    if (excluded.has(index) || search.isConsumed(index)) break;
    if (token.rect.x1 > regionEnd) break;
    if (token.rect.x0 - previous.rect.x1 > settings.maxWordGap) break;
    if (startsLabel(search, index)) break;

    absorbed.push(index);
  }

  const text = cleanValue(absorbed.map((i) => layout.tokens[i].text).join(' '));
  const spanRect = unionAll(absorbed.map((i) => layout.tokens[i].rect)) ?? anchor;
  return { text, rect: spanRect, tokenIndices: absorbed };
}
