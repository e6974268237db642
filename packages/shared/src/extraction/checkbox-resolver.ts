/**
 * Checkbox Resolver
 *
 * Decides whether the box next to a label is ticked. An interactive widget
 * in the label's vicinity settles the state outright; otherwise the nearest
 * marker glyph, and failing that the nearest box-sized vector shape, is used.
 */

import type { CheckboxState, PageSource, Rect, Token } from '../types';
import type { ConsumedPredicate } from './label-detector';
import { centroidDistance, expand, height, intersects, isEmptyRect, width } from './geometry';

const MARKER_GLYPHS = 'xX✓✔☑☒✗✘√';
const MARKER_TOKEN = new RegExp(`^[[(]?[${MARKER_GLYPHS}][\\])]?$`);
const MARKER_CHAR = new RegExp(`[${MARKER_GLYPHS}]`);

const MIN_BOX_SIDE = 5;
const MAX_BOX_SIDE = 100;

export type CheckboxSignal = 'widget' | 'marker' | 'shape';

export interface CheckboxResolution {
  state: CheckboxState;
  /** Rectangle of the deciding widget, glyph or shape; the label's own when Not Found. */
  rect: Rect;
  signal: CheckboxSignal | null;
  /** Index of the marker token that decided the state, when one did. */
  markerTokenIndex: number | null;
}

/**
 * Marker tokens and shapes already given to an option. Shared across a group
 * so one tick is never assigned twice.
 */
export interface CheckboxClaims {
  markers: Set<number>;
  shapes: Set<number>;
}

export function createClaims(): CheckboxClaims {
  return { markers: new Set(), shapes: new Set() };
}

export interface ResolveOptions {
  searchRadius: number;
  claims?: CheckboxClaims;
  /** Tokens another field already owns; they are never read as markers. */
  isConsumed?: ConsumedPredicate;
}

/** "x", "✓", "[X]" and "(✔)" are markers; "ox" is not. */
export function isCheckboxMarker(text: string): boolean {
  return MARKER_TOKEN.test(text.trim());
}

export function containsMarker(text: string): boolean {
  return MARKER_CHAR.test(text);
}

export function isBoxSized(r: Rect): boolean {
  const w = width(r);
  const h = height(r);
  return w > MIN_BOX_SIDE && w < MAX_BOX_SIDE && h > MIN_BOX_SIDE && h < MAX_BOX_SIDE;
}

interface Candidate {
  index: number;
  rect: Rect;
  distance: number;
}

function nearest(candidates: Candidate[]): Candidate | null {
  let best: Candidate | null = null;
  for (const candidate of candidates) {
    if (
      !best ||
      candidate.distance < best.distance ||
      (candidate.distance === best.distance && candidate.index < best.index)
    ) {
      best = candidate;
    }
  }
  return best;
}

export function resolveCheckbox(
  page: PageSource,
  tokens: Token[],
  labelRect: Rect,
  options: ResolveOptions
): CheckboxResolution {
  const vicinity = expand(labelRect, options.searchRadius);
  const claims = options.claims ?? createClaims();
  const isConsumed = options.isConsumed ?? (() => false);

  const widgets = page.widgets();
  const widget = nearest(
    widgets
      .map((w, index) => ({ w, index }))
      .filter(({ w }) => (w.fieldType === 'checkbox' || w.fieldType === 'radio') && intersects(vicinity, w.rect))
      .map(({ w, index }) => ({ index, rect: w.rect, distance: centroidDistance(labelRect, w.rect) }))
  );
  if (widget) {
    const value = widgets[widget.index].fieldValue.trim();
    return {
      state: value && value !== 'Off' ? 'Checked' : 'Unchecked',
      rect: widget.rect,
      signal: 'widget',
      markerTokenIndex: null,
    };
  }

  const marker = nearest(
    tokens
      .map((token, index) => ({ token, index }))
      .filter(
        ({ token, index }) =>
          !claims.markers.has(index) &&
          !isConsumed(index) &&
          isCheckboxMarker(token.text) &&
          intersects(vicinity, token.rect)
      )
      .map(({ token, index }) => ({
        index,
        rect: token.rect,
        distance: centroidDistance(labelRect, token.rect),
      }))
  );
  if (marker) {
    claims.markers.add(marker.index);
    return { state: 'Checked', rect: marker.rect, signal: 'marker', markerTokenIndex: marker.index };
  }

  const shape = nearest(
    page
      .vectorShapes()
      .map((rect, index) => ({ rect, index }))
      .filter(
        ({ rect, index }) =>
          !claims.shapes.has(index) && !isEmptyRect(rect) && isBoxSized(rect) && intersects(vicinity, rect)
      )
      .map(({ rect, index }) => ({ index, rect, distance: centroidDistance(labelRect, rect) }))
  );
  if (shape) {
    claims.shapes.add(shape.index);
    const interior = page.textInRegion(shape.rect);
    return {
      state: containsMarker(interior) ? 'Checked' : 'Unchecked',
      rect: shape.rect,
      signal: 'shape',
      markerTokenIndex: null,
    };
  }

  return { state: 'Not Found', rect: labelRect, signal: null, markerTokenIndex: null };
}
