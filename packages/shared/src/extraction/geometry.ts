/**
 * Rectangle Geometry
 *
 * Small helpers over page-space rectangles. All functions are pure.
 */

import type { Point, Rect } from '../types';

export function rect(x0: number, y0: number, x1: number, y1: number): Rect {
  return { x0, y0, x1, y1 };
}

export function width(r: Rect): number {
  return r.x1 - r.x0;
}

export function height(r: Rect): number {
  return r.y1 - r.y0;
}

export function isEmptyRect(r: Rect): boolean {
  return width(r) <= 0 || height(r) <= 0;
}

export function centroid(r: Rect): Point {
  return { x: (r.x0 + r.x1) / 2, y: (r.y0 + r.y1) / 2 };
}

export function verticalCenter(r: Rect): number {
  return (r.y0 + r.y1) / 2;
}

export function centroidDistance(a: Rect, b: Rect): number {
  const ca = centroid(a);
  const cb = centroid(b);
  return Math.hypot(ca.x - cb.x, ca.y - cb.y);
}

/** Strict overlap: rectangles that only share an edge do not intersect. */
export function intersects(a: Rect, b: Rect): boolean {
  return a.x0 < b.x1 && b.x0 < a.x1 && a.y0 < b.y1 && b.y0 < a.y1;
}

export function containsPoint(r: Rect, p: Point): boolean {
  return p.x >= r.x0 && p.x <= r.x1 && p.y >= r.y0 && p.y <= r.y1;
}

/** True when `inner` lies entirely within `outer`. */
export function contains(outer: Rect, inner: Rect): boolean {
  return inner.x0 >= outer.x0 && inner.x1 <= outer.x1 && inner.y0 >= outer.y0 && inner.y1 <= outer.y1;
}

export function union(a: Rect, b: Rect): Rect {
  return {
    x0: Math.min(a.x0, b.x0),
    y0: Math.min(a.y0, b.y0),
    x1: Math.max(a.x1, b.x1),
    y1: Math.max(a.y1, b.y1),
  };
}

export function unionAll(rects: Rect[]): Rect | null {
  if (rects.length === 0) return null;
  return rects.reduce(union);
}

/** Grow a rectangle by `dx` horizontally and `dy` vertically on each side. */
export function expand(r: Rect, dx: number, dy: number = dx): Rect {
  return { x0: r.x0 - dx, y0: r.y0 - dy, x1: r.x1 + dx, y1: r.y1 + dy };
}

/** Gap from the right edge of `left` to the left edge of `right` (negative when overlapping). */
export function horizontalGap(left: Rect, right: Rect): number {
  return right.x0 - left.x1;
}

/**
 * Format a rectangle as stored provenance: "x0,y0,x1,y1" with one decimal.
 */
export function formatRect(r: Rect | undefined): string {
  if (!r) return '0,0,0,0';
  return [r.x0, r.y0, r.x1, r.y1].map((n) => n.toFixed(1)).join(',');
}

/**
 * Parse stored provenance. Returns null for anything that is not four finite
 * numbers describing a rectangle with positive area.
 */
export function parseRect(text: string | null | undefined): Rect | null {
  if (!text) return null;

  const parts = text.split(',').map((p) => p.trim());
  if (parts.length !== 4 || parts.some((p) => p === '')) return null;

  const nums = parts.map(Number);
  if (nums.some((n) => !Number.isFinite(n))) return null;

  const parsed = rect(nums[0], nums[1], nums[2], nums[3]);
  return isEmptyRect(parsed) ? null : parsed;
}
