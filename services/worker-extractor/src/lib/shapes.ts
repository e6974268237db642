/**
 * Rectangles from a Page's Operator List
 *
 * Walks pdfjs path operators, tracking the current transform, and keeps
 * every axis-aligned box: explicit `re` rectangles and closed four-corner
 * move/line paths. Output is in top-left page coordinates.
 */

import type { Rect } from '@formsift/shared';
import type { PageView } from './words';

/** The pdfjs operator codes the walk needs. `pdfjsLib.OPS` satisfies this. */
export interface PathOpCodes {
  save: number;
  restore: number;
  transform: number;
  constructPath: number;
  moveTo: number;
  lineTo: number;
  curveTo: number;
  curveTo2: number;
  curveTo3: number;
  closePath: number;
  rectangle: number;
}

type Matrix = [number, number, number, number, number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];
const EPSILON = 0.5;

function multiply(m: Matrix, n: Matrix): Matrix {
  return [
    n[0] * m[0] + n[1] * m[2],
    n[0] * m[1] + n[1] * m[3],
    n[2] * m[0] + n[3] * m[2],
    n[2] * m[1] + n[3] * m[3],
    n[4] * m[0] + n[5] * m[2] + m[4],
    n[4] * m[1] + n[5] * m[3] + m[5],
  ];
}

function apply(m: Matrix, x: number, y: number): [number, number] {
  return [m[0] * x + m[2] * y + m[4], m[1] * x + m[3] * y + m[5]];
}

function isNumberArray(value: unknown): value is number[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'number');
}

function toMatrix(value: unknown): Matrix | null {
  if (!isNumberArray(value) || value.length < 6) return null;
  return [value[0], value[1], value[2], value[3], value[4], value[5]];
}

function boxOf(points: Array<[number, number]>, view: PageView): Rect | null {
  if (points.length === 0) return null;
  const xs = points.map(([x]) => x - view[0]);
  const ys = points.map(([, y]) => view[3] - y);
  const r = { x0: Math.min(...xs), y0: Math.min(...ys), x1: Math.max(...xs), y1: Math.max(...ys) };
  return r.x1 - r.x0 > 0 && r.y1 - r.y0 > 0 ? r : null;
}

/**
 * True for four corners (optionally repeated at the end) of an axis-aligned box.
 */
function isAxisAlignedBox(points: Array<[number, number]>): boolean {
  const corners =
    points.length === 5 &&
    Math.abs(points[0][0] - points[4][0]) < EPSILON &&
    Math.abs(points[0][1] - points[4][1]) < EPSILON
      ? points.slice(0, 4)
      : points;
  if (corners.length !== 4) return false;

  for (let i = 0; i < 4; i++) {
    const [ax, ay] = corners[i];
    const [bx, by] = corners[(i + 1) % 4];
    const horizontal = Math.abs(ay - by) < EPSILON;
    const vertical = Math.abs(ax - bx) < EPSILON;
    if (!horizontal && !vertical) return false;
  }
  return true;
}

/**
 * Rectangles drawn on a page, in drawing order.
 */
export function collectRectangles(
  fnArray: number[],
  argsArray: unknown[],
  ops: PathOpCodes,
  view: PageView
): Rect[] {
  const rects: Rect[] = [];
  const stack: Matrix[] = [];
  let ctm: Matrix = IDENTITY;

  const flushSubpath = (points: Array<[number, number]>) => {
    if (!isAxisAlignedBox(points)) return;
    const box = boxOf(points, view);
    if (box) rects.push(box);
  };

  for (let i = 0; i < fnArray.length; i++) {
    const fn = fnArray[i];
    const args = argsArray[i];

    if (fn === ops.save) {
      stack.push(ctm);
    } else if (fn === ops.restore) {
      ctm = stack.pop() ?? IDENTITY;
    } else if (fn === ops.transform) {
      const m = toMatrix(args);
      if (m) ctm = multiply(ctm, m);
    } else if (fn === ops.constructPath && Array.isArray(args)) {
      const [subOps, coords] = args;
      if (!isNumberArray(subOps) || !isNumberArray(coords)) continue;

      let cursor = 0;
      let subpath: Array<[number, number]> = [];
      for (const op of subOps) {
        if (op === ops.rectangle) {
          const [x, y, w, h] = coords.slice(cursor, cursor + 4);
          cursor += 4;
          const corners = [apply(ctm, x, y), apply(ctm, x + w, y), apply(ctm, x + w, y + h), apply(ctm, x, y + h)];
          const box = boxOf(corners, view);
          if (box) rects.push(box);
        } else if (op === ops.moveTo) {
          flushSubpath(subpath);
          subpath = [apply(ctm, coords[cursor], coords[cursor + 1])];
          cursor += 2;
        } else if (op === ops.lineTo) {
          subpath.push(apply(ctm, coords[cursor], coords[cursor + 1]));
          cursor += 2;
        } else if (op === ops.curveTo) {
          cursor += 6;
          subpath = [];
        } else if (op === ops.curveTo2 || op === ops.curveTo3) {
          cursor += 4;
          subpath = [];
        } else if (op === ops.closePath) {
          flushSubpath(subpath);
          subpath = [];
        }
      }
      flushSubpath(subpath);
    }
  }

  return rects;
}
