/**
 * Ruled Table Detection
 *
 * Finds tables drawn as a grid of cell rectangles: cells of one row share a
 * top edge, consecutive rows touch, and a table needs at least two rows of
 * at least two cells. Cell text is the words whose centre falls inside.
 */

import type { Rect, WordBox, TableSnapshot } from '@formsift/shared';
import { centroid, containsPoint, pageText, toTokens } from '@formsift/shared';

const MIN_CELL_WIDTH = 20;
const MIN_CELL_HEIGHT = 8;
const MAX_CELL_HEIGHT = 100;
const EDGE_TOLERANCE = 2;

interface CellRow {
  y0: number;
  y1: number;
  cells: Rect[];
}

function isCellSized(r: Rect): boolean {
  const w = r.x1 - r.x0;
  const h = r.y1 - r.y0;
  return w >= MIN_CELL_WIDTH && h >= MIN_CELL_HEIGHT && h < MAX_CELL_HEIGHT;
}

function near(a: number, b: number): boolean {
  return Math.abs(a - b) <= EDGE_TOLERANCE;
}

/** Drop exact duplicates (fill and stroke of the same box). */
function distinct(rects: Rect[]): Rect[] {
  const kept: Rect[] = [];
  for (const r of rects) {
    const duplicate = kept.some((k) => near(k.x0, r.x0) && near(k.y0, r.y0) && near(k.x1, r.x1) && near(k.y1, r.y1));
    if (!duplicate) kept.push(r);
  }
  return kept;
}

function groupRows(cells: Rect[]): CellRow[] {
  const sorted = [...cells].sort((a, b) => a.y0 - b.y0 || a.x0 - b.x0);
  const rows: CellRow[] = [];

  for (const cell of sorted) {
    const row = rows.find((r) => near(r.y0, cell.y0) && near(r.y1, cell.y1));
    if (row) {
      row.cells.push(cell);
    } else {
      rows.push({ y0: cell.y0, y1: cell.y1, cells: [cell] });
    }
  }

  for (const row of rows) row.cells.sort((a, b) => a.x0 - b.x0);
  return rows.filter((r) => r.cells.length >= 2).sort((a, b) => a.y0 - b.y0);
}

/** Runs of rows where each row starts where the previous one ends. */
function stackRows(rows: CellRow[]): CellRow[][] {
  const stacks: CellRow[][] = [];
  let current: CellRow[] = [];

  for (const row of rows) {
    const previous = current[current.length - 1];
    if (previous && near(previous.y1, row.y0)) {
      current.push(row);
    } else {
      if (current.length >= 2) stacks.push(current);
      current = [row];
    }
  }
  if (current.length >= 2) stacks.push(current);

  return stacks;
}

function columnEdges(rows: CellRow[]): number[] {
  const edges: number[] = [];
  for (const row of rows) {
    for (const cell of row.cells) {
      if (!edges.some((x) => near(x, cell.x0))) edges.push(cell.x0);
    }
  }
  return edges.sort((a, b) => a - b);
}

function cellText(cell: Rect, words: WordBox[]): string | null {
  const inside = toTokens(words, 0).filter((t) => containsPoint(cell, centroid(t.rect)));
  if (inside.length === 0) return null;
  return pageText(inside, EDGE_TOLERANCE * 2).replace(/\n/g, ' ');
}

/**
 * Tables formed by the page's rectangles, top to bottom.
 */
export function detectTables(rects: Rect[], words: WordBox[]): TableSnapshot[] {
  const rows = groupRows(distinct(rects.filter(isCellSized)));

  return stackRows(rows).map((stack) => {
    const columns = columnEdges(stack);
    const grid: Array<Array<string | null>> = [];
    const cells: Array<Array<Rect | null>> = [];

    for (const row of stack) {
      const texts: Array<string | null> = columns.map(() => null);
      const boxes: Array<Rect | null> = columns.map(() => null);
      for (const cell of row.cells) {
        const col = columns.findIndex((x) => near(x, cell.x0));
        if (col < 0) continue;
        texts[col] = cellText(cell, words);
        boxes[col] = cell;
      }
      grid.push(texts);
      cells.push(boxes);
    }

    return { rows: grid, cells };
  });
}
