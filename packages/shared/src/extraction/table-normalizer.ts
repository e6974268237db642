/**
 * Table Normalizer
 *
 * Flattens a detected grid into one record per filled cell. Row 0 is the
 * header; each later cell is keyed by its table number and column header,
 * plus its row number when the table has more than one data row.
 */

import type { ExtractionRecord, TableGrid } from '../types';
import { MalformedTableError } from '../errors';
import { cleanKey, cleanValue, isFillArtifact } from './text-normalizer';

export function tableKey(tableNumber: number, header: string, row: number | null): string {
  return row === null
    ? `Table ${tableNumber} - ${header}`
    : `Table ${tableNumber} - Row ${row} - ${header}`;
}

function assertGrid(grid: TableGrid, tableNumber: number): void {
  if (!Array.isArray(grid.rows)) {
    throw new MalformedTableError(tableNumber, 'rows is not an array');
  }
  grid.rows.forEach((row, r) => {
    if (!Array.isArray(row)) {
      throw new MalformedTableError(tableNumber, `row ${r} is not an array`);
    }
  });
}

/**
 * @param tableNumber - 1-based position of the table on its page
 */
export function normalizeTable(grid: TableGrid, tableNumber: number, page: number): ExtractionRecord[] {
  assertGrid(grid, tableNumber);
  if (grid.rows.length < 2) return [];

  const headers = grid.rows[0].map((cell) => cleanKey(cell ?? '', { titleCase: true }));
  const multiRow = grid.rows.length > 2;
  const records: ExtractionRecord[] = [];

  for (let r = 1; r < grid.rows.length; r++) {
    grid.rows[r].forEach((cell, c) => {
      const header = headers[c];
      if (!header || cell == null) return;
      if (typeof cell !== 'string') {
        throw new MalformedTableError(tableNumber, `cell ${r},${c} is not text`);
      }

      const value = cleanValue(cell);
      if (!value || isFillArtifact(value)) return;

      records.push({
        key: tableKey(tableNumber, header, multiRow ? r : null),
        value,
        page,
        rect: grid.cellRect(r, c) ?? undefined,
        method: 'Table',
      });
    });
  }

  return records;
}
