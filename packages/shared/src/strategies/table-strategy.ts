/**
 * Table Strategy
 *
 * Flattens every table the document engine detected on the page and
 * claims the tokens inside its cells.
 */

import type { ExtractionRecord, Rect } from '../types';
import type { StrategyResult } from './types';
import type { PageExtractionContext } from '../extraction/page-context';
import { normalizeTable } from '../extraction/table-normalizer';
import { BaseStrategy } from './base-strategy';

export class TableStrategy extends BaseStrategy {
  readonly kind = 'table' as const;
  readonly method = 'Table' as const;
  readonly description = 'Detected table grids, one record per filled cell';

  protected extract(ctx: PageExtractionContext): StrategyResult {
    const records: ExtractionRecord[] = [];

    ctx.page.tables().forEach((grid, i) => {
      records.push(...normalizeTable(grid, i + 1, ctx.pageNumber));

      const cells: Rect[] = [];
      grid.rows.forEach((row, r) => {
        row.forEach((_, c) => {
          const cell = grid.cellRect(r, c);
          if (cell) cells.push(cell);
        });
      });
      ctx.consumeWithin(cells);
    });

    return { records, warnings: [] };
  }
}
