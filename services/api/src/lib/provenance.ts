/**
 * Highlight Overlays
 *
 * Turns stored extracted data back into drawable overlays for one page.
 * Each overlay carries an RGB colour (0-1 per channel) keyed by the method
 * that produced it; the client draws them over its own rendering.
 */

import { logger, parseRect, type ExtractedDataRow, type HighlightOverlay } from '@formsift/shared';

type Rgb = HighlightOverlay['color'];

const HEURISTIC: Rgb = [1, 0.5, 0];

export const METHOD_COLORS: Readonly<Record<string, Rgb>> = {
  'Config Field': [1, 1, 0],
  'Config Checkbox': [1, 0, 1],
  'Compound Label': HEURISTIC,
  'Form Field': HEURISTIC,
  'Label Match': HEURISTIC,
  'Checkbox Option': HEURISTIC,
  Widget: [0, 0, 1],
  Table: [0, 1, 0],
};

export const UNKNOWN_METHOD_COLOR: Rgb = [1, 0, 0];

export const NO_LOCATION = '0,0,0,0';

export function methodColor(method: string): Rgb {
  return METHOD_COLORS[method] ?? UNKNOWN_METHOD_COLOR;
}

/**
 * Overlays for the rows on `page`, in row order. Rows stored without a
 * location are left out; rows whose coordinates do not parse are left out
 * and logged.
 */
export function highlightsForPage(rows: ExtractedDataRow[], page: number): HighlightOverlay[] {
  const overlays: HighlightOverlay[] = [];

  for (const row of rows) {
    if (row.source_page !== page || row.source_coordinates === NO_LOCATION) continue;

    const rect = parseRect(row.source_coordinates);
    if (!rect) {
      logger.warn('Skipping malformed coordinates', {
        extracted_data_id: row.id,
        source_coordinates: row.source_coordinates,
      });
      continue;
    }

    overlays.push({
      key: row.key,
      value: row.value,
      method: row.extraction_method,
      page: row.source_page,
      rect,
      color: methodColor(row.extraction_method),
    });
  }

  return overlays;
}
