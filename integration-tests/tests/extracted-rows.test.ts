/**
 * Extracted Data Row Tests
 */

import type { ExtractionRecord } from '@formsift/shared';
import { extractedDataValues, toExtractedRow } from '../../services/worker-persistence/src/lib/rows';

const located: ExtractionRecord = {
  key: 'Surname',
  value: 'Smith',
  page: 0,
  rect: { x0: 10, y0: 90.5, x1: 40, y1: 100 },
  method: 'Compound Label',
};

const unlocated: ExtractionRecord = {
  key: 'Table 1 - Cost',
  value: '500',
  page: 2,
  method: 'Table',
};

describe('toExtractedRow', () => {
  it('should store coordinates with one decimal place', () => {
    expect(toExtractedRow(located)).toEqual({
      key: 'Surname',
      value: 'Smith',
      source_page: 0,
      source_coordinates: '10.0,90.5,40.0,100.0',
      extraction_method: 'Compound Label',
    });
  });

  it('should store the empty rectangle for records without a location', () => {
    expect(toExtractedRow(unlocated).source_coordinates).toBe('0,0,0,0');
  });
});

describe('extractedDataValues', () => {
  it('should number parameters across rows in record order', () => {
    const { clause, params } = extractedDataValues('doc-1', [located, unlocated]);

    expect(clause).toBe('($1, $2, $3, $4, $5, $6), ($7, $8, $9, $10, $11, $12)');
    expect(params).toEqual([
      'doc-1', 'Surname', 'Smith', 0, '10.0,90.5,40.0,100.0', 'Compound Label',
      'doc-1', 'Table 1 - Cost', '500', 2, '0,0,0,0', 'Table',
    ]);
  });

  it('should produce nothing for no records', () => {
    expect(extractedDataValues('doc-1', [])).toEqual({ clause: '', params: [] });
  });
});
