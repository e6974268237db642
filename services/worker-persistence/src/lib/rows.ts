/**
 * Record to Row Mapping
 */

import { formatRect, type ExtractionRecord } from '@formsift/shared';

export interface ExtractedDataInsert {
  key: string;
  value: string;
  source_page: number;
  source_coordinates: string;
  extraction_method: string;
}

export function toExtractedRow(record: ExtractionRecord): ExtractedDataInsert {
  return {
    key: record.key,
    value: record.value,
    source_page: record.page,
    // formatRect stores '0,0,0,0' for a record with no location
    source_coordinates: formatRect(record.rect),
    extraction_method: record.method,
  };
}

/**
 * Positional parameters for a multi-row INSERT into extracted_data, in
 * record order. Returns the VALUES clause and its parameters.
 */
export function extractedDataValues(
  documentId: string,
  records: ExtractionRecord[]
): { clause: string; params: Array<string | number> } {
  const params: Array<string | number> = [];
  const tuples = records.map((record) => {
    const row = toExtractedRow(record);
    const base = params.length;
    params.push(documentId, row.key, row.value, row.source_page, row.source_coordinates, row.extraction_method);
    return `($${base + 1}, $${base + 2}, $${base + 3}, $${base + 4}, $${base + 5}, $${base + 6})`;
  });
  return { clause: tuples.join(', '), params };
}
