/**
 * Error Types
 *
 * NotFound and ambiguous matches are not errors; they surface as empty results.
 * The classes below cover the faults that do occur.
 */

import type { StrategyKind } from './strategies/types';

/** A single strategy failed on a page. Isolated by the orchestrator. */
export class StrategyFaultError extends Error {
  readonly kind: StrategyKind;
  readonly page: number;

  constructor(kind: StrategyKind, page: number, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Strategy '${kind}' failed on page ${page}: ${reason}`, { cause });
    this.name = 'StrategyFaultError';
    this.kind = kind;
    this.page = page;
  }
}

/** The document engine handed over a table grid that is not rows of cells. */
export class MalformedTableError extends Error {
  constructor(tableIndex: number, detail: string) {
    super(`Table ${tableIndex} is malformed: ${detail}`);
    this.name = 'MalformedTableError';
  }
}

/** Form template or label dictionary data failed schema validation. */
export class TemplateValidationError extends Error {
  readonly errors: string[];

  constructor(subject: string, errors: string[]) {
    super(`${subject} failed validation: ${errors.join('; ')}`);
    this.name = 'TemplateValidationError';
    this.errors = errors;
  }
}

/** The document engine could not open or decode the file. */
export class DocumentOpenError extends Error {
  constructor(filename: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not open '${filename}': ${reason}`, { cause });
    this.name = 'DocumentOpenError';
  }
}
