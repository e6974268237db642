/**
 * Orchestrator Tests
 */

import {
  BaseStrategy,
  extractPage,
  extractPages,
  type ExtractionMethod,
  type ExtractionRecord,
  type PageExtractionContext,
  type StrategyKind,
  type StrategyResult,
} from '@formsift/shared';
import { documentOf, line, page, settings } from './fixtures';

class ScriptedStrategy extends BaseStrategy {
  readonly description = 'scripted';
  seenConsumed: boolean[] = [];

  constructor(
    readonly kind: StrategyKind,
    readonly method: ExtractionMethod,
    private readonly script: (ctx: PageExtractionContext) => Array<[string, string]>
  ) {
    super();
  }

  protected extract(ctx: PageExtractionContext): StrategyResult {
    this.seenConsumed.push(ctx.isConsumed(0));
    const records: ExtractionRecord[] = this.script(ctx).map(([key, value]) => this.record(ctx, key, value));
    return { records, warnings: [] };
  }
}

describe('extractPage', () => {
  const p = page(line(100, 10, 'Name:', 'John'));

  it('should keep the first record for a key', () => {
    const first = new ScriptedStrategy('widget', 'Widget', () => [['Name', 'first']]);
    const second = new ScriptedStrategy('compound-label', 'Compound Label', () => [
      ['Name', 'second'],
      ['Other', 'kept'],
    ]);

    const result = extractPage(p, [first, second], settings());
    expect(result.records.map((r) => [r.key, r.value, r.method])).toEqual([
      ['Name', 'first', 'Widget'],
      ['Other', 'kept', 'Compound Label'],
    ]);
  });

  it('should roll back a failing strategy and keep going', () => {
    const failing = new ScriptedStrategy('table', 'Table', (ctx) => {
      ctx.consume([0]);
      throw new Error('boom');
    });
    const after = new ScriptedStrategy('colon-label', 'Form Field', () => [['Name', 'John']]);

    const result = extractPage(p, [failing, after], settings());

    expect(after.seenConsumed).toEqual([false]);
    expect(result.records.map((r) => r.key)).toEqual(['Name']);
    expect(result.warnings).toEqual(["Strategy 'table' failed on page 0: boom"]);
  });
});

describe('extractPages', () => {
  it('should visit pages in order and skip pages with no strategies', () => {
    const doc = documentOf(
      page(line(100, 10, 'a'), {}, 0),
      page(line(100, 10, 'b'), {}, 1),
      page(line(100, 10, 'c'), {}, 2)
    );
    const echo = new ScriptedStrategy('widget', 'Widget', (ctx) => [['Text', ctx.tokens[0].text]]);

    const output = extractPages(doc, (n) => (n === 1 ? [] : [echo]), settings());
    expect(output.records.map((r) => [r.page, r.value])).toEqual([
      [0, 'a'],
      [2, 'c'],
    ]);
  });
});
