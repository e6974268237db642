/**
 * Template Field Strategy
 *
 * Runs the template line parser over the page's declared fields. Keys are
 * the declared field names, used verbatim. Values are narrowed to their
 * declared field type where possible.
 */

import type { ExtractionRecord, FormTemplate } from '../types';
import type { StrategyResult } from './types';
import type { PageExtractionContext } from '../extraction/page-context';
import { parseTemplatePage } from '../extraction/template-parser';
import { refineTypedValue } from '../extraction/field-types';
import { BaseStrategy } from './base-strategy';

export class TemplateFieldStrategy extends BaseStrategy {
  readonly kind = 'template-field' as const;
  readonly method = 'Config Field' as const;
  readonly description: string;

  constructor(private readonly template: FormTemplate) {
    super();
    this.description = `Declared fields of ${template.formType}`;
  }

  protected extract(ctx: PageExtractionContext): StrategyResult {
    const fields = this.template.fields.filter((f) => f.pageNum === ctx.pageNumber);
    const matches = parseTemplatePage(ctx.tokens, fields, ctx.settings, ctx.isConsumed);
    const records: ExtractionRecord[] = [];
    const warnings: string[] = [];

    for (const match of matches) {
      const { field } = match;
      const typed = refineTypedValue(field.fieldType, match.value);
      if (!typed.valid) {
        warnings.push(`Field '${field.name}' on page ${ctx.pageNumber}: '${match.value}' is not a valid ${field.fieldType}`);
      }

      ctx.consume(match.labelTokenIndices);
      ctx.consume(match.valueTokenIndices);
      records.push(this.record(ctx, field.name, typed.value, match.rect));
    }

    return { records, warnings };
  }
}
