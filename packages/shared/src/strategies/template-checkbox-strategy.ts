/**
 * Template Checkbox Strategy
 *
 * Resolves each declared checkbox of the page next to the n-th occurrence
 * of its label. Boxes with no detectable mark are left out.
 */

import type { ExtractionRecord, FormTemplate } from '../types';
import type { StrategyResult } from './types';
import type { PageExtractionContext } from '../extraction/page-context';
import { createClaims, resolveCheckbox } from '../extraction/checkbox-resolver';
import { logger } from '../logger';
import { BaseStrategy } from './base-strategy';

export class TemplateCheckboxStrategy extends BaseStrategy {
  readonly kind = 'template-checkbox' as const;
  readonly method = 'Config Checkbox' as const;
  readonly description: string;

  constructor(private readonly template: FormTemplate) {
    super();
    this.description = `Declared checkboxes of ${template.formType}`;
  }

  protected extract(ctx: PageExtractionContext): StrategyResult {
    const checkboxes = this.template.checkboxes.filter((c) => c.pageNum === ctx.pageNumber);
    const claims = createClaims();
    const records: ExtractionRecord[] = [];

    for (const checkbox of checkboxes) {
      const labelRect = ctx.page.searchText(checkbox.label)[checkbox.instance];
      if (!labelRect) {
        logger.debug('Checkbox label not found', { checkbox: checkbox.name, instance: checkbox.instance });
        continue;
      }

      const resolution = resolveCheckbox(ctx.page, ctx.tokens, labelRect, {
        searchRadius: ctx.settings.checkboxSearchRadius,
        claims,
        isConsumed: ctx.isConsumed,
      });
      if (resolution.state === 'Not Found') continue;

      if (resolution.markerTokenIndex !== null) {
        ctx.consume([resolution.markerTokenIndex]);
      }
      records.push(this.record(ctx, checkbox.name, resolution.state, resolution.rect));
    }

    return { records, warnings: [] };
  }
}
