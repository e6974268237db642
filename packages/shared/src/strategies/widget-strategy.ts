/**
 * Widget Strategy
 *
 * Reads interactive form fields. Their names and values come straight from
 * the document, so they are the most trusted source and run first.
 */

import type { ExtractionRecord, WidgetRecord } from '../types';
import type { StrategyResult } from './types';
import type { PageExtractionContext } from '../extraction/page-context';
import { cleanKey, cleanValue } from '../extraction/text-normalizer';
import { BaseStrategy } from './base-strategy';

/**
 * Display value of a widget, or '' when it holds nothing worth recording.
 */
export function widgetValue(widget: WidgetRecord): string {
  const raw = widget.fieldValue.trim();

  switch (widget.fieldType) {
    case 'checkbox':
      return raw && raw !== 'Off' ? 'Checked' : '';
    case 'radio':
      return raw && raw !== 'Off' ? cleanKey(raw, { titleCase: true }) : '';
    default:
      return cleanValue(raw);
  }
}

export class WidgetStrategy extends BaseStrategy {
  readonly kind = 'widget' as const;
  readonly method = 'Widget' as const;
  readonly description = 'Interactive form field values';

  protected extract(ctx: PageExtractionContext): StrategyResult {
    const widgets = ctx.page.widgets();
    const records: ExtractionRecord[] = [];

    for (const widget of widgets) {
      const key = cleanKey(widget.fieldName, { titleCase: true });
      const value = widgetValue(widget);
      if (!key || !value) continue;
      records.push(this.record(ctx, key, value, widget.rect));
    }

    // Text drawn inside a widget is its rendered value
    ctx.consumeWithin(widgets.map((w) => w.rect));

    return { records, warnings: [] };
  }
}
