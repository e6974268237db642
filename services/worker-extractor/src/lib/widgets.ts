/**
 * Widget Annotations
 *
 * Turns pdfjs widget annotations into WidgetRecords. Push buttons and
 * signature fields carry no form data and are skipped.
 */

import type { WidgetFieldType, WidgetRecord } from '@formsift/shared';
import type { PageView } from './words';

function field(annotation: object, name: string): unknown {
  return name in annotation ? Reflect.get(annotation, name) : undefined;
}

function fieldTypeOf(annotation: object): WidgetFieldType | null {
  switch (field(annotation, 'fieldType')) {
    case 'Tx':
      return 'text';
    case 'Ch':
      return field(annotation, 'combo') === true ? 'combo' : 'list';
    case 'Btn':
      if (field(annotation, 'pushButton') === true) return null;
      return field(annotation, 'radioButton') === true ? 'radio' : 'checkbox';
    default:
      return null;
  }
}

function stringValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.filter((v) => typeof v === 'string').join(', ');
  return '';
}

/**
 * Value of the widget itself. A radio button shares its group's value, so
 * it only counts as on when that value is its own export value.
 */
function valueOf(annotation: object, fieldType: WidgetFieldType): string {
  const value = stringValue(field(annotation, 'fieldValue'));
  if (fieldType !== 'radio') return value;

  const own = stringValue(field(annotation, 'buttonValue'));
  return own && value === own ? own : 'Off';
}

export function toWidget(annotation: unknown, view: PageView): WidgetRecord | null {
  if (typeof annotation !== 'object' || annotation === null) return null;
  if (field(annotation, 'subtype') !== 'Widget') return null;

  const fieldType = fieldTypeOf(annotation);
  const rect = field(annotation, 'rect');
  if (!fieldType || !Array.isArray(rect) || rect.length < 4) return null;

  const [x1, y1, x2, y2] = rect.map(Number);
  if (![x1, y1, x2, y2].every(Number.isFinite)) return null;

  return {
    fieldName: stringValue(field(annotation, 'fieldName')),
    fieldType,
    fieldValue: valueOf(annotation, fieldType),
    rect: {
      x0: Math.min(x1, x2) - view[0],
      y0: view[3] - Math.max(y1, y2),
      x1: Math.max(x1, x2) - view[0],
      y1: view[3] - Math.min(y1, y2),
    },
  };
}

export function toWidgets(annotations: unknown[], view: PageView): WidgetRecord[] {
  return annotations.flatMap((a) => {
    const widget = toWidget(a, view);
    return widget ? [widget] : [];
  });
}
