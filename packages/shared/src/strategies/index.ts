/**
 * Extraction Strategies
 *
 * Plans are ordered lists of strategies; earlier strategies win a key.
 */

import type { FormTemplate } from '../types';
import type { LabelDictionary } from '../schemas';
import type { ExtractionStrategy } from './types';
import { getLabelDictionary } from '../extraction/label-dictionary';
import { WidgetStrategy } from './widget-strategy';
import { TableStrategy } from './table-strategy';
import { CheckboxGroupStrategy } from './checkbox-group-strategy';
import { CompoundLabelStrategy } from './compound-label-strategy';
import { ColonLabelStrategy } from './colon-label-strategy';
import { StandaloneLabelStrategy } from './standalone-label-strategy';
import { TemplateFieldStrategy } from './template-field-strategy';
import { TemplateCheckboxStrategy } from './template-checkbox-strategy';
import { dictionaryLabels } from './label-strategy';

export type { ExtractionStrategy, StrategyKind, StrategyResult } from './types';
export { BaseStrategy } from './base-strategy';
export { LabelStrategy, dictionaryLabels, type DictionaryLabels } from './label-strategy';
export { WidgetStrategy, widgetValue } from './widget-strategy';
export { TableStrategy } from './table-strategy';
export { CheckboxGroupStrategy } from './checkbox-group-strategy';
export { CompoundLabelStrategy } from './compound-label-strategy';
export { ColonLabelStrategy } from './colon-label-strategy';
export { StandaloneLabelStrategy } from './standalone-label-strategy';
export { TemplateFieldStrategy } from './template-field-strategy';
export { TemplateCheckboxStrategy } from './template-checkbox-strategy';

/**
 * Widgets, tables, checkbox groups, compound labels, colon labels,
 * standalone labels.
 */
export function heuristicPlan(dictionary: LabelDictionary = getLabelDictionary()): ExtractionStrategy[] {
  const labels = dictionaryLabels(dictionary);
  return [
    new WidgetStrategy(),
    new TableStrategy(),
    new CheckboxGroupStrategy(dictionary.checkboxGroups),
    new CompoundLabelStrategy(labels),
    new ColonLabelStrategy(labels),
    new StandaloneLabelStrategy(labels),
  ];
}

export function templatePlan(template: FormTemplate): ExtractionStrategy[] {
  return [new TemplateFieldStrategy(template), new TemplateCheckboxStrategy(template)];
}
