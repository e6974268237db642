/**
 * Form Template Loader
 *
 * Turns parsed configuration data into a FormTemplate: validates it against
 * docs/contracts/form_template.schema.json and fills in defaults.
 */

import type { CheckboxConfig, FieldConfig, FormTemplate } from '../types';
import { validateFormTemplate } from '../schemas';
import { TemplateValidationError } from '../errors';

export const FIELD_DEFAULTS = {
  pageNum: 0,
  instance: 0,
  fieldType: 'text',
  allowEmpty: false,
} as const satisfies Omit<FieldConfig, 'name' | 'label'>;

/**
 * @throws TemplateValidationError when the data does not match the schema
 */
export function loadFormTemplate(data: unknown): FormTemplate {
  const result = validateFormTemplate(data);
  if (!result.valid) {
    throw new TemplateValidationError('Form template', result.errors);
  }

  const input = result.value;
  const fields: FieldConfig[] = (input.fields ?? []).map((field) => ({
    name: field.name,
    label: field.label.trim(),
    pageNum: field.pageNum ?? FIELD_DEFAULTS.pageNum,
    instance: field.instance ?? FIELD_DEFAULTS.instance,
    fieldType: field.fieldType ?? FIELD_DEFAULTS.fieldType,
    allowEmpty: field.allowEmpty ?? FIELD_DEFAULTS.allowEmpty,
  }));

  const checkboxes: CheckboxConfig[] = (input.checkboxes ?? []).map((checkbox) => ({
    name: checkbox.name,
    label: checkbox.label.trim(),
    pageNum: checkbox.pageNum ?? FIELD_DEFAULTS.pageNum,
    instance: checkbox.instance ?? FIELD_DEFAULTS.instance,
  }));

  return {
    formType: input.formType,
    identificationString: input.identificationString,
    fields,
    checkboxes,
  };
}
