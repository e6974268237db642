/**
 * Form Template Registry
 *
 * Registry of known form layouts, keyed by form type.
 */

import type { FormTemplate } from '../types';
import { logger } from '../logger';

const templateRegistry = new Map<string, FormTemplate>();

/**
 * Register a template. Overwrites any existing template for its form type.
 */
export function registerTemplate(template: FormTemplate): void {
  templateRegistry.set(template.formType, template);

  logger.debug('Registered form template', {
    form_type: template.formType,
    field_count: template.fields.length,
    checkbox_count: template.checkboxes.length,
  });
}

export function getTemplate(formType: string): FormTemplate | undefined {
  return templateRegistry.get(formType);
}

/**
 * @throws Error if no template is registered for that form type
 */
export function getTemplateOrThrow(formType: string): FormTemplate {
  const template = templateRegistry.get(formType);
  if (!template) {
    throw new Error(`No template registered for form type: ${formType}`);
  }
  return template;
}

export function hasTemplate(formType: string): boolean {
  return templateRegistry.has(formType);
}

export function getRegisteredFormTypes(): string[] {
  return Array.from(templateRegistry.keys());
}

export function getAllTemplates(): FormTemplate[] {
  return Array.from(templateRegistry.values());
}

/**
 * Clear all registered templates.
 * Useful for testing.
 */
export function clearTemplateRegistry(): void {
  templateRegistry.clear();
}

/**
 * Form type of the first template whose identification string occurs in the
 * text of a document's first page. Templates are tried in registration order.
 */
export function identifyFormType(
  firstPageText: string,
  templates: FormTemplate[] = getAllTemplates()
): string | null {
  const match = templates.find((t) => firstPageText.includes(t.identificationString));
  return match ? match.formType : null;
}
