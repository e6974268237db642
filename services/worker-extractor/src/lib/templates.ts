/**
 * Form Template Directory
 *
 * Loads every *.json file in the template directory into the shared
 * registry. A file that fails validation is logged and skipped so one bad
 * template does not take the others down.
 */

import fs from 'fs';
import path from 'path';
import { logger, config, loadFormTemplate, registerTemplate, type FormTemplate } from '@formsift/shared';

export const BUNDLED_TEMPLATE_DIR = path.join(__dirname, '../../templates');

export function readTemplateDirectory(dir: string): FormTemplate[] {
  const files = fs
    .readdirSync(dir)
    .filter((f) => f.endsWith('.json'))
    .sort();

  const templates: FormTemplate[] = [];
  for (const file of files) {
    try {
      const data: unknown = JSON.parse(fs.readFileSync(path.join(dir, file), 'utf-8'));
      templates.push(loadFormTemplate(data));
    } catch (error) {
      logger.error('Skipping invalid form template', error, { file });
    }
  }
  return templates;
}

/**
 * Register the templates from `dir` (the configured or bundled directory).
 * Returns the form types registered.
 */
export function loadTemplateDirectory(dir: string = config.templateDir || BUNDLED_TEMPLATE_DIR): string[] {
  const templates = readTemplateDirectory(dir);
  templates.forEach(registerTemplate);

  logger.info('Form templates loaded', {
    dir,
    form_types: templates.map((t) => t.formType),
  });

  return templates.map((t) => t.formType);
}
