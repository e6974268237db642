/**
 * Form Templates
 */

export { loadFormTemplate, FIELD_DEFAULTS } from './loader';
export {
  registerTemplate,
  getTemplate,
  getTemplateOrThrow,
  hasTemplate,
  getRegisteredFormTypes,
  getAllTemplates,
  clearTemplateRegistry,
  identifyFormType,
} from './registry';
