/**
 * Document Processor
 *
 * Chooses a plan for a document and runs it. Config mode identifies the form
 * on its first page and runs that template's declared fields; an unknown
 * form falls back to the heuristic plan. Dynamic mode always runs the
 * heuristic plan.
 */

import type {
  DocumentExtraction,
  DocumentSource,
  ExtractionMode,
  FormTemplate,
  ProcessingMethod,
} from '../types';
import type { LabelDictionary } from '../schemas';
import type { ExtractionSettings } from './settings';
import type { ExtractionOutput } from './orchestrator';
import { defaultExtractionSettings } from './settings';
import { extractPages } from './orchestrator';
import { pageText, toTokens } from './tokens';
import { heuristicPlan, templatePlan } from '../strategies';
import { getTemplate, identifyFormType } from '../templates/registry';
import { DocumentOpenError } from '../errors';
import { logger } from '../logger';

/**
 * Where config mode finds its templates. Defaults to the template registry.
 */
export interface TemplateSource {
  identify(firstPageText: string): string | null;
  get(formType: string): FormTemplate | undefined;
}

export const registryTemplates: TemplateSource = {
  identify: (text) => identifyFormType(text),
  get: (formType) => getTemplate(formType),
};

export function templateList(templates: FormTemplate[]): TemplateSource {
  return {
    identify: (text) => identifyFormType(text, templates),
    get: (formType) => templates.find((t) => t.formType === formType),
  };
}

export interface ProcessOptions {
  mode: ExtractionMode;
  settings?: ExtractionSettings;
  dictionary?: LabelDictionary;
  templates?: TemplateSource;
}

function finish(
  method: ProcessingMethod,
  formType: string | null,
  document: DocumentSource,
  output: ExtractionOutput,
  warnings: string[] = []
): DocumentExtraction {
  return {
    status: output.records.length > 0 ? 'SUCCESS' : 'SUCCESS_NO_DATA',
    method,
    formType,
    pageCount: document.pageCount,
    records: output.records,
    warnings: [...warnings, ...output.warnings],
  };
}

function processDynamically(
  document: DocumentSource,
  settings: ExtractionSettings,
  dictionary: LabelDictionary | undefined,
  fallback: boolean,
  warnings: string[] = []
): DocumentExtraction {
  const plan = heuristicPlan(dictionary);
  const output = extractPages(document, () => plan, settings);
  return finish(fallback ? 'Dynamic (Fallback)' : 'Dynamic Heuristic', null, document, output, warnings);
}

function processWithTemplate(
  document: DocumentSource,
  settings: ExtractionSettings,
  options: ProcessOptions
): DocumentExtraction {
  const templates = options.templates ?? registryTemplates;
  const firstPage = document.pageCount > 0 ? document.page(0) : null;
  const text = firstPage ? pageText(toTokens(firstPage.words(), 0), settings.lineBucket) : '';
  const formType = templates.identify(text);

  if (!formType) {
    logger.info('No form template matched, falling back to heuristic extraction');
    return processDynamically(document, settings, options.dictionary, true, [
      'No form template matched the first page',
    ]);
  }

  const template = templates.get(formType);
  if (!template) {
    logger.warn('Form type identified but no template is loaded', { form_type: formType });
    return {
      status: 'CONFIG_ERROR',
      method: `Config: ${formType}`,
      formType,
      pageCount: document.pageCount,
      records: [],
      warnings: [`No template loaded for form type '${formType}'`],
    };
  }

  const plan = templatePlan(template);
  const output = extractPages(
    document,
    (pageNumber) =>
      template.fields.some((f) => f.pageNum === pageNumber) ||
      template.checkboxes.some((c) => c.pageNum === pageNumber)
        ? plan
        : [],
    settings
  );
  return finish(`Config: ${formType}`, formType, document, output);
}

/**
 * Extract records from an open document.
 */
export function processDocument(document: DocumentSource, options: ProcessOptions): DocumentExtraction {
  const settings = options.settings ?? defaultExtractionSettings();

  logger.debug('Processing document', { mode: options.mode, page_count: document.pageCount });

  return options.mode === 'config'
    ? processWithTemplate(document, settings, options)
    : processDynamically(document, settings, options.dictionary, false);
}

/**
 * Open a document, hand it to `fn` and always release it afterwards. A
 * release that fails because the handle is already gone is only logged.
 *
 * @throws DocumentOpenError when `open` fails
 */
export async function withDocument<T>(
  filename: string,
  open: () => Promise<DocumentSource>,
  fn: (document: DocumentSource) => T | Promise<T>
): Promise<T> {
  let document: DocumentSource;
  try {
    document = await open();
  } catch (error) {
    throw new DocumentOpenError(filename, error);
  }

  try {
    return await fn(document);
  } finally {
    try {
      await document.close();
    } catch (error) {
      logger.debug('Document release failed', {
        filename,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

/**
 * Open, process and release a document. An open failure becomes an
 * ERROR_OPENING_FILE result with no records.
 */
export async function extractFile(
  filename: string,
  open: () => Promise<DocumentSource>,
  options: ProcessOptions
): Promise<DocumentExtraction> {
  try {
    return await withDocument(filename, open, (document) => processDocument(document, options));
  } catch (error) {
    if (!(error instanceof DocumentOpenError)) throw error;

    logger.error('Could not open document', error, { filename });
    return {
      status: 'ERROR_OPENING_FILE',
      formType: null,
      pageCount: 0,
      records: [],
      warnings: [error.message],
    };
  }
}
