/**
 * JSON Schema Validation
 *
 * Schema validation using Ajv for form templates, the label dictionary and
 * extraction records. Schemas live in docs/contracts/.
 */

import fs from 'fs';
import path from 'path';
import Ajv2020 from 'ajv/dist/2020';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import type { CheckboxConfig, ExtractionRecord, FieldConfig } from './types';
import { logger } from './logger';

// Initialize Ajv with 2020-12 draft support
const ajv = new Ajv2020({
  strict: false,
  allErrors: true,
  verbose: true,
});
addFormats(ajv);

/** Checkbox group as declared in the label dictionary. */
export interface CheckboxGroup {
  name: string;
  options: string[];
}

export interface LabelDictionary {
  compoundLabels: string[];
  standaloneLabels: string[];
  checkboxGroups: CheckboxGroup[];
}

/** Form template as written in configuration, before defaults are applied. */
export interface FormTemplateInput {
  formType: string;
  identificationString: string;
  fields?: Array<Pick<FieldConfig, 'name' | 'label'> & Partial<Omit<FieldConfig, 'name' | 'label'>>>;
  checkboxes?: Array<Pick<CheckboxConfig, 'name' | 'label'> & Partial<Omit<CheckboxConfig, 'name' | 'label'>>>;
}

export const SCHEMA_FILES = {
  formTemplate: 'form_template.schema.json',
  labelDictionary: 'label_dictionary.schema.json',
  extractionRecords: 'extraction_records.schema.json',
} as const;

// Ajv caches compiled validators by schema object, so each schema is loaded once
const schemaCache = new Map<string, SchemaObject>();

function loadSchema(schemaName: string): SchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) return cached;

  // Try multiple paths for schema resolution
  const possiblePaths = [
    // Relative to shared package in development
    path.join(__dirname, '../../../docs/contracts', schemaName),
    // Relative to shared package dist
    path.join(__dirname, '../../../../docs/contracts', schemaName),
    // Relative to project root (for Docker containers)
    path.join(process.cwd(), 'docs/contracts', schemaName),
    `/app/docs/contracts/${schemaName}`,
  ];

  const schemaPath = possiblePaths.find((candidate) => fs.existsSync(candidate));
  if (!schemaPath) {
    throw new Error(`Schema file not found: ${schemaName}`);
  }

  const schema: SchemaObject = JSON.parse(fs.readFileSync(schemaPath, 'utf-8'));
  schemaCache.set(schemaName, schema);
  return schema;
}

function compiled<T>(schemaName: string): ValidateFunction<T> {
  return ajv.compile<T>(loadSchema(schemaName));
}

export type Validated<T> = { valid: true; value: T } | { valid: false; errors: string[] };

function validateWith<T>(schemaName: string, subject: string, data: unknown): Validated<T> {
  const validate = compiled<T>(schemaName);
  if (validate(data)) {
    return { valid: true, value: data };
  }

  const errors = (validate.errors ?? []).map((e) => `${e.instancePath || '/'}: ${e.message}`);
  logger.warn(`${subject} validation failed`, { errors });
  return { valid: false, errors };
}

/**
 * Validate form template configuration against form_template.schema.json
 */
export function validateFormTemplate(data: unknown): Validated<FormTemplateInput> {
  return validateWith<FormTemplateInput>(SCHEMA_FILES.formTemplate, 'FormTemplate', data);
}

/**
 * Validate label dictionary data against label_dictionary.schema.json
 */
export function validateLabelDictionary(data: unknown): Validated<LabelDictionary> {
  return validateWith<LabelDictionary>(SCHEMA_FILES.labelDictionary, 'LabelDictionary', data);
}

/**
 * Validate a list of extraction records before they are handed to persistence
 */
export function validateExtractionRecords(data: unknown): Validated<ExtractionRecord[]> {
  return validateWith<ExtractionRecord[]>(SCHEMA_FILES.extractionRecords, 'ExtractionRecords', data);
}

export const schemas = {
  get formTemplate() {
    return loadSchema(SCHEMA_FILES.formTemplate);
  },
  get labelDictionary() {
    return loadSchema(SCHEMA_FILES.labelDictionary);
  },
  get extractionRecords() {
    return loadSchema(SCHEMA_FILES.extractionRecords);
  },
};
