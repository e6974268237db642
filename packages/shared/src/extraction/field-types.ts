/**
 * Field Type Patterns
 *
 * One value pattern and one validator per declared field type. Template
 * fields carry their type in configuration; nothing here guesses a type
 * from a field's name.
 */

import type { FieldType } from '../types';

export const FIELD_TYPES: readonly FieldType[] = [
  'text',
  'name',
  'date',
  'id',
  'email',
  'money',
  'education',
  'nationality',
  'count',
  'phone',
] as const;

interface FieldTypeRule {
  /** Finds the first value of this type inside longer text. */
  pattern: RegExp;
  /** Accepts a whole value. */
  validate: (value: string) => boolean;
}

function anchored(body: string, flags: string): RegExp {
  return new RegExp(`^(?:${body})$`, flags);
}

function ruleFor(body: string, flags = 'u', extra?: (value: string) => boolean): FieldTypeRule {
  const whole = anchored(body, flags);
  return {
    pattern: new RegExp(body, flags),
    validate: (value) => whole.test(value) && (extra ? extra(value) : true),
  };
}

/**
 * Capitalized words: "John Smith", "O'Brien", "SMITH"
 */
const NAME_BODY = String.raw`\p{Lu}[\p{L}'.-]*(?:\s+\p{Lu}[\p{L}'.-]*)*`;

/**
 * 01/02/1990, 1.2.90, 01-02-1990, 1990-02-01
 */
const DATE_BODY = String.raw`\d{1,2}[/.-]\d{1,2}[/.-](?:\d{4}|\d{2})|\d{4}-\d{2}-\d{2}`;

/**
 * Passport, licence and reference numbers: letters and digits, at least one digit
 */
const ID_BODY = String.raw`[A-Za-z]*\d[A-Za-z0-9-]{3,}`;

const EMAIL_BODY = String.raw`[\w.+-]+@[\w-]+(?:\.[\w-]+)+`;

/**
 * $1,250.00, 1250, $ 80.50
 */
const MONEY_BODY = String.raw`\$?\s?(?:\d{1,3}(?:,\d{3})+|\d+)(?:\.\d{2})?`;

const EDUCATION_BODY = String.raw`(?:Bachelor'?s?|Master'?s?|Doctorate|PhD|Degree|Diploma|Certificate|High School|Secondary|Primary)(?:\s+(?:of|in)\s+[\p{L}]+(?:\s+[\p{L}]+)*)?`;

const NATIONALITY_BODY = String.raw`\p{Lu}\p{Ll}+(?:\s+\p{Lu}\p{Ll}+)*`;

const COUNT_BODY = String.raw`\d{1,3}`;

/**
 * +44 20 7946 0000, 555-1234, 0412 345 678
 */
const PHONE_BODY = String.raw`\+?\d[\d\s-]{5,}\d`;

const RULES: Record<FieldType, FieldTypeRule> = {
  text: {
    pattern: /[\p{L}\p{N}].*/u,
    validate: (value) => /[\p{L}\p{N}]/u.test(value),
  },
  name: ruleFor(NAME_BODY),
  date: ruleFor(DATE_BODY),
  id: ruleFor(ID_BODY),
  email: ruleFor(EMAIL_BODY),
  money: ruleFor(MONEY_BODY, 'u', (value) => /\d/.test(value)),
  education: ruleFor(EDUCATION_BODY, 'iu'),
  nationality: ruleFor(NATIONALITY_BODY),
  count: ruleFor(COUNT_BODY),
  phone: ruleFor(PHONE_BODY, 'u', (value) => value.replace(/\D/g, '').length >= 7),
};

export function isFieldType(value: string): value is FieldType {
  return FIELD_TYPES.some((type) => type === value);
}

export function isValidFieldValue(type: FieldType, value: string): boolean {
  return RULES[type].validate(value.trim());
}

/**
 * First value of `type` found inside `text`, or null.
 */
export function findTypedValue(type: FieldType, text: string): string | null {
  const match = text.match(RULES[type].pattern);
  if (!match) return null;
  const found = match[0].trim();
  return isValidFieldValue(type, found) ? found : null;
}

export interface TypedValue {
  value: string;
  valid: boolean;
}

/**
 * Keep a valid value as it is; otherwise narrow it to the first typed value
 * inside it. When nothing inside qualifies the original is returned unchanged
 * and marked invalid.
 */
export function refineTypedValue(type: FieldType, value: string): TypedValue {
  if (!value || isValidFieldValue(type, value)) {
    return { value, valid: true };
  }
  const found = findTypedValue(type, value);
  return found ? { value: found, valid: true } : { value, valid: false };
}
