/**
 * Text Normalization
 *
 * Cleans raw token text into canonical keys and values. Form-fill artifacts
 * (runs of underscores or dots left where a value was meant to be written)
 * and bracket noise are removed. Every function here is idempotent.
 */

const KEY_FILL_RUN = /[_.]{3,}/g;
const VALUE_FILL_RUN = /[_.]{2,}/g;
const VALUE_NOISE = /[()[\]|:]/g;
const TRAILING_COLON = /\s*:[\s:]*$/;
const LETTER_RUN = /[\p{L}\p{M}]+/gu;
const FILL_ONLY = /^[\s_.]*$/;

export interface CleanKeyOptions {
  /**
   * Title-case the key and treat single underscores as spaces.
   * Used for dynamically detected keys, never for config-declared names.
   */
  titleCase?: boolean;
}

function collapseWhitespace(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

/**
 * Compatibility-fold pdf text so ligatures such as "\uFB01" read as their letters.
 */
function fold(text: string): string {
  return text.normalize('NFKC');
}

// A first letter whose upper case spans several characters ("\u00DF" -> "SS") keeps its form.
function capitalize(word: string): string {
  const [first = '', ...rest] = Array.from(word);
  const upper = first.toUpperCase();
  const head = Array.from(upper).length === 1 ? upper : first;
  return head + rest.join('').toLowerCase();
}

function toTitleCase(text: string): string {
  return text.replace(LETTER_RUN, capitalize);
}

/**
 * Clean a label into a key: "Date of Birth: ____" -> "Date of Birth".
 */
export function cleanKey(text: string, options: CleanKeyOptions = {}): string {
  if (!text) return '';

  let cleaned = fold(text).replace(KEY_FILL_RUN, ' ');
  if (options.titleCase) {
    cleaned = toTitleCase(cleaned.replace(/_/g, ' '));
  }
  cleaned = collapseWhitespace(fold(cleaned)).replace(TRAILING_COLON, '');
  return cleaned.trim();
}

/**
 * Clean a raw value: "(  John__Smith ) |" -> "John Smith".
 *
 * Single letters are kept: "M", "F" or a middle initial are real answers.
 */
export function cleanValue(text: string): string {
  if (!text) return '';

  const cleaned = fold(text).replace(VALUE_NOISE, '').replace(VALUE_FILL_RUN, ' ');
  return collapseWhitespace(fold(cleaned));
}

/** True for text made only of underscores, dots and whitespace. */
export function isFillArtifact(text: string): boolean {
  return FILL_ONLY.test(text);
}
