/**
 * Label Dictionary
 *
 * Known labels for template-free extraction: multi-word compound labels,
 * bare single-word labels and checkbox option groups. Loaded from
 * data/label-dictionary.json on first use and validated against
 * docs/contracts/label_dictionary.schema.json.
 */

import bundledDictionary from './data/label-dictionary.json';
import type { LabelDictionary } from '../schemas';
import { validateLabelDictionary } from '../schemas';
import { TemplateValidationError } from '../errors';
import { logger } from '../logger';

let activeDictionary: LabelDictionary | null = null;

/**
 * Validate raw dictionary data.
 *
 * @throws TemplateValidationError when the data does not match the schema
 */
export function parseLabelDictionary(data: unknown): LabelDictionary {
  const result = validateLabelDictionary(data);
  if (!result.valid) {
    throw new TemplateValidationError('Label dictionary', result.errors);
  }
  return result.value;
}

export function getLabelDictionary(): LabelDictionary {
  if (!activeDictionary) {
    activeDictionary = parseLabelDictionary(bundledDictionary);
    logger.debug('Loaded label dictionary', {
      compound_labels: activeDictionary.compoundLabels.length,
      standalone_labels: activeDictionary.standaloneLabels.length,
      checkbox_groups: activeDictionary.checkboxGroups.length,
    });
  }
  return activeDictionary;
}

/**
 * Replace the active dictionary. Passing null restores the bundled one.
 */
export function setLabelDictionary(dictionary: LabelDictionary | null): void {
  activeDictionary = dictionary;
}
