/**
 * Label Dictionary Tests
 */

import {
  TemplateValidationError,
  getLabelDictionary,
  parseLabelDictionary,
  setLabelDictionary,
} from '@formsift/shared';

describe('Label dictionary', () => {
  afterEach(() => {
    setLabelDictionary(null);
  });

  it('should load the bundled dictionary', () => {
    const dictionary = getLabelDictionary();

    expect(dictionary.compoundLabels).toContain('Date of Birth');
    expect(dictionary.standaloneLabels).toContain('Surname');
    expect(dictionary.checkboxGroups.map((g) => g.name)).toContain('Gender');
  });

  it('should use a dictionary set at run time until it is cleared', () => {
    const custom = parseLabelDictionary({
      compoundLabels: ['Policy Number'],
      standaloneLabels: ['Insurer'],
      checkboxGroups: [],
    });

    setLabelDictionary(custom);
    expect(getLabelDictionary()).toBe(custom);

    setLabelDictionary(null);
    expect(getLabelDictionary().compoundLabels).toContain('Date of Birth');
  });

  it('should reject data that is not a dictionary', () => {
    expect(() => parseLabelDictionary({ compoundLabels: 'Date of Birth' })).toThrow(TemplateValidationError);
  });
});
