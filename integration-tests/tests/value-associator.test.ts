/**
 * Value Associator Tests
 */

import {
  LabelMatcher,
  PageLayout,
  associateValue,
  colonLabelAt,
  labelBoundary,
  phraseLabelAt,
  searchRegions,
  toTokens,
  type ConsumedPredicate,
  type LabelMatch,
  type ValueSearch,
  type WordBox,
} from '@formsift/shared';
import { line, settings, word } from './fixtures';

function searchOver(words: WordBox[], boundaryLabels: string[] = [], isConsumed: ConsumedPredicate = () => false): ValueSearch {
  const layout = new PageLayout(toTokens(words, 0), 4);
  return {
    layout,
    settings: settings(),
    boundary: labelBoundary(new LabelMatcher(boundaryLabels, { caseSensitive: false })),
    isConsumed,
  };
}

function colonLabel(search: ValueSearch, lineIndex: number, pos: number): LabelMatch {
  const label = colonLabelAt(search.layout, lineIndex, pos, 6);
  if (!label) throw new Error(`no colon label at ${lineIndex}:${pos}`);
  return label;
}

describe('searchRegions', () => {
  it('should place the same-line band right of the label and the next-line band below it', () => {
    const regions = searchRegions({ x0: 10, y0: 90, x1: 40, y1: 100 }, settings());

    expect(regions.sameLine).toEqual({ x0: 40, y0: 92, x1: 340, y1: 98 });
    expect(regions.nextLine).toEqual({ x0: -10, y0: 100, x1: 60, y1: 120 });
  });
});

describe('associateValue', () => {
  it('should stop a value at the next colon label', () => {
    const search = searchOver(line(100, 10, 'Name:', 'John', 'DOB:', '1990'));
    const value = associateValue(search, colonLabel(search, 0, 0));

    expect(value.text).toBe('John');
    expect(value.tokenIndices).toEqual([1]);
    expect(value.rect).toEqual({ x0: 44, y0: 90, x1: 68, y1: 100 });
  });

  it('should extend over tightly spaced words', () => {
    const search = searchOver(line(100, 10, 'Address:', '12', 'High', 'Street'));
    const value = associateValue(search, colonLabel(search, 0, 0));

    expect(value.text).toBe('12 High Street');
    expect(value.tokenIndices).toEqual([1, 2, 3]);
  });

  it('should stop at a wide gap', () => {
    const words = [...line(100, 10, 'Name:', 'John'), word('Office', 200, 100)];
    const search = searchOver(words);
    const value = associateValue(search, colonLabel(search, 0, 0));

    expect(value.text).toBe('John');
  });

  it('should stop at a known dictionary label', () => {
    const search = searchOver(line(100, 10, 'Name:', 'John', 'Surname', 'Smith'), ['Surname']);
    const value = associateValue(search, colonLabel(search, 0, 0));

    expect(value.text).toBe('John');
  });

  it('should fall back to the line below when the label line is empty', () => {
    const words = [...line(100, 10, 'Employer:'), ...line(118, 12, 'Acme', 'Ltd')];
    const search = searchOver(words);
    const value = associateValue(search, colonLabel(search, 0, 0));

    expect(value.text).toBe('Acme Ltd');
    expect(value.rect).toEqual({ x0: 12, y0: 108, x1: 58, y1: 118 });
  });

  it('should not take the same-line value of a label on the line below', () => {
    const words = [...line(10, 0, 'Surname:'), ...line(24, 0, 'DOB:', '01/02/1990')];
    const search = searchOver(words);

    expect(associateValue(search, colonLabel(search, 0, 0))).toEqual({
      text: '',
      rect: { x0: 0, y0: 0, x1: 48, y1: 10 },
      tokenIndices: [],
    });
    expect(associateValue(search, colonLabel(search, 1, 0)).text).toBe('01/02/1990');
  });

  it('should never take consumed tokens or checkbox markers', () => {
    const words = line(100, 10, 'Smoker:', 'X', 'No');
    const search = searchOver(words, [], (i) => i === 2);
    const value = associateValue(search, colonLabel(search, 0, 0));

    expect(value.text).toBe('');
    expect(value.tokenIndices).toEqual([]);
    expect(value.rect).toEqual({ x0: 10, y0: 90, x1: 52, y1: 100 });
  });

  it('should value a phrase label from the tokens after it', () => {
    const search = searchOver(line(100, 10, 'Date', 'of', 'Birth', '01/02/1990'));
    const label = phraseLabelAt(search.layout, 0, 0, new LabelMatcher(['Date of Birth'], { caseSensitive: false }));
    if (!label) throw new Error('label not found');

    expect(associateValue(search, label).text).toBe('01/02/1990');
  });
});
