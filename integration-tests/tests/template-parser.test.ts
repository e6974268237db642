/**
 * Template Line Parser Tests
 */

import { parseTemplatePage, toTokens } from '@formsift/shared';
import { field, line, settings, word } from './fixtures';

describe('TemplateLineParser', () => {
  const words = [
    ...line(100, 10, 'Surname', 'Smith'),
    ...line(120, 10, 'Tel', '555-0100'),
    ...line(140, 10, 'Tel', 'No.', '555-0199'),
  ];

  it('should match declared labels longest first', () => {
    const fields = [
      field('Telephone', 'Tel'),
      field('Telephone Number', 'Tel No.'),
      field('Applicant Surname', 'Surname'),
    ];

    const matches = parseTemplatePage(toTokens(words, 0), fields, settings());
    expect(matches.map((m) => [m.field.name, m.value])).toEqual([
      ['Applicant Surname', 'Smith'],
      ['Telephone', '555-0100'],
      ['Telephone Number', '555-0199'],
    ]);
  });

  it('should give the same result on every run', () => {
    const fields = [field('Telephone', 'Tel'), field('Telephone Number', 'Tel No.')];
    const tokens = toTokens(words, 0);

    expect(parseTemplatePage(tokens, fields, settings())).toEqual(parseTemplatePage(tokens, fields, settings()));
  });

  it('should pick the declared occurrence of a repeated label', () => {
    const tokens = toTokens(
      [...line(100, 10, 'Address', '1', 'High', 'St'), ...line(140, 10, 'Address', '2', 'Low', 'Rd')],
      0
    );
    const fields = [
      field('Previous Address', 'Address', { instance: 1 }),
      field('Home Address', 'Address', { instance: 0 }),
    ];

    const matches = parseTemplatePage(tokens, fields, settings());
    expect(matches.map((m) => [m.field.name, m.value])).toEqual([
      ['Home Address', '1 High St'],
      ['Previous Address', '2 Low Rd'],
    ]);
  });

  it('should take the next line when nothing follows the label', () => {
    const tokens = toTokens([...line(100, 10, 'Employer'), ...line(116, 10, 'Acme', 'Ltd')], 0);

    const [match] = parseTemplatePage(tokens, [field('Employer', 'Employer')], settings());
    expect(match.value).toBe('Acme Ltd');
    expect(match.rect).toEqual({ x0: 10, y0: 106, x1: 56, y1: 116 });
  });

  it('should not take a next-line token from a distant column', () => {
    const tokens = toTokens([...line(100, 10, 'Surname'), word('Approved', 500, 116)], 0);

    expect(parseTemplatePage(tokens, [field('Applicant Surname', 'Surname')], settings())).toEqual([]);
  });

  it('should stop a value at another declared label', () => {
    const tokens = toTokens(line(100, 10, 'Surname', 'Smith', 'Forename', 'Jo'), 0);
    const fields = [field('Surname', 'Surname'), field('Forename', 'Forename')];

    expect(parseTemplatePage(tokens, fields, settings()).map((m) => m.value)).toEqual(['Smith', 'Jo']);
  });

  it('should record an empty value only when allowed', () => {
    const tokens = toTokens([...line(100, 10, 'Middle'), ...line(200, 10, 'Nickname')], 0);
    const fields = [field('Middle Name', 'Middle', { allowEmpty: true }), field('Nickname', 'Nickname')];

    const matches = parseTemplatePage(tokens, fields, settings());
    expect(matches).toHaveLength(1);
    expect(matches[0].field.name).toBe('Middle Name');
    expect(matches[0].value).toBe('');
    expect(matches[0].rect).toEqual(matches[0].labelRect);
  });

  it('should ignore labels in other letter case', () => {
    const tokens = toTokens(line(100, 10, 'SURNAME', 'Smith'), 0);
    expect(parseTemplatePage(tokens, [field('Surname', 'Surname')], settings())).toEqual([]);
  });
});

describe('parseTemplatePage', () => {
  it('should read colon-terminated labels and their values line by line', () => {
    const words = [
      { text: 'Surname:', x0: 0, y0: 0, x1: 40, y1: 10 },
      { text: 'Smith', x0: 45, y0: 0, x1: 80, y1: 10 },
      { text: 'DOB:', x0: 0, y0: 20, x1: 30, y1: 30 },
      { text: '01/02/1990', x0: 35, y0: 20, x1: 100, y1: 30 },
    ];

    const matches = parseTemplatePage(toTokens(words, 0), [field('Surname', 'Surname:'), field('DOB', 'DOB:')], settings());
    expect(matches.map((m) => [m.field.name, m.value])).toEqual([
      ['Surname', 'Smith'],
      ['DOB', '01/02/1990'],
    ]);
  });

  it('should not split a longer label with a colon into a shorter one', () => {
    const matches = parseTemplatePage(
      toTokens(line(100, 10, 'Tel', 'No.:', '555-1234'), 0),
      [field('Telephone', 'Tel'), field('Telephone Number', 'Tel No.')],
      settings()
    );

    expect(matches.map((m) => [m.field.name, m.value])).toEqual([['Telephone Number', '555-1234']]);
  });
});
