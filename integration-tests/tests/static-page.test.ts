/**
 * Static Page Tests
 */

import { StaticDocument } from '@formsift/shared';
import { box, line, page } from './fixtures';

describe('StaticPage', () => {
  const p = page([...line(100, 10, 'Date', 'of', 'Birth:', '01/02/1990'), ...line(130, 10, 'Date', 'signed')]);

  it('should find phrases on one line and ignore a trailing colon', () => {
    expect(p.searchText('date of birth')).toEqual([{ x0: 10, y0: 90, x1: 90, y1: 100 }]);
    expect(p.searchText('Date')).toHaveLength(2);
    expect(p.searchText('   ')).toEqual([]);
  });

  it('should read the words inside a region', () => {
    expect(p.textInRegion(box(80, 85, 200, 105))).toBe('01/02/1990');
    expect(p.textInRegion(box(0, 85, 200, 140))).toBe('Date of Birth: 01/02/1990\nDate signed');
  });

  it('should hand out copies of its primitives', () => {
    const words = p.words();
    words[0].text = 'changed';
    expect(p.words()[0].text).toBe('Date');
  });
});

describe('StaticDocument', () => {
  it('should refuse pages out of range or after close', () => {
    const doc = new StaticDocument([page([])]);

    expect(doc.pageCount).toBe(1);
    expect(() => doc.page(1)).toThrow('Page 1 out of range (0-0)');

    doc.close();
    expect(() => doc.page(0)).toThrow('Document is closed');
    expect(() => doc.close()).toThrow('Document is already closed');
  });
});
