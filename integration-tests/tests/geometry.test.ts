/**
 * Geometry Tests
 */

import {
  centroid,
  contains,
  expand,
  formatRect,
  intersects,
  isEmptyRect,
  parseRect,
  union,
  unionAll,
} from '@formsift/shared';
import { box } from './fixtures';

describe('Geometry', () => {
  it('should not count shared edges as intersection', () => {
    expect(intersects(box(0, 0, 10, 10), box(10, 0, 20, 10))).toBe(false);
    expect(intersects(box(0, 0, 10, 10), box(9, 9, 20, 20))).toBe(true);
  });

  it('should compute centroids, unions and containment', () => {
    expect(centroid(box(0, 0, 10, 20))).toEqual({ x: 5, y: 10 });
    expect(union(box(0, 5, 10, 10), box(5, 0, 20, 8))).toEqual(box(0, 0, 20, 10));
    expect(unionAll([])).toBeNull();
    expect(contains(box(0, 0, 10, 10), box(2, 2, 8, 8))).toBe(true);
    expect(contains(box(0, 0, 10, 10), box(2, 2, 12, 8))).toBe(false);
  });

  it('should expand on every side', () => {
    expect(expand(box(10, 10, 20, 20), 5)).toEqual(box(5, 5, 25, 25));
    expect(expand(box(10, 10, 20, 20), 5, 1)).toEqual(box(5, 9, 25, 21));
  });

  it('should treat zero and negative area as empty', () => {
    expect(isEmptyRect(box(0, 0, 0, 10))).toBe(true);
    expect(isEmptyRect(box(5, 5, 1, 10))).toBe(true);
    expect(isEmptyRect(box(0, 0, 1, 1))).toBe(false);
  });
});

describe('Stored coordinates', () => {
  it('should format with one decimal', () => {
    expect(formatRect(box(10, 20.24, 30.5, 40))).toBe('10.0,20.2,30.5,40.0');
  });

  it('should format a missing rectangle as all zeros', () => {
    expect(formatRect(undefined)).toBe('0,0,0,0');
  });

  it('should parse well-formed coordinates', () => {
    expect(parseRect('10,20,30,40')).toEqual(box(10, 20, 30, 40));
    expect(parseRect(' 1 , 2 , 3 , 4 ')).toEqual(box(1, 2, 3, 4));
  });

  it('should reject malformed or empty coordinates', () => {
    expect(parseRect('0,0,0,0')).toBeNull();
    expect(parseRect('1,2,3')).toBeNull();
    expect(parseRect('a,b,c,d')).toBeNull();
    expect(parseRect('1,,3,4')).toBeNull();
    expect(parseRect('5,5,1,1')).toBeNull();
    expect(parseRect(null)).toBeNull();
  });
});
