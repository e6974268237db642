/**
 * PDF Layout Helper Tests
 *
 * Conversion of pdfjs output (text runs, operator lists, annotations) into
 * page primitives. pdfjs itself is not loaded here.
 */

import { isTextRun, runToWords, runsToWords, type PageView } from '../../services/worker-extractor/src/lib/words';
import { collectRectangles, type PathOpCodes } from '../../services/worker-extractor/src/lib/shapes';
import { detectTables } from '../../services/worker-extractor/src/lib/grid';
import { toWidget, toWidgets } from '../../services/worker-extractor/src/lib/widgets';
import { box, word } from './fixtures';

const LETTER: PageView = [0, 0, 612, 792];

describe('runToWords', () => {
  it('should split a run into words in top-left coordinates', () => {
    const words = runToWords({ str: 'Jane Smith', transform: [10, 0, 0, 10, 100, 700], width: 60, height: 10 }, LETTER);

    expect(words).toEqual([
      { text: 'Jane', x0: 100, y0: 82, x1: 124, y1: 92 },
      { text: 'Smith', x0: 130, y0: 82, x1: 160, y1: 92 },
    ]);
  });

  it('should fall back to the transform scale for zero-height runs', () => {
    const [w] = runToWords({ str: 'X', transform: [12, 0, 0, 12, 0, 692], width: 6, height: 0 }, LETTER);
    expect(w.y0).toBe(88);
    expect(w.y1).toBe(100);
  });

  it('should skip marked content and blank runs', () => {
    const items = [
      { type: 'beginMarkedContent' },
      { str: '   ', transform: [1, 0, 0, 1, 0, 0], width: 3, height: 1 },
      { str: 'Tel', transform: [1, 0, 0, 1, 10, 692], width: 18, height: 10 },
    ];

    expect(isTextRun(items[0])).toBe(false);
    expect(runsToWords(items, LETTER).map((w) => w.text)).toEqual(['Tel']);
  });
});

describe('collectRectangles', () => {
  const ops: PathOpCodes = {
    save: 10,
    restore: 11,
    transform: 12,
    constructPath: 91,
    moveTo: 13,
    lineTo: 14,
    curveTo: 15,
    curveTo2: 16,
    curveTo3: 17,
    closePath: 18,
    rectangle: 19,
  };
  const view: PageView = [0, 0, 600, 800];

  it('should flip explicit rectangles into top-left coordinates', () => {
    const rects = collectRectangles([91], [[[19], [10, 20, 30, 40]]], ops, view);
    expect(rects).toEqual([{ x0: 10, y0: 740, x1: 40, y1: 780 }]);
  });

  it('should apply the current transform until it is restored', () => {
    const rects = collectRectangles(
      [10, 12, 91, 11, 91],
      [null, [1, 0, 0, 1, 100, 0], [[19], [0, 0, 10, 10]], null, [[19], [0, 0, 10, 10]]],
      ops,
      view
    );

    expect(rects).toEqual([
      { x0: 100, y0: 790, x1: 110, y1: 800 },
      { x0: 0, y0: 790, x1: 10, y1: 800 },
    ]);
  });

  it('should keep closed four-corner paths and drop other shapes', () => {
    const rects = collectRectangles(
      [91, 91],
      [
        [
          [13, 14, 14, 14, 18],
          [0, 0, 20, 0, 20, 20, 0, 20],
        ],
        [
          [13, 14, 14, 18],
          [0, 0, 20, 0, 10, 10],
        ],
      ],
      ops,
      view
    );

    expect(rects).toEqual([{ x0: 0, y0: 780, x1: 20, y1: 800 }]);
  });
});

describe('detectTables', () => {
  const cells = [box(0, 100, 50, 120), box(50, 100, 120, 120), box(0, 120, 50, 140), box(50, 120, 120, 140)];

  it('should build a grid from touching rows of cells', () => {
    const words = [word('Item', 5, 115), word('Cost', 55, 115), word('Rent', 5, 135)];

    const [table, ...rest] = detectTables([...cells, box(0, 100, 50, 120), box(300, 300, 310, 305)], words);

    expect(rest).toEqual([]);
    expect(table.rows).toEqual([
      ['Item', 'Cost'],
      ['Rent', null],
    ]);
    expect(table.cells?.[1]?.[1]).toEqual({ x0: 50, y0: 120, x1: 120, y1: 140 });
  });

  it('should need at least two rows', () => {
    expect(detectTables(cells.slice(0, 2), [])).toEqual([]);
  });
});

describe('toWidget', () => {
  it('should read a text field in top-left coordinates', () => {
    const widget = toWidget(
      { subtype: 'Widget', fieldType: 'Tx', fieldName: 'first_name', fieldValue: 'Jane', rect: [100, 700, 200, 720] },
      LETTER
    );

    expect(widget).toEqual({
      fieldName: 'first_name',
      fieldType: 'text',
      fieldValue: 'Jane',
      rect: { x0: 100, y0: 72, x1: 200, y1: 92 },
    });
  });

  it('should treat a radio button as off unless the group value is its own', () => {
    const radio = (buttonValue: string) =>
      toWidget(
        {
          subtype: 'Widget',
          fieldType: 'Btn',
          radioButton: true,
          fieldName: 'tenure',
          fieldValue: 'Owner',
          buttonValue,
          rect: [0, 0, 10, 10],
        },
        LETTER
      );

    expect(radio('Owner')?.fieldValue).toBe('Owner');
    expect(radio('Tenant')?.fieldValue).toBe('Off');
  });

  it('should map choice fields and skip annotations without form data', () => {
    const widgets = toWidgets(
      [
        { subtype: 'Widget', fieldType: 'Ch', combo: true, fieldName: 'c', fieldValue: ['A', 'B'], rect: [0, 0, 1, 1] },
        { subtype: 'Widget', fieldType: 'Btn', pushButton: true, fieldName: 'p', rect: [0, 0, 1, 1] },
        { subtype: 'Link', rect: [0, 0, 1, 1] },
        { subtype: 'Widget', fieldType: 'Btn', fieldName: 'agree', fieldValue: 'Yes', rect: [0, 0, 1, 1] },
      ],
      LETTER
    );

    expect(widgets.map((w) => [w.fieldName, w.fieldType, w.fieldValue])).toEqual([
      ['c', 'combo', 'A, B'],
      ['agree', 'checkbox', 'Yes'],
    ]);
  });
});
