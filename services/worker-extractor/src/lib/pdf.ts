/**
 * PDF Document Adapter
 *
 * Opens a PDF with pdfjs-dist and captures every page's words, drawn
 * rectangles, ruled tables and form widgets into a StaticDocument. The
 * pdfjs handle is released as soon as the snapshot is taken.
 */

import fs from 'fs';
import path from 'path';
import * as pdfjsLib from 'pdfjs-dist';
import { logger, config, StaticDocument, StaticPage, type PageSnapshot } from '@formsift/shared';
import { runsToWords, type PageView } from './words';
import { collectRectangles } from './shapes';
import { detectTables } from './grid';
import { toWidgets } from './widgets';

// Configure worker for Node.js environment
const workerPath = path.join(path.dirname(require.resolve('pdfjs-dist/package.json')), 'build/pdf.worker.js');
pdfjsLib.GlobalWorkerOptions.workerSrc = workerPath;

function pageView(view: number[]): PageView {
  const [x0 = 0, y0 = 0, x1 = 0, y1 = 0] = view;
  return [x0, y0, x1, y1];
}

async function snapshotPage(pdf: pdfjsLib.PDFDocumentProxy, pageNum: number): Promise<PageSnapshot> {
  const page = await pdf.getPage(pageNum);
  const view = pageView(page.view);

  const [textContent, annotations, operators] = await Promise.all([
    page.getTextContent(),
    page.getAnnotations({ intent: 'display' }),
    page.getOperatorList(),
  ]);

  const words = runsToWords(textContent.items, view);
  const shapes = collectRectangles(operators.fnArray, operators.argsArray, pdfjsLib.OPS, view);
  const widgets = toWidgets(annotations, view);
  const tables = detectTables(shapes, words);

  page.cleanup();

  return {
    pageNumber: pageNum - 1,
    words,
    shapes,
    tables,
    widgets,
    lineBucket: config.lineBucket,
  };
}

/**
 * Open a PDF and snapshot all of its pages.
 */
export async function openPdf(filePath: string): Promise<StaticDocument> {
  logger.info('Opening PDF', { filePath });

  const data = new Uint8Array(await fs.promises.readFile(filePath));
  const pdf = await pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;

  try {
    const snapshots: PageSnapshot[] = [];
    for (let pageNum = 1; pageNum <= pdf.numPages; pageNum++) {
      snapshots.push(await snapshotPage(pdf, pageNum));
    }

    logger.info('PDF snapshot complete', {
      filePath,
      totalPages: pdf.numPages,
      totalWords: snapshots.reduce((n, s) => n + s.words.length, 0),
    });

    return new StaticDocument(snapshots.map((s) => new StaticPage(s)));
  } finally {
    await pdf.destroy();
  }
}
