/**
 * Unit Tests: PDF loader
 *
 * pdfjs-dist is replaced by an in-memory document so no real PDF is parsed.
 */
import { beforeEach, describe, test, expect, vi } from 'vitest';
import { clusterPdfDocument, clusterPdfPage } from '../PdfLoader';
import { EmptyPageError, PdfLoadError } from '../../clustering/errors';
import type { PdfDocumentLike, PdfPageLike } from '../types';

interface GetDocumentParams {
  data: Uint8Array;
  isEvalSupported: boolean;
}

const pdfjs = vi.hoisted(() => ({
  pages: [] as Array<Array<{ str: string; x: number; y: number }>>,
  destroy: vi.fn(async () => {}),
  getDocument: vi.fn<[GetDocumentParams], { promise: Promise<PdfDocumentLike> }>(),
}));

vi.mock('pdfjs-dist/legacy/build/pdf.mjs', () => ({ getDocument: pdfjs.getDocument }));

function makePage(items: Array<{ str: string; x: number; y: number }>): PdfPageLike {
  return {
    getViewport: () => ({ width: 612, height: 792 }),
    getTextContent: async () => ({
      items: items.map(({ str, x, y }) => ({ str, transform: [10, 0, 0, 10, x, y], width: 50, height: 10, fontName: 'f1' })),
    }),
    getOperatorList: async () => ({ fnArray: [], argsArray: [] }),
    getAnnotations: async () => [],
  };
}

function makeDocument(): PdfDocumentLike {
  return {
    numPages: pdfjs.pages.length,
    getPage: async (pageNumber: number) => makePage(pdfjs.pages[pageNumber - 1]),
    destroy: pdfjs.destroy,
  };
}

const PDF_BYTES = new Uint8Array([0x25, 0x50, 0x44, 0x46]);

beforeEach(() => {
  pdfjs.pages = [];
  pdfjs.destroy.mockClear();
  pdfjs.getDocument.mockReset();
  pdfjs.getDocument.mockImplementation(() => ({ promise: Promise.resolve(makeDocument()) }));
});

describe('clusterPdfPage', () => {
  test('clusters the requested 0-based page', async () => {
    pdfjs.pages = [
      [{ str: 'Cover', x: 100, y: 700 }],
      [{ str: 'Second page', x: 100, y: 700 }],
    ];

    const blocks = await clusterPdfPage(PDF_BYTES, 1);

    expect(blocks.map(b => b.text)).toEqual(['Second page']);
    expect(pdfjs.destroy).toHaveBeenCalledTimes(1);
  });

  test('passes a copy of the bytes to pdfjs', async () => {
    pdfjs.pages = [[{ str: 'Cover', x: 100, y: 700 }]];

    await clusterPdfPage(PDF_BYTES);

    const [params] = pdfjs.getDocument.mock.calls[0];
    expect(params.data).toEqual(PDF_BYTES);
    expect(params.data).not.toBe(PDF_BYTES);
    expect(params.isEvalSupported).toBe(false);
  });

  test('rejects a page number past the end', async () => {
    pdfjs.pages = [[{ str: 'Cover', x: 100, y: 700 }]];

    const result = clusterPdfPage(PDF_BYTES, 1);

    await expect(result).rejects.toBeInstanceOf(PdfLoadError);
    await expect(result).rejects.toMatchObject({ code: 'PAGE_OUT_OF_RANGE' });
    expect(pdfjs.destroy).toHaveBeenCalledTimes(1);
  });

  test('rejects a document without pages', async () => {
    await expect(clusterPdfPage(PDF_BYTES)).rejects.toMatchObject({ code: 'EMPTY_DOCUMENT' });
  });

  test('a page without text rejects with EmptyPageError', async () => {
    pdfjs.pages = [[]];
    await expect(clusterPdfPage(PDF_BYTES)).rejects.toBeInstanceOf(EmptyPageError);
  });
});

describe('clusterPdfDocument', () => {
  test('returns one block list per page, empty for pages without text', async () => {
    pdfjs.pages = [
      [{ str: 'Cover', x: 100, y: 700 }],
      [],
      [{ str: 'Appendix', x: 100, y: 700 }, { str: 'Footnote', x: 100, y: 60 }],
    ];

    const pages = await clusterPdfDocument(PDF_BYTES);

    expect(pages.map(blocks => blocks.map(b => b.text))).toEqual([['Cover'], [], ['Appendix', 'Footnote']]);
    expect(pdfjs.destroy).toHaveBeenCalledTimes(1);
  });
});
