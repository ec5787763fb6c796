/**
 * PdfLoader — run the clustering pipeline on PDF files.
 *
 * Uses the legacy pdfjs-dist build, which runs under Node without a DOM.
 * Page numbers are 0-based.
 */

import { readFile } from 'node:fs/promises';
import { getDocument } from 'pdfjs-dist/legacy/build/pdf.mjs';

import type { ClusteringOverrides } from '../clustering/config';
import { EmptyPageError, PdfLoadError } from '../clustering/errors';
import { clusterPage } from '../clustering/TextClusterer';
import type { Block } from '../clustering/types';
import { extractPageFeed } from './PdfPageFeed';
import type { PdfDocumentLike } from './types';

/** File path, or the raw PDF bytes */
export type PdfSource = string | Uint8Array;

/** Base options spread into every getDocument() call. */
export const PDFJS_DOCUMENT_OPTIONS = {
  isEvalSupported: false,
  disableFontFace: true,
  useSystemFonts: false,
  verbosity: 0,
} as const;

export async function loadPdfDocument(source: PdfSource): Promise<PdfDocumentLike> {
  const bytes = typeof source === 'string' ? new Uint8Array(await readFile(source)) : source;
  // pdfjs may transfer (detach) the buffer it is given, so hand it a copy
  return getDocument({ ...PDFJS_DOCUMENT_OPTIONS, data: bytes.slice() }).promise;
}

async function withDocument<T>(source: PdfSource, fn: (doc: PdfDocumentLike) => Promise<T>): Promise<T> {
  const doc = await loadPdfDocument(source);
  try {
    if (doc.numPages === 0) {
      throw new PdfLoadError('EMPTY_DOCUMENT', 'Empty or missing PDF: document has no pages.');
    }
    return await fn(doc);
  } finally {
    await doc.destroy();
  }
}

/** Cluster a single page. Throws EmptyPageError when the page has no text. */
export async function clusterPdfPage(
  source: PdfSource,
  pageNumber = 0,
  overrides?: ClusteringOverrides,
): Promise<Block[]> {
  return withDocument(source, async doc => {
    if (!Number.isInteger(pageNumber) || pageNumber < 0 || pageNumber >= doc.numPages) {
      throw new PdfLoadError(
        'PAGE_OUT_OF_RANGE',
        `Page ${pageNumber} is out of range (document has ${doc.numPages} pages).`,
        { pageNumber, numPages: doc.numPages },
      );
    }
    const page = await doc.getPage(pageNumber + 1);
    return clusterPage(await extractPageFeed(page), overrides);
  });
}

/**
 * Cluster every page in order. Pages without text yield an empty block
 * list instead of failing the whole document.
 */
export async function clusterPdfDocument(
  source: PdfSource,
  overrides?: ClusteringOverrides,
): Promise<Block[][]> {
  return withDocument(source, async doc => {
    const pages: Block[][] = [];
    for (let pageNumber = 1; pageNumber <= doc.numPages; pageNumber++) {
      const feed = await extractPageFeed(await doc.getPage(pageNumber));
      try {
        pages.push(clusterPage(feed, overrides));
      } catch (err) {
        if (!(err instanceof EmptyPageError)) throw err;
        if (overrides?.debug) {
          console.log(`[PdfLoader] Page ${pageNumber - 1} has no text spans`);
        }
        pages.push([]);
      }
    }
    return pages;
  });
}
