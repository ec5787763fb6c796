/**
 * Minimal pdfjs-dist surface types.
 *
 * The adapter only relies on these shapes, so real PDFPageProxy objects and
 * hand-built fakes in tests are both accepted. Item and argument payloads are
 * `unknown` and narrowed where they are read.
 */

export interface PdfTextContentLike {
  items: unknown[];
  styles?: unknown;
}

export interface PdfOperatorListLike {
  fnArray: number[];
  argsArray: unknown[];
}

export interface PdfPageLike {
  getViewport(params: { scale: number }): { width: number; height: number };
  getTextContent(): Promise<PdfTextContentLike>;
  getOperatorList(): Promise<PdfOperatorListLike>;
  getAnnotations(params?: { intent?: string }): Promise<unknown[]>;
}

export interface PdfDocumentLike {
  numPages: number;
  getPage(pageNumber: number): Promise<PdfPageLike>;
  destroy(): Promise<void>;
}
