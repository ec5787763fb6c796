export type ClusteringErrorCode = 'EMPTY_PAGE' | 'EMPTY_DOCUMENT' | 'PAGE_OUT_OF_RANGE';

export class ClusteringError extends Error {
  constructor(
    public code: ClusteringErrorCode,
    message: string,
    public details?: unknown,
  ) {
    super(message);
    this.name = 'ClusteringError';
  }
}

/** No text spans survived filtering, so the page has nothing to cluster. */
export class EmptyPageError extends ClusteringError {
  constructor(message = 'Empty page: no text spans found.', details?: unknown) {
    super('EMPTY_PAGE', message, details);
    this.name = 'EmptyPageError';
  }
}

export class PdfLoadError extends ClusteringError {
  constructor(code: 'EMPTY_DOCUMENT' | 'PAGE_OUT_OF_RANGE', message: string, details?: unknown) {
    super(code, message, details);
    this.name = 'PdfLoadError';
  }
}
