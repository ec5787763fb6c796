/**
 * PDF Text Blocks
 *
 * Groups the text spans of a PDF page into semantic blocks:
 * - Watermark / page-furniture text filtering
 * - Span adjacency graph and connected-component clustering
 * - Short-fragment merging with script-aware text joining
 * - Signature-line synthesis from drawn rules
 * - pdfjs-dist page feed and file loader
 */

// Types
export type * from './clustering/types';

// Configuration
export {
  DEFAULT_CLUSTERING_CONFIG,
  DEFAULT_UNDERLINE_OPTIONS,
  DEFAULT_WATERMARK_OPTIONS,
  LABEL_VOCABULARIES,
  buildLabelPattern,
  resolveClusteringConfig,
} from './clustering/config';
export type {
  ClusteringConfig,
  ClusteringOverrides,
  LabelLocale,
  UnderlineOptions,
  WatermarkOptions,
} from './clustering/config';

// Errors
export { ClusteringError, EmptyPageError, PdfLoadError } from './clustering/errors';
export type { ClusteringErrorCode } from './clustering/errors';

// Pipeline stages
export { boxesIntersect, toBoundingBox, unionBoxes } from './clustering/BoundingBox';
export { buildWatermarkMask, findWatermarkCandidates, isMaskedSpan } from './clustering/WatermarkDetector';
export { normalizeSpans } from './clustering/SpanFeed';
export { areAdjacent, buildSpanGraph } from './clustering/SpanGraphBuilder';
export type { SpanGraphParams } from './clustering/SpanGraphBuilder';
export { extractClusters } from './clustering/ClusterExtractor';
export { joinText, mergeShortSpans, sortReadingOrder } from './clustering/SpanMerger';
export { assembleBlock } from './clustering/BlockAssembler';
export { collectHorizontalRules, injectMissingUnderlines } from './clustering/UnderlineInjector';
export { clusterPage, clusterSpans } from './clustering/TextClusterer';
export { formatBlockReport, toBoxTuple } from './clustering/BlockReport';

// PDF adapter
export { buildTextColorMap, extractPageFeed, matchTextColor } from './pdf/PdfPageFeed';
export type { TextColorEntry } from './pdf/PdfPageFeed';
export { clusterPdfDocument, clusterPdfPage, loadPdfDocument } from './pdf/PdfLoader';
export type { PdfSource } from './pdf/PdfLoader';
export type { PdfDocumentLike, PdfPageLike } from './pdf/types';
