/**
 * Text Clusterer — page-level clustering pipeline
 *
 *   SpanRecord[] ─ watermark mask ─> Span[] ─> adjacency graph ─> components
 *     ─> reading order + short-span merge ─> Block[] ─> underline injection
 *     ─> final (top, left) sort
 *
 * Synchronous and pure: one call per page, no shared state between calls.
 */

import { compareTopLeft } from './BoundingBox';
import { assembleBlock } from './BlockAssembler';
import { extractClusters } from './ClusterExtractor';
import { resolveClusteringConfig, type ClusteringConfig, type ClusteringOverrides } from './config';
import { EmptyPageError } from './errors';
import { buildSpanGraph } from './SpanGraphBuilder';
import { normalizeSpans } from './SpanFeed';
import { mergeShortSpans, sortReadingOrder } from './SpanMerger';
import { injectMissingUnderlines } from './UnderlineInjector';
import { buildWatermarkMask } from './WatermarkDetector';
import type { Block, DrawingPrimitive, PageFeed, Span } from './types';

/**
 * Cluster already-filtered spans into blocks.
 * Throws EmptyPageError when there is nothing to cluster.
 */
export function clusterSpans(
  spans: readonly Span[],
  drawings: readonly DrawingPrimitive[],
  config: ClusteringConfig,
): Block[] {
  if (spans.length === 0) {
    throw new EmptyPageError();
  }

  const adjacency = buildSpanGraph(spans, config);
  const clusters = extractClusters(adjacency);

  const blocks = clusters.map(component => {
    const ordered = sortReadingOrder(component.map(idx => spans[idx]));
    return assembleBlock(mergeShortSpans(ordered, config.shortSpanLimit));
  });

  const withUnderlines = injectMissingUnderlines(blocks, drawings, config.underline);

  if (config.debug) {
    console.log(
      `[TextClusterer] ${spans.length} spans -> ${clusters.length} clusters, ` +
      `${withUnderlines.length - blocks.length} synthetic underline block(s)`,
    );
  }

  return withUnderlines.sort((a, b) => compareTopLeft(a.bbox, b.bbox));
}

/**
 * Cluster one page: mask watermark spans, normalize the rest, then run
 * clusterSpans. Drawings are used as-is; the watermark mask does not
 * apply to them.
 */
export function clusterPage(feed: PageFeed, overrides?: ClusteringOverrides): Block[] {
  const config = resolveClusteringConfig(overrides);

  const mask = buildWatermarkMask(feed.spans, feed.links, config.watermark);
  const spans = normalizeSpans(feed.spans, mask);

  if (config.debug && mask.boxes.length > 0) {
    console.log(`[TextClusterer] Watermark mask: ${mask.boxes.length} region(s), ${feed.spans.length - spans.length} record(s) dropped`);
  }

  return clusterSpans(spans, feed.drawings, config);
}
