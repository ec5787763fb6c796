/**
 * Span Graph Builder
 *
 * Two spans are adjacent when either:
 *   1. their box centers are closer than `distanceThreshold`, or
 *   2. they sit on the same line (mid-Y within `verticalTolerance`) and the
 *      right edge of one is within `overlapThreshold` of the left edge of the
 *      other. This catches fragments of a wide line whose centers are far apart.
 *
 * Every pair is tested, so construction is O(n²) in the span count.
 */

import { boxCenter, boxMidY } from './BoundingBox';
import type { AdjacencyList, Span } from './types';

export interface SpanGraphParams {
  distanceThreshold: number;
  verticalTolerance: number;
  overlapThreshold: number;
}

export function areAdjacent(a: Span, b: Span, params: SpanGraphParams): boolean {
  const ca = boxCenter(a.bbox);
  const cb = boxCenter(b.bbox);
  if (Math.hypot(ca.x - cb.x, ca.y - cb.y) < params.distanceThreshold) return true;

  if (Math.abs(boxMidY(a.bbox) - boxMidY(b.bbox)) >= params.verticalTolerance) return false;

  return (
    Math.abs(a.bbox.right - b.bbox.left) < params.overlapThreshold ||
    Math.abs(b.bbox.right - a.bbox.left) < params.overlapThreshold
  );
}

/**
 * Build symmetric adjacency lists. Neighbours of each node appear in the
 * order they were discovered (ascending pair order).
 */
export function buildSpanGraph(spans: readonly Span[], params: SpanGraphParams): AdjacencyList {
  const adjacency: AdjacencyList = spans.map(() => []);

  for (let i = 0; i < spans.length; i++) {
    for (let j = i + 1; j < spans.length; j++) {
      if (areAdjacent(spans[i], spans[j], params)) {
        adjacency[i].push(j);
        adjacency[j].push(i);
      }
    }
  }

  return adjacency;
}
