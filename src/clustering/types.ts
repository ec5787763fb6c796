/**
 * Text Block Clustering Type Definitions
 *
 * Shared type system for the page clustering pipeline:
 *   SpanFeed -> WatermarkDetector -> SpanGraphBuilder -> ClusterExtractor
 *     -> SpanMerger -> BlockAssembler -> UnderlineInjector
 *
 * All coordinates are page units with a top-left origin.
 */

// ─── Geometry ──────────────────────────────────────────────────

/** Axis-aligned box. left <= right and top <= bottom are not enforced. */
export interface BoundingBox {
  top: number;
  left: number;
  bottom: number;
  right: number;
}

export interface Point { x: number; y: number }

/** Raw box as delivered by an extraction engine: [x0, y0, x1, y1] */
export type BoxSequence = ReadonlyArray<number>;

// ─── Clustering Units ──────────────────────────────────────────

export interface FontStyle {
  font: string;
  size: number;
  bold: boolean;
  italic: boolean;
}

/** One trimmed, non-empty run of text with a single box and style */
export interface Span {
  readonly text: string;
  readonly bbox: BoundingBox;
  readonly style: FontStyle;
}

/** A merged group of spans forming one semantic text region */
export interface Block {
  /** Envelope of every constituent span */
  bbox: BoundingBox;
  text: string;
  /** Representative style (see BlockAssembler) */
  style: FontStyle;
  /** Constituent spans in reading order, after short-span merging */
  spans: Span[];
}

// ─── Watermarks ────────────────────────────────────────────────

export type WatermarkSignal = 'URL_TEXT' | 'EMAIL_TEXT' | 'LINK_HIT' | 'NEAR_WHITE';

export interface WatermarkCandidate {
  bbox: BoundingBox;
  text: string;
  signals: WatermarkSignal[];
  score: number;
}

/** Regions excluded from clustering; a span box grown by `padding` that touches one is dropped */
export interface WatermarkMask {
  boxes: BoundingBox[];
  padding: number;
}

// ─── Feed Records (extraction boundary) ────────────────────────

/** A span exactly as the extraction engine reports it, before filtering */
export interface SpanRecord {
  text: string;
  bbox: BoxSequence | null | undefined;
  font: string;
  size: number;
  /** Packed sRGB integer 0xRRGGBB; absent means black */
  color?: number;
  /** Explicit style flags; when absent they are derived from the font name */
  bold?: boolean;
  italic?: boolean;
}

/** A hyperlink hot-spot on the page */
export interface PageLink {
  /** External target; null/undefined for internal (GoTo) links */
  uri?: string | null;
  bbox: BoxSequence | null | undefined;
}

/** A vector primitive from the page's drawing operators */
export type DrawingPrimitive =
  | { kind: 'rect'; x0: number; y0: number; x1: number; y1: number }
  | { kind: 'line'; from: Point; to: Point };

/** Everything the clustering core needs from one page */
export interface PageFeed {
  spans: SpanRecord[];
  drawings: DrawingPrimitive[];
  links: PageLink[];
}

/** A horizontal rule normalized from a drawing primitive (x0 <= x1, y0 <= y1) */
export interface HorizontalRule {
  x0: number;
  y0: number;
  x1: number;
  y1: number;
}

// ─── Graph ─────────────────────────────────────────────────────

/** adjacency[i] lists the indices of spans adjacent to span i */
export type AdjacencyList = number[][];
