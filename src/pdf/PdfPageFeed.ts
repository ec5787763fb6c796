/**
 * PdfPageFeed — pdfjs-dist page -> clustering feeds
 *
 *   page → getTextContent()   → convertTextItems()  → SpanRecord[]
 *   page → getOperatorList()  → parseDrawings()     → DrawingPrimitive[]
 *                             → buildTextColorMap() → SpanRecord.color
 *   page → getAnnotations()   → convertLinks()      → PageLink[]
 *
 * Everything is converted to a top-left origin using the page height.
 * NO rendering. Pure data extraction.
 */

import type { DrawingPrimitive, PageFeed, PageLink, Point, SpanRecord } from '../clustering/types';
import type { PdfOperatorListLike, PdfPageLike, PdfTextContentLike } from './types';

// ─── pdfjs-dist OPS constants ─────────────────────────────────────

const OPS = {
  save: 10,
  restore: 11,
  transform: 12,
  moveTo: 13,
  lineTo: 14,
  curveTo: 15,
  curveTo2: 16,
  curveTo3: 17,
  closePath: 18,
  rectangle: 19,
  stroke: 20,
  closeStroke: 21,
  fill: 22,
  eoFill: 23,
  fillStroke: 24,
  eoFillStroke: 25,
  closeFillStroke: 26,
  closeEOFillStroke: 27,
  endPath: 28,
  beginText: 31,
  setLeading: 36,
  moveText: 40,
  setLeadingMoveText: 41,
  setTextMatrix: 42,
  nextLine: 43,
  showText: 44,
  showSpacedText: 45,
  nextLineShowText: 46,
  nextLineSetSpacingShowText: 47,
  setFillGray: 57,
  setFillRGBColor: 59,
  setFillCMYKColor: 61,
  constructPath: 91,
} as const;

/** Coordinates consumed by each path op inside a constructPath batch */
const PATH_OP_ARITY: Record<number, number> = {
  [OPS.moveTo]: 2,
  [OPS.lineTo]: 2,
  [OPS.curveTo]: 6,
  [OPS.curveTo2]: 4,
  [OPS.curveTo3]: 4,
  [OPS.closePath]: 0,
  [OPS.rectangle]: 4,
};

const PAINT_OPS = new Set<number>([
  OPS.stroke,
  OPS.closeStroke,
  OPS.fill,
  OPS.eoFill,
  OPS.fillStroke,
  OPS.eoFillStroke,
  OPS.closeFillStroke,
  OPS.closeEOFillStroke,
]);

// ─── Narrowing Helpers ────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function asNum(value: unknown, fallback = 0): number {
  const n = Number(value);
  return Number.isFinite(n) ? n : fallback;
}

function toNumbers(value: unknown): number[] {
  if (Array.isArray(value)) return value.map(v => asNum(v));
  if (value instanceof Float32Array || value instanceof Float64Array) return Array.from(value);
  return [];
}

// ─── Affine Matrix Math ───────────────────────────────────────────

/** 6-element affine transform: [a, b, c, d, e, f] */
type Matrix = [number, number, number, number, number, number];

const IDENTITY: Matrix = [1, 0, 0, 1, 0, 0];

/**
 * Result = m1 applied first, then m2. A `cm` operand M updates the CTM as
 * multiplyMatrices(M, ctm), so nested transforms act in the outer space.
 */
function multiplyMatrices(m1: Matrix, m2: Matrix): Matrix {
  return [
    m1[0] * m2[0] + m1[1] * m2[2],
    m1[0] * m2[1] + m1[1] * m2[3],
    m1[2] * m2[0] + m1[3] * m2[2],
    m1[2] * m2[1] + m1[3] * m2[3],
    m1[4] * m2[0] + m1[5] * m2[2] + m2[4],
    m1[4] * m2[1] + m1[5] * m2[3] + m2[5],
  ];
}

function applyTransform(point: Point, ctm: Matrix): Point {
  return {
    x: point.x * ctm[0] + point.y * ctm[2] + ctm[4],
    y: point.x * ctm[1] + point.y * ctm[3] + ctm[5],
  };
}

// ─── Text Colour ──────────────────────────────────────────────────

/** Fill colour at the origin of one text-showing op, top-left origin */
export interface TextColorEntry {
  x: number;
  y: number;
  /** Packed 0xRRGGBB */
  color: number;
}

/** Normalize a color component from pdfjs; values > 1 are 0-255 range */
function normalizeComponent(v: number): number {
  return v > 1 ? v / 255 : v;
}

function packRgb(r: number, g: number, b: number): number {
  const byte = (v: number) => Math.round(Math.min(1, Math.max(0, normalizeComponent(v))) * 255);
  return (byte(r) << 16) | (byte(g) << 8) | byte(b);
}

/** Fill colour from a setFill*Color op; newer pdfjs builds pass a single "#rrggbb" string. */
function toFillColor(op: number, args: unknown): number | null {
  if (Array.isArray(args) && typeof args[0] === 'string') {
    const hex = /^#([0-9a-f]{6})$/i.exec(args[0]);
    return hex ? Number.parseInt(hex[1], 16) : null;
  }

  const c = toNumbers(args);
  switch (op) {
    case OPS.setFillGray:
      return c.length >= 1 ? packRgb(c[0], c[0], c[0]) : null;
    case OPS.setFillRGBColor:
      return c.length >= 3 ? packRgb(c[0], c[1], c[2]) : null;
    case OPS.setFillCMYKColor: {
      if (c.length < 4) return null;
      const [cy, m, y, k] = c.map(normalizeComponent);
      return packRgb((1 - cy) * (1 - k), (1 - m) * (1 - k), (1 - y) * (1 - k));
    }
    default:
      return null;
  }
}

/**
 * Scan the operator list for fill-colour changes and text-showing ops,
 * recording the active fill colour at each text origin.
 *
 * Tracks the graphics state (save/restore, cm, fill colour) and the text line
 * matrix (BT, Tm, Td, TD, TL, T*). Advances within a shown string are not
 * followed, so each entry marks where its string starts.
 */
export function buildTextColorMap(opList: PdfOperatorListLike, pageHeight: number): TextColorEntry[] {
  const entries: TextColorEntry[] = [];
  const { fnArray, argsArray } = opList;

  let ctm: Matrix = [...IDENTITY];
  let fill = 0x000000;
  const stateStack: Array<{ ctm: Matrix; fill: number }> = [];

  let lineMatrix: Matrix = [...IDENTITY];
  let leading = 0;

  const moveLine = (tx: number, ty: number): void => {
    lineMatrix = multiplyMatrices([1, 0, 0, 1, tx, ty], lineMatrix);
  };

  const record = (): void => {
    const origin = applyTransform({ x: lineMatrix[4], y: lineMatrix[5] }, ctm);
    entries.push({ x: origin.x, y: pageHeight - origin.y, color: fill });
  };

  for (let i = 0; i < fnArray.length; i++) {
    const op = fnArray[i];
    const args = argsArray[i];

    switch (op) {
      case OPS.save:
        stateStack.push({ ctm: [...ctm], fill });
        break;
      case OPS.restore: {
        const prev = stateStack.pop();
        if (prev) ({ ctm, fill } = prev);
        break;
      }
      case OPS.transform: {
        const m = toNumbers(args);
        if (m.length >= 6) {
          ctm = multiplyMatrices([m[0], m[1], m[2], m[3], m[4], m[5]], ctm);
        }
        break;
      }
      case OPS.setFillGray:
      case OPS.setFillRGBColor:
      case OPS.setFillCMYKColor: {
        const color = toFillColor(op, args);
        if (color !== null) fill = color;
        break;
      }
      case OPS.beginText:
        lineMatrix = [...IDENTITY];
        break;
      case OPS.setTextMatrix: {
        const m = toNumbers(args);
        if (m.length >= 6) lineMatrix = [m[0], m[1], m[2], m[3], m[4], m[5]];
        break;
      }
      case OPS.setLeading:
        leading = asNum(toNumbers(args)[0]);
        break;
      case OPS.moveText: {
        const [tx = 0, ty = 0] = toNumbers(args);
        moveLine(tx, ty);
        break;
      }
      case OPS.setLeadingMoveText: {
        const [tx = 0, ty = 0] = toNumbers(args);
        leading = -ty;
        moveLine(tx, ty);
        break;
      }
      case OPS.nextLine:
        moveLine(0, -leading);
        break;
      case OPS.nextLineShowText:
      case OPS.nextLineSetSpacingShowText:
        moveLine(0, -leading);
        record();
        break;
      case OPS.showText:
      case OPS.showSpacedText:
        record();
        break;
    }
  }

  return entries;
}

/**
 * Colour of the entry closest to a text origin, within two font sizes.
 * Undefined when nothing is close enough.
 */
export function matchTextColor(
  x: number,
  y: number,
  fontSize: number,
  colorMap: readonly TextColorEntry[],
): number | undefined {
  const tolerance = fontSize * 2;
  let bestDist = Infinity;
  let best: number | undefined;

  for (const entry of colorMap) {
    const dist = Math.hypot(x - entry.x, y - entry.y);
    if (dist < bestDist && dist <= tolerance) {
      bestDist = dist;
      best = entry.color;
    }
  }

  return best;
}

// ─── Text Extraction ──────────────────────────────────────────────

function resolveFontNames(styles: unknown): Map<string, string> {
  const names = new Map<string, string>();
  if (!isRecord(styles)) return names;
  for (const [internalId, style] of Object.entries(styles)) {
    if (isRecord(style) && typeof style.fontFamily === 'string' && style.fontFamily) {
      names.set(internalId, style.fontFamily);
    }
  }
  return names;
}

/**
 * Convert pdfjs text content items into span records.
 * Items without text or a usable transform are skipped. With a colour map,
 * each record takes the fill colour recorded nearest its text origin.
 */
export function convertTextItems(
  textContent: PdfTextContentLike,
  pageHeight: number,
  colorMap: readonly TextColorEntry[] = [],
): SpanRecord[] {
  const fontNames = resolveFontNames(textContent.styles);
  const records: SpanRecord[] = [];

  for (const item of textContent.items) {
    if (!isRecord(item) || typeof item.str !== 'string' || !item.str.trim()) continue;

    const transform = toNumbers(item.transform);
    if (transform.length < 6) continue;

    // Font size from the text matrix: sqrt(a^2 + b^2)
    const fontSize = Math.hypot(transform[0], transform[1]);
    if (fontSize <= 0) continue;

    const x = transform[4];
    const height = asNum(item.height) || fontSize * 1.2;
    const width = asNum(item.width) || item.str.length * fontSize * 0.5;
    // pdfjs uses bottom-left origin; convert to top-left
    const top = pageHeight - transform[5] - height;

    const rawFontName = typeof item.fontName === 'string' ? item.fontName : '';

    const record: SpanRecord = {
      text: item.str,
      bbox: [x, top, x + width, top + height],
      font: fontNames.get(rawFontName) ?? rawFontName,
      size: fontSize,
    };
    const color = matchTextColor(x, pageHeight - transform[5], fontSize, colorMap);
    if (color !== undefined) record.color = color;

    records.push(record);
  }

  return records;
}

// ─── Drawing Extraction ───────────────────────────────────────────

type PathOp =
  | { type: 'moveTo' | 'lineTo' | 'curveTo'; x: number; y: number }
  | { type: 'rectangle'; x: number; y: number; width: number; height: number }
  | { type: 'closePath' };

function toPathOp(op: number, args: number[]): PathOp | null {
  switch (op) {
    case OPS.moveTo:
      return { type: 'moveTo', x: args[0], y: args[1] };
    case OPS.lineTo:
      return { type: 'lineTo', x: args[0], y: args[1] };
    case OPS.curveTo:
      return { type: 'curveTo', x: args[4], y: args[5] };
    case OPS.curveTo2:
    case OPS.curveTo3:
      return { type: 'curveTo', x: args[2], y: args[3] };
    case OPS.closePath:
      return { type: 'closePath' };
    case OPS.rectangle:
      return { type: 'rectangle', x: args[0], y: args[1], width: args[2], height: args[3] };
    default:
      return null;
  }
}

/**
 * Walk the operator list and emit every painted rectangle and straight line
 * segment. Curves only move the current point.
 */
export function parseDrawings(opList: PdfOperatorListLike, pageHeight: number): DrawingPrimitive[] {
  const drawings: DrawingPrimitive[] = [];
  const { fnArray, argsArray } = opList;

  let ctm: Matrix = [...IDENTITY];
  const ctmStack: Matrix[] = [];
  let pathOps: PathOp[] = [];

  const toPage = (p: Point): Point => {
    const t = applyTransform(p, ctm);
    return { x: t.x, y: pageHeight - t.y };
  };

  function flushPath(): void {
    let current: Point | null = null;
    let subpathStart: Point | null = null;

    for (const op of pathOps) {
      switch (op.type) {
        case 'moveTo':
          current = { x: op.x, y: op.y };
          subpathStart = current;
          break;
        case 'lineTo': {
          const next = { x: op.x, y: op.y };
          if (current) {
            drawings.push({ kind: 'line', from: toPage(current), to: toPage(next) });
          }
          current = next;
          break;
        }
        case 'curveTo':
          current = { x: op.x, y: op.y };
          break;
        case 'rectangle': {
          const corners = [
            { x: op.x, y: op.y },
            { x: op.x + op.width, y: op.y },
            { x: op.x + op.width, y: op.y + op.height },
            { x: op.x, y: op.y + op.height },
          ].map(toPage);
          const xs = corners.map(c => c.x);
          const ys = corners.map(c => c.y);
          drawings.push({
            kind: 'rect',
            x0: Math.min(...xs),
            y0: Math.min(...ys),
            x1: Math.max(...xs),
            y1: Math.max(...ys),
          });
          current = { x: op.x, y: op.y };
          subpathStart = current;
          break;
        }
        case 'closePath':
          if (current && subpathStart && (current.x !== subpathStart.x || current.y !== subpathStart.y)) {
            drawings.push({ kind: 'line', from: toPage(current), to: toPage(subpathStart) });
          }
          current = subpathStart;
          break;
      }
    }

    pathOps = [];
  }

  for (let i = 0; i < fnArray.length; i++) {
    const op = fnArray[i];
    const args = argsArray[i];

    switch (op) {
      case OPS.save:
        ctmStack.push([...ctm]);
        break;
      case OPS.restore: {
        const prev = ctmStack.pop();
        if (prev) ctm = prev;
        break;
      }
      case OPS.transform: {
        const m = toNumbers(args);
        if (m.length >= 6) {
          ctm = multiplyMatrices([m[0], m[1], m[2], m[3], m[4], m[5]], ctm);
        }
        break;
      }
      case OPS.constructPath: {
        // constructPath args: [ops[], coords[], minMax]
        const batch = Array.isArray(args) ? args : [];
        const subOps = toNumbers(batch[0]);
        const coords = toNumbers(batch[1]);
        let cursor = 0;
        for (const subOp of subOps) {
          const arity = PATH_OP_ARITY[subOp] ?? 0;
          const pathOp = toPathOp(subOp, coords.slice(cursor, cursor + arity));
          cursor += arity;
          if (pathOp) pathOps.push(pathOp);
        }
        break;
      }
      case OPS.endPath:
        pathOps = [];
        break;
      default: {
        if (PAINT_OPS.has(op)) {
          flushPath();
          break;
        }
        const pathOp = toPathOp(op, toNumbers(args));
        if (pathOp) pathOps.push(pathOp);
      }
    }
  }

  return drawings;
}

// ─── Link Extraction ──────────────────────────────────────────────

/** Link annotations as page links; internal (GoTo) links carry no uri. */
export function convertLinks(annotations: readonly unknown[], pageHeight: number): PageLink[] {
  const links: PageLink[] = [];

  for (const annot of annotations) {
    if (!isRecord(annot) || annot.subtype !== 'Link') continue;

    const rect = toNumbers(annot.rect);
    if (rect.length < 4) continue;

    const [x1, y1, x2, y2] = rect;
    const uri =
      typeof annot.url === 'string' ? annot.url
      : typeof annot.unsafeUrl === 'string' ? annot.unsafeUrl
      : null;

    links.push({
      uri,
      bbox: [
        Math.min(x1, x2),
        pageHeight - Math.max(y1, y2),
        Math.max(x1, x2),
        pageHeight - Math.min(y1, y2),
      ],
    });
  }

  return links;
}

// ─── Main Entry Point ─────────────────────────────────────────────

/**
 * Extract all three clustering feeds from a pdfjs-dist page.
 *
 * Text content is required; a failed operator list or annotation pass is
 * logged and treated as empty.
 */
export async function extractPageFeed(page: PdfPageLike): Promise<PageFeed> {
  const { height: pageHeight } = page.getViewport({ scale: 1 });

  const [textContent, opList, annotations] = await Promise.all([
    page.getTextContent(),
    page.getOperatorList().catch((err: unknown): PdfOperatorListLike => {
      console.warn('[PdfPageFeed] Operator list unavailable, no drawings for this page:', err);
      return { fnArray: [], argsArray: [] };
    }),
    page.getAnnotations({ intent: 'display' }).catch((err: unknown): unknown[] => {
      console.warn('[PdfPageFeed] Annotations unavailable, no links for this page:', err);
      return [];
    }),
  ]);

  return {
    spans: convertTextItems(textContent, pageHeight, buildTextColorMap(opList, pageHeight)),
    drawings: parseDrawings(opList, pageHeight),
    links: convertLinks(annotations, pageHeight),
  };
}

// ─── Test Exports ─────────────────────────────────────────────────
// These are exported for unit testing only. Do not use in production code.
export const _testExports = {
  multiplyMatrices,
  applyTransform,
  toNumbers,
  toFillColor,
};
