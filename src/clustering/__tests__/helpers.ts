import type { Block, FontStyle, Span, SpanRecord } from '../types';

export const BODY_STYLE: FontStyle = { font: 'Helvetica', size: 10, bold: false, italic: false };

/** Span from an [x0, y0, x1, y1] box */
export function makeSpan(
  text: string,
  [x0, y0, x1, y1]: [number, number, number, number],
  style?: Partial<FontStyle>,
): Span {
  return {
    text,
    bbox: { top: y0, left: x0, bottom: y1, right: x1 },
    style: { ...BODY_STYLE, ...style },
  };
}

export function makeBlock(text: string, box: [number, number, number, number]): Block {
  const span = makeSpan(text, box);
  return { bbox: { ...span.bbox }, text, style: { ...span.style }, spans: [span] };
}

export function makeRecord(
  text: string,
  bbox: [number, number, number, number],
  overrides?: Partial<SpanRecord>,
): SpanRecord {
  return { text, bbox, font: 'Helvetica', size: 10, ...overrides };
}
