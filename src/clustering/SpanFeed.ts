/**
 * SpanFeed — turns raw span records into clustering input.
 *
 * Masked (watermark) and blank records are dropped here, so nothing
 * downstream ever sees them.
 */

import { toBoundingBox } from './BoundingBox';
import { isMaskedSpan } from './WatermarkDetector';
import type { Span, SpanRecord, WatermarkMask } from './types';

/** Detect bold from font name patterns */
export function isBoldFontName(fontName: string): boolean {
  const lower = fontName.toLowerCase();
  return lower.includes('bold') || lower.includes('-bd') || lower.endsWith('bd');
}

/** Detect italic from font name patterns */
export function isItalicFontName(fontName: string): boolean {
  const lower = fontName.toLowerCase();
  return lower.includes('italic') || lower.includes('oblique') || lower.includes('-it');
}

export function normalizeSpans(records: readonly SpanRecord[], mask: WatermarkMask): Span[] {
  const spans: Span[] = [];

  for (const record of records) {
    const bbox = toBoundingBox(record.bbox);
    if (isMaskedSpan(mask, bbox)) continue;

    const text = record.text.trim();
    if (!text) continue;

    const font = record.font;
    const size = Number.isFinite(record.size) ? record.size : 0;

    spans.push({
      text,
      bbox,
      style: {
        font,
        size,
        bold: record.bold ?? isBoldFontName(font),
        italic: record.italic ?? isItalicFontName(font),
      },
    });
  }

  return spans;
}
