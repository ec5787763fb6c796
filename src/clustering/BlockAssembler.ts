import { unionBoxes } from './BoundingBox';
import { joinSpanTexts } from './SpanMerger';
import type { Block, BoundingBox, FontStyle, Span } from './types';

/**
 * Build a Block from the merged spans of one cluster (already in reading order).
 *
 * Representative style: font name and italic flag from the first span, the
 * smallest size of any span, bold if any span is bold.
 */
export function assembleBlock(spans: Span[]): Block {
  if (spans.length === 0) {
    throw new RangeError('assembleBlock requires at least one span');
  }

  const first = spans[0];
  let bbox: BoundingBox = { ...first.bbox };
  let minSize = first.style.size;
  let bold = first.style.bold;

  for (let i = 1; i < spans.length; i++) {
    const span = spans[i];
    bbox = unionBoxes(bbox, span.bbox);
    minSize = Math.min(minSize, span.style.size);
    bold = bold || span.style.bold;
  }

  const style: FontStyle = {
    font: first.style.font,
    size: minSize,
    bold,
    italic: first.style.italic,
  };

  return {
    bbox,
    text: joinSpanTexts(spans),
    style,
    spans,
  };
}

/** Wrap a single span as its own block. */
export function blockFromSpan(span: Span): Block {
  return {
    bbox: { ...span.bbox },
    text: span.text,
    style: { ...span.style },
    spans: [span],
  };
}
