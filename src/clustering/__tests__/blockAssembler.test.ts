/**
 * Unit Tests: Block assembly
 */
import { describe, test, expect } from 'vitest';
import { assembleBlock, blockFromSpan } from '../BlockAssembler';
import { makeSpan } from './helpers';

describe('assembleBlock', () => {
  const title = makeSpan('Title', [10, 10, 100, 30], { font: 'Arial-Bold', size: 18, bold: true, italic: false });
  const body = makeSpan('Body text', [10, 35, 200, 45], { font: 'Arial', size: 10, bold: false, italic: true });

  test('envelope covers every span', () => {
    expect(assembleBlock([title, body]).bbox).toEqual({ top: 10, left: 10, bottom: 45, right: 200 });
  });

  test('representative style: first font and italic, smallest size, any bold', () => {
    expect(assembleBlock([title, body]).style).toEqual({ font: 'Arial-Bold', size: 10, bold: true, italic: false });
  });

  test('text is joined in span order', () => {
    expect(assembleBlock([title, body]).text).toBe('Title Body text');
  });

  test('keeps the spans it was built from', () => {
    const spans = [title, body];
    expect(assembleBlock(spans).spans).toBe(spans);
  });

  test('single span block', () => {
    const block = assembleBlock([body]);
    expect(block.text).toBe('Body text');
    expect(block.bbox).toEqual(body.bbox);
    expect(block.bbox).not.toBe(body.bbox);
  });

  test('throws on an empty cluster', () => {
    expect(() => assembleBlock([])).toThrow(RangeError);
  });
});

describe('blockFromSpan', () => {
  test('wraps a span as a one-span block', () => {
    const span = makeSpan('____________', [170, 209, 260, 211], { font: 'Times New Roman', size: 14 });
    expect(blockFromSpan(span)).toEqual({
      bbox: { top: 209, left: 170, bottom: 211, right: 260 },
      text: '____________',
      style: { font: 'Times New Roman', size: 14, bold: false, italic: false },
      spans: [span],
    });
  });
});
