/**
 * Unit Tests: Signature-line synthesis
 */
import { describe, test, expect } from 'vitest';
import { buildUnderlinePattern, collectHorizontalRules, injectMissingUnderlines } from '../UnderlineInjector';
import { DEFAULT_UNDERLINE_OPTIONS, type UnderlineOptions } from '../config';
import type { DrawingPrimitive } from '../types';
import { makeBlock } from './helpers';

const line = (x0: number, y0: number, x1: number, y1: number): DrawingPrimitive => ({
  kind: 'line',
  from: { x: x0, y: y0 },
  to: { x: x1, y: y1 },
});

const options = (overrides: Partial<UnderlineOptions> = {}): UnderlineOptions => ({
  ...DEFAULT_UNDERLINE_OPTIONS,
  ...overrides,
});

// ─── buildUnderlinePattern ───────────────────────────────────

describe('buildUnderlinePattern', () => {
  const pattern = buildUnderlinePattern(4);

  test('consecutive underscores', () => {
    expect(pattern.test('____')).toBe(true);
    expect(pattern.test('Sign: ______')).toBe(true);
    expect(pattern.test('___')).toBe(false);
  });

  test('whitespace-separated underscores', () => {
    expect(pattern.test('_ _ _ _')).toBe(true);
    expect(pattern.test('_  _ _')).toBe(false);
  });
});

// ─── collectHorizontalRules ──────────────────────────────────

describe('collectHorizontalRules', () => {
  const tolerances = { drawingYTolerance: 4, drawingMinLength: 30 };

  test('keeps flat rects and lines that are long enough', () => {
    const drawings: DrawingPrimitive[] = [
      { kind: 'rect', x0: 50, y0: 100, x1: 150, y1: 101 },
      { kind: 'rect', x0: 50, y0: 100, x1: 150, y1: 140 },
      line(10, 10, 20, 10),
      line(300, 50, 200, 52),
    ];

    expect(collectHorizontalRules(drawings, tolerances)).toEqual([
      { x0: 50, y0: 100, x1: 150, y1: 101 },
      { x0: 200, y0: 50, x1: 300, y1: 52 },
    ]);
  });

  test('no drawings, no rules', () => {
    expect(collectHorizontalRules([], tolerances)).toEqual([]);
  });
});

// ─── injectMissingUnderlines ─────────────────────────────────

describe('injectMissingUnderlines', () => {
  const director = makeBlock('Director', [100, 200, 160, 215]);

  test('synthesizes an underline beside a role label', () => {
    const result = injectMissingUnderlines([director], [line(170, 210, 260, 210)], options());

    expect(result).toHaveLength(2);
    expect(result[0]).toBe(director);
    expect(result[1].text).toBe('_'.repeat(12));
    expect(result[1].bbox).toEqual({ top: 209, left: 170, bottom: 211, right: 260 });
    expect(result[1].style).toEqual({ font: 'Times New Roman', size: 14, bold: false, italic: false });
    expect(result[1].spans).toHaveLength(1);
  });

  test('short rules get at least minChars underscores', () => {
    const result = injectMissingUnderlines([director], [line(170, 210, 205, 210)], options());
    expect(result[1].text).toBe('_____');
  });

  test('Russian label', () => {
    const label = makeBlock('Руководитель', [100, 200, 180, 215]);
    const result = injectMissingUnderlines([label], [line(200, 212, 340, 212)], options());
    expect(result[1].text).toBe('_'.repeat(20));
  });

  test('caller-supplied label terms', () => {
    const label = makeBlock('Approved by:', [100, 200, 160, 215]);
    const drawings = [line(170, 210, 260, 210)];

    expect(injectMissingUnderlines([label], drawings, options())).toHaveLength(1);
    expect(injectMissingUnderlines([label], drawings, options({ labelTerms: ['approved by'] }))).toHaveLength(2);
  });

  test('skips a label whose band already has an underscore run', () => {
    const typed = makeBlock('________', [170, 202, 260, 214]);
    const result = injectMissingUnderlines([director, typed], [line(170, 210, 260, 210)], options());
    expect(result).toEqual([director, typed]);
  });

  test('spaced underscores count as an existing line', () => {
    const typed = makeBlock('_ _ _ _', [170, 202, 260, 214]);
    const result = injectMissingUnderlines([director, typed], [line(170, 210, 260, 210)], options());
    expect(result).toHaveLength(2);
  });

  test('a short underscore run does not count', () => {
    const typed = makeBlock('___', [170, 202, 200, 214]);
    const result = injectMissingUnderlines([director, typed], [line(170, 210, 260, 210)], options());
    expect(result).toHaveLength(3);
  });

  test('ignores blocks that are not labels', () => {
    const other = makeBlock('Invoice total', [100, 200, 160, 215]);
    expect(injectMissingUnderlines([other], [line(170, 210, 260, 210)], options())).toEqual([other]);
  });

  test('rule must extend past the label on the right', () => {
    const result = injectMissingUnderlines([director], [line(20, 210, 163, 210)], options());
    expect(result).toHaveLength(1);
  });

  test('rule must sit on the label band', () => {
    const result = injectMissingUnderlines([director], [line(170, 300, 260, 300)], options());
    expect(result).toHaveLength(1);
  });

  test('uses the first matching rule in drawing order', () => {
    const drawings = [line(170, 205, 240, 205), line(170, 212, 310, 212)];
    const result = injectMissingUnderlines([director], drawings, options());
    expect(result).toHaveLength(2);
    expect(result[1].bbox).toEqual({ top: 204, left: 170, bottom: 206, right: 240 });
    expect(result[1].text).toBe('_'.repeat(10));
  });

  test('returns the input list when there are no rules', () => {
    const blocks = [director];
    expect(injectMissingUnderlines(blocks, [], options())).toBe(blocks);
  });

  test('does not modify the input list', () => {
    const blocks = [director];
    injectMissingUnderlines(blocks, [line(170, 210, 260, 210)], options());
    expect(blocks).toHaveLength(1);
  });
});
