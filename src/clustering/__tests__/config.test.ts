/**
 * Unit Tests: Clustering configuration
 */
import { describe, test, expect } from 'vitest';
import {
  buildLabelPattern,
  DEFAULT_CLUSTERING_CONFIG,
  DEFAULT_UNDERLINE_OPTIONS,
  resolveClusteringConfig,
} from '../config';

describe('resolveClusteringConfig', () => {
  test('no overrides gives the defaults', () => {
    expect(resolveClusteringConfig()).toEqual(DEFAULT_CLUSTERING_CONFIG);
  });

  test('top-level overrides replace single values', () => {
    const config = resolveClusteringConfig({ distanceThreshold: 40, debug: true });
    expect(config.distanceThreshold).toBe(40);
    expect(config.debug).toBe(true);
    expect(config.verticalTolerance).toBe(5);
  });

  test('group overrides merge over group defaults', () => {
    const config = resolveClusteringConfig({
      watermark: { useColorHint: true },
      underline: { minChars: 8, placeholderStyle: { font: 'Arial', size: 12, bold: false, italic: false } },
    });
    expect(config.watermark.useColorHint).toBe(true);
    expect(config.watermark.padding).toBe(0.5);
    expect(config.underline.minChars).toBe(8);
    expect(config.underline.pixelsPerChar).toBe(7);
    expect(config.underline.placeholderStyle.font).toBe('Arial');
  });

  test('does not modify the shared defaults', () => {
    const config = resolveClusteringConfig({ underline: { labelTerms: ['Approved'] } });
    config.underline.placeholderStyle.size = 99;
    expect(DEFAULT_UNDERLINE_OPTIONS.placeholderStyle.size).toBe(14);
    expect(DEFAULT_UNDERLINE_OPTIONS.labelTerms).toEqual([]);
  });
});

describe('buildLabelPattern', () => {
  test('matches Russian role words in any case', () => {
    const pattern = buildLabelPattern(['ru']);
    expect(pattern.test('Руководитель отдела')).toBe(true);
    expect(pattern.test('ДИРЕКТОР')).toBe(true);
    expect(pattern.test('Director')).toBe(false);
  });

  test('matches English role words as substrings', () => {
    const pattern = buildLabelPattern(['en']);
    expect(pattern.test('Managing Director:')).toBe(true);
    expect(pattern.test('Department manager')).toBe(true);
    expect(pattern.test('Invoice total')).toBe(false);
  });

  test('English role words match whole words only', () => {
    const pattern = buildLabelPattern(['en']);
    expect(pattern.test('Head of department')).toBe(true);
    expect(pattern.test('Acting Director')).toBe(true);
    expect(pattern.test('Overhead costs')).toBe(false);
    expect(pattern.test('Heading')).toBe(false);
    expect(pattern.test('Contracting terms')).toBe(false);
    expect(pattern.test('mischief')).toBe(false);
  });

  test('Russian stems match inflected forms at a word start', () => {
    const pattern = buildLabelPattern(['ru']);
    expect(pattern.test('Заместитель директора')).toBe(true);
    expect(pattern.test('Начальнику отдела')).toBe(true);
    expect(pattern.test('Поддиректор')).toBe(false);
  });

  test('extra terms are matched literally', () => {
    const pattern = buildLabelPattern([], ['Approved by', 'p.p.']);
    expect(pattern.test('Approved by:')).toBe(true);
    expect(pattern.test('p.p. Smith')).toBe(true);
    expect(pattern.test('pxpx')).toBe(false);
  });

  test('no terms matches nothing', () => {
    const pattern = buildLabelPattern([], ['  ']);
    expect(pattern.test('')).toBe(false);
    expect(pattern.test('Director')).toBe(false);
  });
});
