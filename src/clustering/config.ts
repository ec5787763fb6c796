/**
 * Clustering Configuration
 *
 * Every threshold and pattern the pipeline uses lives in one ClusteringConfig
 * value that is passed into each stage. Values are not range-checked: a
 * negative threshold yields a graph with no edges rather than an error.
 */

import type { FontStyle } from './types';

// ─── Label Vocabularies ──────────────────────────────────────

export type LabelLocale = 'ru' | 'en';

/** Role words that typically precede a signature line */
export const LABEL_VOCABULARIES: Record<LabelLocale, readonly string[]> = {
  ru: ['руководитель', 'директор', 'проректор', 'заведующий', 'начальник'],
  en: ['director', 'manager', 'head', 'leader', 'chief', 'supervisor', 'dean', 'acting', 'deputy'],
};

function escapeRegExp(s: string): string {
  return s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/** Locales whose vocabulary lists stems; they match at a word start and may be inflected */
const STEM_LOCALES: ReadonlySet<LabelLocale> = new Set<LabelLocale>(['ru']);

function cleanTerms(terms: readonly string[]): string[] {
  return terms.map(t => t.trim()).filter(t => t.length > 0).map(escapeRegExp);
}

/**
 * Compile the label pattern for the given locales plus any extra terms.
 * Matching is case-insensitive. Every term must start a word; stems may run
 * on ("Руководителя"), whole words and extra terms must also end one, so
 * "head" does not match "Overhead" or "Heading". With no terms at all the
 * pattern matches nothing.
 */
export function buildLabelPattern(locales: readonly LabelLocale[], extraTerms: readonly string[] = []): RegExp {
  const stems = cleanTerms(locales.filter(l => STEM_LOCALES.has(l)).flatMap(l => LABEL_VOCABULARIES[l]));
  const words = cleanTerms([
    ...locales.filter(l => !STEM_LOCALES.has(l)).flatMap(l => LABEL_VOCABULARIES[l]),
    ...extraTerms,
  ]);

  const alternatives: string[] = [];
  if (stems.length > 0) alternatives.push(`(?<!\\p{L})(?:${stems.join('|')})`);
  if (words.length > 0) alternatives.push(`(?<!\\p{L})(?:${words.join('|')})(?!\\p{L})`);
  if (alternatives.length === 0) return /(?!)/;

  return new RegExp(alternatives.join('|'), 'iu');
}

// ─── Config Shape ────────────────────────────────────────────

export interface WatermarkOptions {
  /** Treat near-white text as a (weak) watermark signal */
  useColorHint: boolean;
  /** Only links with an external URI count as link hits */
  externalLinksOnly: boolean;
  /** Packed 0xRRGGBB value at or above which text is "near white" */
  nearWhiteThreshold: number;
  /** Padding around candidate boxes when masking spans */
  padding: number;
  /** Score weight of each strong signal (URL, email, link hit) */
  strongWeight: number;
  domainPattern: RegExp;
  emailPattern: RegExp;
}

export interface UnderlineOptions {
  /** Max vertical extent of a drawing to count as horizontal */
  drawingYTolerance: number;
  /** Min horizontal extent of a drawing to count as a signature line */
  drawingMinLength: number;
  /** Underscore run length that already represents a line */
  minSegments: number;
  /** Max mid-Y distance between a label and a line on the same band */
  sameLineYTolerance: number;
  /** The line must extend at least this far past the label's right edge */
  rightMinGap: number;
  /** Approximate width of one underscore glyph */
  pixelsPerChar: number;
  /** Floor for the synthesized underscore count */
  minChars: number;
  /** Vertical padding of the synthesized span box */
  yPadding: number;
  placeholderStyle: FontStyle;
  labelLocales: LabelLocale[];
  /** Caller-supplied label terms on top of the locale vocabularies */
  labelTerms: string[];
}

export interface ClusteringConfig {
  /** Centers closer than this are adjacent */
  distanceThreshold: number;
  /** Max mid-Y difference for the same-line rule */
  verticalTolerance: number;
  /** Max edge gap (absolute) for the same-line rule */
  overlapThreshold: number;
  /** Spans shorter than this (in code points) are fused into their predecessor */
  shortSpanLimit: number;
  watermark: WatermarkOptions;
  underline: UnderlineOptions;
  /** Log a one-line summary per clustered page */
  debug: boolean;
}

export type ClusteringOverrides = Partial<Omit<ClusteringConfig, 'watermark' | 'underline'>> & {
  watermark?: Partial<WatermarkOptions>;
  underline?: Partial<UnderlineOptions>;
};

// ─── Defaults ────────────────────────────────────────────────

export const DEFAULT_WATERMARK_OPTIONS: WatermarkOptions = {
  useColorHint: false,
  externalLinksOnly: true,
  nearWhiteThreshold: 0xF0F0F0,
  padding: 0.5,
  strongWeight: 3,
  domainPattern: /\b(?:https?:\/\/)?(?:[a-z0-9-]+\.)+[a-z]{2,}\b/i,
  emailPattern: /[A-Za-z0-9._%+-]+@[A-Za-z0-9.-]+\.[A-Za-z]{2,}/,
};

export const DEFAULT_UNDERLINE_OPTIONS: UnderlineOptions = {
  drawingYTolerance: 4,
  drawingMinLength: 30,
  minSegments: 4,
  sameLineYTolerance: 16,
  rightMinGap: 5,
  pixelsPerChar: 7,
  minChars: 5,
  yPadding: 1,
  placeholderStyle: { font: 'Times New Roman', size: 14, bold: false, italic: false },
  labelLocales: ['ru', 'en'],
  labelTerms: [],
};

export const DEFAULT_CLUSTERING_CONFIG: ClusteringConfig = {
  distanceThreshold: 65,
  verticalTolerance: 5,
  overlapThreshold: 3,
  shortSpanLimit: 4,
  watermark: DEFAULT_WATERMARK_OPTIONS,
  underline: DEFAULT_UNDERLINE_OPTIONS,
  debug: false,
};

/** Merge partial overrides over the defaults, one group at a time. */
export function resolveClusteringConfig(overrides: ClusteringOverrides = {}): ClusteringConfig {
  const { watermark, underline, ...top } = overrides;
  return {
    ...DEFAULT_CLUSTERING_CONFIG,
    ...top,
    watermark: { ...DEFAULT_WATERMARK_OPTIONS, ...watermark },
    underline: {
      ...DEFAULT_UNDERLINE_OPTIONS,
      ...underline,
      placeholderStyle: { ...DEFAULT_UNDERLINE_OPTIONS.placeholderStyle, ...underline?.placeholderStyle },
    },
  };
}
