/**
 * Span Merger
 *
 * Within one cluster: put spans in reading order, fuse very short fragments
 * into the span before them, and join the survivors into block text with
 * script-aware spacing.
 */

import { compareTopLeft, unionBoxes } from './BoundingBox';
import type { Span } from './types';

// ─── Character Classes ───────────────────────────────────────

const ONLY_UNDERSCORES = /^_+$/;
const ONLY_DASHES = /^[-–—]+$/;
const LETTER = /^\p{L}$/u;
const UPPERCASE = /^\p{Lu}$/u;

/** A fragment ending in one of these is followed directly by the next word */
const JOINING_TAILS = new Set([' ', '-', '–', '—']);

/** Cyrillic vowels, both cases; a letter-to-letter boundary after one gets a space */
const CYRILLIC_VOWELS = new Set(Array.from('аеёиоуыэюяАЕЁИОУЫЭЮЯ'));

/** Length in code points, so astral characters count once */
function textLength(text: string): number {
  return Array.from(text).length;
}

function lastChar(text: string): string {
  const chars = Array.from(text);
  return chars[chars.length - 1] ?? '';
}

// ─── Reading Order ───────────────────────────────────────────

/** Stable sort by top, then left; ties keep input order. */
export function sortReadingOrder(spans: readonly Span[]): Span[] {
  return [...spans].sort((a, b) => compareTopLeft(a.bbox, b.bbox));
}

// ─── Short Span Merging ──────────────────────────────────────

function fusionSeparator(prev: string, next: string): string {
  const bothUnderscores = ONLY_UNDERSCORES.test(prev) && ONLY_UNDERSCORES.test(next);
  const bothDashes = ONLY_DASHES.test(prev) && ONLY_DASHES.test(next);
  return bothUnderscores || bothDashes ? '' : ' ';
}

/**
 * Fuse every span whose text is shorter than `shortSpanLimit` into the
 * current accumulation. Spans at or above the limit start a new one.
 * Runs of underscores or dashes are fused without a space so rule lines stay
 * continuous. Input spans are not modified.
 */
export function mergeShortSpans(spans: readonly Span[], shortSpanLimit: number): Span[] {
  if (spans.length === 0) return [];

  const merged: Span[] = [spans[0]];

  for (let i = 1; i < spans.length; i++) {
    const current = spans[i];

    if (textLength(current.text) < shortSpanLimit) {
      const prev = merged[merged.length - 1];
      merged[merged.length - 1] = {
        text: prev.text + fusionSeparator(prev.text, current.text) + current.text,
        bbox: unionBoxes(prev.bbox, current.bbox),
        style: prev.style,
      };
    } else {
      merged.push(current);
    }
  }

  return merged;
}

// ─── Text Joining ────────────────────────────────────────────

/**
 * Append `next` to `prev` deciding whether the boundary is a word break.
 *
 * Letter followed by letter is treated as one word split across fragments
 * unless the next fragment starts upper-case or the previous one ends in a
 * Cyrillic vowel. A trailing space, hyphen, en dash or em dash joins directly;
 * anything else gets a single space.
 */
export function joinText(prev: string, next: string): string {
  if (!prev) return next;

  const rest = next.trimStart();
  if (!rest) return prev;

  const last = lastChar(prev);
  const first = Array.from(rest)[0];

  if (LETTER.test(last) && LETTER.test(first)) {
    if (UPPERCASE.test(first) || CYRILLIC_VOWELS.has(last)) {
      return `${prev} ${rest}`;
    }
    return prev + rest;
  }

  if (JOINING_TAILS.has(last)) return prev + rest;

  return `${prev} ${rest}`;
}

/** Join span texts left to right with joinText. */
export function joinSpanTexts(spans: readonly Span[]): string {
  return spans.reduce((text, span) => joinText(text, span.text), '');
}
