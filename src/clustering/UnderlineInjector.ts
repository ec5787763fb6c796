/**
 * Underline Injector — signature-line synthesis
 *
 * Approval and signature fields often draw their blank line as a vector rule
 * instead of typing underscores, so no span captures it. For every block that
 * reads like a role label ("Director", "Руководитель", ...) with no underscore
 * run already on its band, the first drawn horizontal rule beside the label is
 * turned into a placeholder span of underscores and appended as its own block.
 */

import { boxMidY } from './BoundingBox';
import { blockFromSpan } from './BlockAssembler';
import { buildLabelPattern, type UnderlineOptions } from './config';
import type { Block, DrawingPrimitive, HorizontalRule, Span } from './types';

/**
 * An underscore run long enough to stand for a drawn line: `minSegments` or
 * more consecutive underscores, or that many underscores separated only by
 * whitespace ("_ _ _ _").
 */
export function buildUnderlinePattern(minSegments: number): RegExp {
  const n = Math.max(0, Math.floor(minSegments));
  return new RegExp(`_{${n},}|_(?:\\s*_){${Math.max(0, n - 1)},}`);
}

/**
 * Normalize horizontal, long-enough rects and line segments into rules,
 * keeping drawing order.
 */
export function collectHorizontalRules(
  drawings: readonly DrawingPrimitive[],
  options: Pick<UnderlineOptions, 'drawingYTolerance' | 'drawingMinLength'>,
): HorizontalRule[] {
  const { drawingYTolerance, drawingMinLength } = options;
  const rules: HorizontalRule[] = [];

  for (const d of drawings) {
    let x0: number, y0: number, x1: number, y1: number;
    if (d.kind === 'rect') {
      ({ x0, y0, x1, y1 } = d);
    } else {
      ({ x: x0, y: y0 } = d.from);
      ({ x: x1, y: y1 } = d.to);
    }

    if (Math.abs(y0 - y1) > drawingYTolerance) continue;
    if (Math.abs(x1 - x0) < drawingMinLength) continue;

    rules.push({
      x0: Math.min(x0, x1),
      y0: Math.min(y0, y1),
      x1: Math.max(x0, x1),
      y1: Math.max(y0, y1),
    });
  }

  return rules;
}

function findRuleBesideLabel(label: Block, rules: readonly HorizontalRule[], options: UnderlineOptions): HorizontalRule | null {
  const { top, bottom, right } = label.bbox;
  const tol = options.sameLineYTolerance;

  for (const rule of rules) {
    const overlapsVertically = !(rule.y1 < top - tol || rule.y0 > bottom + tol);
    if (overlapsVertically && rule.x1 > right + options.rightMinGap) {
      return rule;
    }
  }
  return null;
}

function synthesizeUnderline(rule: HorizontalRule, options: UnderlineOptions): Span {
  const count = Math.max(options.minChars, Math.floor((rule.x1 - rule.x0) / options.pixelsPerChar));
  return {
    text: '_'.repeat(count),
    bbox: {
      top: rule.y0 - options.yPadding,
      left: rule.x0,
      bottom: rule.y1 + options.yPadding,
      right: rule.x1,
    },
    style: { ...options.placeholderStyle },
  };
}

/**
 * Return `blocks` plus one synthetic underline block per unmatched label.
 * The input list is not modified; with no usable rules it is returned as is.
 */
export function injectMissingUnderlines(
  blocks: Block[],
  drawings: readonly DrawingPrimitive[],
  options: UnderlineOptions,
): Block[] {
  const rules = collectHorizontalRules(drawings, options);
  if (rules.length === 0) return blocks;

  const labelPattern = buildLabelPattern(options.labelLocales, options.labelTerms);
  const underlinePattern = buildUnderlinePattern(options.minSegments);
  const result = [...blocks];

  for (const label of blocks) {
    if (!labelPattern.test(label.text)) continue;

    const labelMidY = boxMidY(label.bbox);
    const alreadyUnderlined = blocks.some(
      other =>
        Math.abs(boxMidY(other.bbox) - labelMidY) <= options.sameLineYTolerance &&
        underlinePattern.test(other.text),
    );
    if (alreadyUnderlined) continue;

    const rule = findRuleBesideLabel(label, rules, options);
    if (rule) {
      result.push(blockFromSpan(synthesizeUnderline(rule, options)));
    }
  }

  return result;
}
