/**
 * Watermark Detector — textual page-furniture heuristics
 *
 * Scores every span on the page against four signals:
 *   URL_TEXT    text contains a domain-like token
 *   EMAIL_TEXT  text contains an e-mail address
 *   LINK_HIT    span box overlaps a hyperlink hot-spot
 *   NEAR_WHITE  text colour is at or above the near-white threshold (opt-in)
 *
 * Only spans with at least one strong signal (URL, email, link) become
 * candidates; near-white text alone is not enough. The candidates are turned
 * into a WatermarkMask that the pipeline applies once, before clustering.
 */

import { boxesIntersect, toBoundingBox } from './BoundingBox';
import { DEFAULT_WATERMARK_OPTIONS, type WatermarkOptions } from './config';
import type {
  BoundingBox,
  PageLink,
  SpanRecord,
  WatermarkCandidate,
  WatermarkMask,
  WatermarkSignal,
} from './types';

/** Standalone detection enables the colour hint unless told otherwise */
const STANDALONE_DEFAULTS: WatermarkOptions = { ...DEFAULT_WATERMARK_OPTIONS, useColorHint: true };

/** Copy of `pattern` without the g and y flags, under which `test` advances lastIndex */
function statelessPattern(pattern: RegExp): RegExp {
  if (!pattern.global && !pattern.sticky) return pattern;
  return new RegExp(pattern.source, pattern.flags.replace(/[gy]/g, ''));
}

function collectLinkBoxes(links: readonly PageLink[], externalLinksOnly: boolean): BoundingBox[] {
  const boxes: BoundingBox[] = [];
  for (const link of links) {
    if (externalLinksOnly && !link.uri) continue;
    if (!link.bbox) continue;
    boxes.push(toBoundingBox(link.bbox));
  }
  return boxes;
}

/**
 * Find spans that look like watermarks, strongest first.
 * Ties are broken top-to-bottom, then left-to-right.
 */
export function findWatermarkCandidates(
  records: readonly SpanRecord[],
  links: readonly PageLink[],
  options: Partial<WatermarkOptions> = {},
): WatermarkCandidate[] {
  const opts: WatermarkOptions = { ...STANDALONE_DEFAULTS, ...options };
  const linkBoxes = collectLinkBoxes(links, opts.externalLinksOnly);
  const domainPattern = statelessPattern(opts.domainPattern);
  const emailPattern = statelessPattern(opts.emailPattern);

  const candidates: WatermarkCandidate[] = [];

  for (const record of records) {
    const text = record.text.trim();
    if (!text) continue;

    const bbox = toBoundingBox(record.bbox);
    const color = record.color ?? 0;

    const hasUrl = domainPattern.test(text);
    const hasEmail = emailPattern.test(text);
    const linkHit = linkBoxes.some(linkBox => boxesIntersect(bbox, linkBox));
    const nearWhite = opts.useColorHint && color >= opts.nearWhiteThreshold;

    const signals: WatermarkSignal[] = [];
    if (hasUrl) signals.push('URL_TEXT');
    if (hasEmail) signals.push('EMAIL_TEXT');
    if (linkHit) signals.push('LINK_HIT');
    if (nearWhite) signals.push('NEAR_WHITE');

    const strong = Number(hasUrl) + Number(hasEmail) + Number(linkHit);
    if (strong === 0) continue;

    candidates.push({
      bbox,
      text,
      signals,
      score: strong * opts.strongWeight + Number(nearWhite),
    });
  }

  return candidates.sort((a, b) =>
    (b.score - a.score) || (a.bbox.top - b.bbox.top) || (a.bbox.left - b.bbox.left),
  );
}

/** Collect candidate boxes into the mask applied before clustering. */
export function buildWatermarkMask(
  records: readonly SpanRecord[],
  links: readonly PageLink[],
  options: WatermarkOptions,
): WatermarkMask {
  const candidates = findWatermarkCandidates(records, links, options);
  return {
    boxes: candidates.map(c => c.bbox),
    padding: options.padding,
  };
}

export function isMaskedSpan(mask: WatermarkMask, bbox: BoundingBox): boolean {
  if (mask.boxes.length === 0) return false;
  return mask.boxes.some(box => boxesIntersect(bbox, box, mask.padding));
}
