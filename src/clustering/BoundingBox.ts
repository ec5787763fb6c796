/**
 * Bounding box helpers shared by every clustering stage.
 */

import type { BoundingBox, BoxSequence } from './types';

export const ZERO_BOX: Readonly<BoundingBox> = { top: 0, left: 0, bottom: 0, right: 0 };

/**
 * Build a box from an engine [x0, y0, x1, y1] sequence.
 * Missing or short sequences degrade to the zero box so one bad record
 * cannot abort a page.
 */
export function toBoundingBox(seq: BoxSequence | null | undefined): BoundingBox {
  if (!seq || seq.length < 4) return { ...ZERO_BOX };

  const [x0, y0, x1, y1] = seq;
  if (![x0, y0, x1, y1].every(Number.isFinite)) return { ...ZERO_BOX };

  return { top: y0, left: x0, bottom: y1, right: x1 };
}

/** Smallest box containing both; union with an absent box is the identity. */
export function unionBoxes(a: BoundingBox, b?: BoundingBox | null): BoundingBox {
  if (!b) return { ...a };
  return {
    top: Math.min(a.top, b.top),
    left: Math.min(a.left, b.left),
    bottom: Math.max(a.bottom, b.bottom),
    right: Math.max(a.right, b.right),
  };
}

export function boxCenter(box: BoundingBox): { x: number; y: number } {
  return { x: (box.left + box.right) / 2, y: (box.top + box.bottom) / 2 };
}

export function boxMidY(box: BoundingBox): number {
  return (box.top + box.bottom) / 2;
}

/**
 * Check whether `a`, grown by `pad` on every side, overlaps `b` with
 * non-zero area. Touching edges do not count.
 */
export function boxesIntersect(a: BoundingBox, b: BoundingBox, pad = 0): boolean {
  const left = a.left - pad;
  const top = a.top - pad;
  const right = a.right + pad;
  const bottom = a.bottom + pad;

  return (
    Math.min(right, b.right) - Math.max(left, b.left) > 0 &&
    Math.min(bottom, b.bottom) - Math.max(top, b.top) > 0
  );
}

/** Compare by top, then left (for reading-order sorts). */
export function compareTopLeft(a: BoundingBox, b: BoundingBox): number {
  return (a.top - b.top) || (a.left - b.left);
}
