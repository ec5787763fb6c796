import type { Block, BoundingBox } from './types';

const ENTRY_SEPARATOR = '\n\n---\n\n';

/** [left, top, right, bottom], the order most PDF tooling prints boxes in */
export function toBoxTuple(bbox: BoundingBox): [number, number, number, number] {
  return [bbox.left, bbox.top, bbox.right, bbox.bottom];
}

/**
 * Plain-text report: one "[n]\ntext" entry per block, 1-based, separated by
 * horizontal rules. Blocks with blank text are left out but keep their number.
 */
export function formatBlockReport(blocks: readonly Block[]): string {
  const parts: string[] = [];
  blocks.forEach((block, idx) => {
    const text = block.text.trim();
    if (!text) return;
    parts.push(`[${idx + 1}]\n${text}`);
  });
  return parts.join(ENTRY_SEPARATOR).trim();
}
