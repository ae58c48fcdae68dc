/**
 * Confidence filter and span resolver.
 *
 * Sub-threshold candidates are erased outright: they take no part in overlap
 * resolution, redaction or the reject decision. Surviving candidates that
 * intersect are resolved by priority (confidence, then length, then earlier
 * start); the loser is discarded, never merged.
 *
 * Output is sorted by startOffset and pairwise disjoint.
 */

import { assertThreshold } from '../config.js';
import type { Entity, ResolvedEntitySet } from '../types/models.js';

export function resolveSpans(rawEntities: readonly Entity[], threshold: number): ResolvedEntitySet {
  assertThreshold(threshold);

  const candidates = rawEntities
    .filter((e) => e.confidenceScore >= threshold && e.length > 0)
    .sort(byPriority);

  const accepted: Entity[] = [];
  for (const candidate of candidates) {
    if (!accepted.some((kept) => overlaps(kept, candidate))) {
      accepted.push(candidate);
    }
  }

  return accepted.sort((a, b) => a.startOffset - b.startOffset);
}

export function overlaps(a: Entity, b: Entity): boolean {
  return a.startOffset < b.startOffset + b.length && b.startOffset < a.startOffset + a.length;
}

/** Winner first: higher confidence, then longer span, then earlier start. */
function byPriority(a: Entity, b: Entity): number {
  return (
    b.confidenceScore - a.confidenceScore ||
    b.length - a.length ||
    a.startOffset - b.startOffset
  );
}
