/**
 * Policy decision engine.
 * Evaluated exactly once per query; the result depends only on its inputs.
 * When the query proceeds, the text forwarded is always
 * DetectionResult.redactedText.
 */

import type { PolicyMode, ResolvedEntitySet } from '../types/models.js';

export interface PolicyDecision {
  readonly shouldReject: boolean;
}

export function decidePolicy(entities: ResolvedEntitySet, mode: PolicyMode): PolicyDecision {
  return { shouldReject: mode === 'reject' && entities.length > 0 };
}
