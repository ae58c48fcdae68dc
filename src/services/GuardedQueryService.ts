/**
 * End-to-end guarded query: detection first, grounding only when the policy
 * lets the query through. Any AppError from the agent stage is reported
 * alongside the detection result, which stays valid.
 */

import { AppError } from '../errors.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { DetectionResult, EntitySummary, GroundedResponse } from '../types/models.js';
import type { ConversationOrchestrator } from './ConversationOrchestrator.js';
import type { DetectionService, ProcessOptions } from './DetectionService.js';

export interface GuardedQueryOutcome {
  detection: DetectionResult;
  summary: EntitySummary;
  /** Null when the query was rejected or grounding failed. */
  response: GroundedResponse | null;
  /** Any AppError raised while grounding, e.g. NotFoundError for an unknown thread. */
  groundingError: AppError | null;
}

export class GuardedQueryService {
  constructor(
    private readonly detectionService: DetectionService,
    private readonly orchestrator: ConversationOrchestrator,
    private readonly logProvider: ILogProvider
  ) {}

  async ask(query: string, threadId?: string, options?: ProcessOptions): Promise<GuardedQueryOutcome> {
    const detection = await this.detectionService.process(query, options);
    const summary = this.detectionService.summarize(detection);

    if (detection.shouldReject) {
      this.logProvider.info('Query rejected by PII policy', {
        entityCount: detection.entities.length,
      });
      return { detection, summary, response: null, groundingError: null };
    }

    try {
      const response = await this.orchestrator.ground(detection, threadId);
      return { detection, summary, response, groundingError: null };
    } catch (err) {
      if (err instanceof AppError) {
        this.logProvider.warn('Grounding failed after detection', {
          code: err.code,
          ...(threadId !== undefined && { threadId }),
        });
        return { detection, summary, response: null, groundingError: err };
      }
      throw err;
    }
  }
}
