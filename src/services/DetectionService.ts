/**
 * Detection pipeline: detect → validate spans → resolve → render → decide.
 *
 * Every query runs against its own frozen snapshot of the pipeline config.
 * Any failure aborts before a DetectionResult exists, so nothing downstream
 * can forward text whose detection did not complete.
 */

import { validatePipelineConfig, type PipelineConfig } from '../config.js';
import { ServiceError, ValidationError } from '../errors.js';
import type { IEntityDetectionProvider } from '../providers/IEntityDetectionProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type {
  DetectionResult,
  Entity,
  EntitySummary,
  PolicyMode,
  RawEntity,
} from '../types/models.js';
import { decidePolicy } from './PolicyEngine.js';
import { renderRedaction } from './RedactionRenderer.js';
import { resolveSpans } from './SpanResolver.js';

export const MAX_QUERY_LENGTH = 5000;

/** Per-query overrides, e.g. a UI session switching to reject mode. */
export interface ProcessOptions {
  mode?: PolicyMode;
  confidenceThreshold?: number;
}

export class DetectionService {
  constructor(
    private readonly detectionProvider: IEntityDetectionProvider,
    private readonly logProvider: ILogProvider,
    private readonly defaults: PipelineConfig
  ) {}

  async process(query: string, options?: ProcessOptions): Promise<DetectionResult> {
    if (query.trim().length === 0) {
      throw new ValidationError('query must not be empty');
    }
    if (query.length > MAX_QUERY_LENGTH) {
      throw new ValidationError(`query must be ${MAX_QUERY_LENGTH} characters or less`);
    }

    const config = this.snapshot(options);
    const start = performance.now();

    const raw = await this.detectionProvider.detect(query, config.domainFilter, config.language);
    const candidates = raw.map((r, i) => toEntity(query, r, i));
    const entities = resolveSpans(candidates, config.confidenceThreshold);
    const redactedText = renderRedaction(query, entities);
    const decision = decidePolicy(entities, config.mode);

    const result: DetectionResult = Object.freeze({
      originalText: query,
      redactedText,
      entities: Object.freeze(entities.map((e) => Object.freeze(e))),
      hasPii: entities.length > 0,
      shouldReject: decision.shouldReject,
    });

    this.logProvider.info('PII detection complete', {
      queryLength: query.length,
      candidateCount: candidates.length,
      entityCount: entities.length,
      categories: Object.keys(summarizeEntities(result)),
      mode: config.mode,
      threshold: config.confidenceThreshold,
      shouldReject: result.shouldReject,
      durationMs: Math.round(performance.now() - start),
    });

    return result;
  }

  summarize(result: DetectionResult): EntitySummary {
    return summarizeEntities(result);
  }

  private snapshot(options?: ProcessOptions): PipelineConfig {
    if (!options) return this.defaults;
    return validatePipelineConfig({
      ...this.defaults,
      ...(options.mode !== undefined && { mode: options.mode }),
      ...(options.confidenceThreshold !== undefined && {
        confidenceThreshold: options.confidenceThreshold,
      }),
    });
  }
}

export function summarizeEntities(result: DetectionResult): EntitySummary {
  const summary: Record<string, number> = {};
  for (const entity of result.entities) {
    summary[entity.category] = (summary[entity.category] ?? 0) + 1;
  }
  return summary;
}

/** Check a provider span against the text it was computed for. */
function toEntity(text: string, raw: RawEntity, index: number): Entity {
  const end = raw.offset + raw.length;
  const inBounds =
    Number.isInteger(raw.offset) &&
    Number.isInteger(raw.length) &&
    raw.offset >= 0 &&
    raw.length >= 0 &&
    end <= text.length;

  if (!inBounds) {
    throw new ServiceError('detection', `Entity ${index} span is outside the analysed text`, false, {
      offset: raw.offset,
      length: raw.length,
      textLength: text.length,
    });
  }

  if (text.slice(raw.offset, end) !== raw.text) {
    throw new ServiceError('detection', `Entity ${index} text does not match its span`, false, {
      offset: raw.offset,
      length: raw.length,
    });
  }

  if (!(raw.confidenceScore >= 0 && raw.confidenceScore <= 1)) {
    throw new ServiceError('detection', `Entity ${index} confidence is outside [0, 1]`, false, {
      confidenceScore: raw.confidenceScore,
    });
  }

  return {
    category: raw.category,
    ...(raw.subcategory !== undefined && { subcategory: raw.subcategory }),
    text: raw.text,
    startOffset: raw.offset,
    length: raw.length,
    confidenceScore: raw.confidenceScore,
  };
}
