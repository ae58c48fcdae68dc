/**
 * Detection endpoint.
 * POST /api/v1/detect: Detect and redact PII/PHI without contacting the agent
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import {
  optionalNumber,
  optionalString,
  readJsonObject,
  requiredString,
  validateBody,
  type JsonBody,
} from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { POLICY_MODES } from '../config.js';
import { MAX_QUERY_LENGTH, type ProcessOptions } from '../services/DetectionService.js';
import { highlightEntities } from '../services/RedactionRenderer.js';
import type { DetectRequest, DetectionResponse } from '../types/api.js';
import type { BodySchema } from '../types/common.js';
import type { DetectionResult, EntitySummary } from '../types/models.js';

export const detectSchema: BodySchema = {
  query: { type: 'string', required: true, nonEmpty: true, maxLength: MAX_QUERY_LENGTH },
  mode: { type: 'string', required: false, enum: POLICY_MODES },
  confidenceThreshold: { type: 'number', required: false, min: 0, max: 1 },
};

export function createDetectHandlers(container: Container) {
  const detect: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(detectSchema)
  )(async (req, _ctx) => {
    const request = readDetectRequest(await readJsonObject(req));

    const result = await container.detectionService.process(request.query, toProcessOptions(request));
    const summary = container.detectionService.summarize(result);

    return new Response(JSON.stringify(toDetectionResponse(result, summary)), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { detect };
}

export function readDetectRequest(body: JsonBody): DetectRequest {
  const rawMode = optionalString(body, 'mode');
  const mode = POLICY_MODES.find((m) => m === rawMode);
  const confidenceThreshold = optionalNumber(body, 'confidenceThreshold');

  return {
    query: requiredString(body, 'query'),
    ...(mode !== undefined && { mode }),
    ...(confidenceThreshold !== undefined && { confidenceThreshold }),
  };
}

/** Undefined when the request carries no overrides, so the service keeps its defaults. */
export function toProcessOptions(request: DetectRequest): ProcessOptions | undefined {
  if (request.mode === undefined && request.confidenceThreshold === undefined) return undefined;
  return {
    ...(request.mode !== undefined && { mode: request.mode }),
    ...(request.confidenceThreshold !== undefined && { confidenceThreshold: request.confidenceThreshold }),
  };
}

export function toDetectionResponse(result: DetectionResult, summary: EntitySummary): DetectionResponse {
  return {
    originalText: result.originalText,
    redactedText: result.redactedText,
    highlightedText: highlightEntities(result.originalText, result.entities),
    entities: result.entities.map((e) => ({
      category: e.category,
      subcategory: e.subcategory ?? null,
      text: e.text,
      startOffset: e.startOffset,
      length: e.length,
      confidenceScore: e.confidenceScore,
    })),
    hasPii: result.hasPii,
    shouldReject: result.shouldReject,
    summary,
  };
}
