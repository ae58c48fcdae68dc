/**
 * Guarded question endpoint.
 * POST /api/v1/ask: Detect, apply the policy, then ground the redacted query
 *
 * A rejected query is a 200 with response: null. Any agent-stage failure is a
 * 200 carrying groundingError next to the still valid detection result.
 */

import { isRetryable } from '../errors.js';
import { pipeline, errorHandler } from '../middleware/index.js';
import { optionalString, readJsonObject, validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { formatCitationsMarkdown } from '../services/CitationExtractor.js';
import type { AskRequest, AskResponse, GroundedAnswerResponse } from '../types/api.js';
import type { BodySchema } from '../types/common.js';
import type { GroundedResponse } from '../types/models.js';
import { detectSchema, readDetectRequest, toDetectionResponse, toProcessOptions } from './detect.js';

const askSchema: BodySchema = {
  ...detectSchema,
  threadId: { type: 'string', required: false, nonEmpty: true, maxLength: 256 },
};

export function createAskHandlers(container: Container) {
  const ask: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(askSchema)
  )(async (req, _ctx) => {
    const body = await readJsonObject(req);
    const threadId = optionalString(body, 'threadId');
    const request: AskRequest = {
      ...readDetectRequest(body),
      ...(threadId !== undefined && { threadId }),
    };

    const outcome = await container.guardedQueryService.ask(
      request.query,
      request.threadId,
      toProcessOptions(request)
    );

    const payload: AskResponse = {
      detection: toDetectionResponse(outcome.detection, outcome.summary),
      response: outcome.response && toAnswerResponse(outcome.response),
      groundingError: outcome.groundingError && {
        code: outcome.groundingError.code,
        message: outcome.groundingError.message,
        retryable: isRetryable(outcome.groundingError),
      },
    };

    return new Response(JSON.stringify(payload), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { ask };
}

function toAnswerResponse(response: GroundedResponse): GroundedAnswerResponse {
  return {
    answerText: response.answerText,
    citations: response.citations.map((c) => ({ url: c.url, title: c.title, position: c.position })),
    citationsMarkdown: formatCitationsMarkdown(response.citations),
    threadId: response.threadId,
    runId: response.runId,
    groundingUsed: response.groundingUsed,
  };
}
