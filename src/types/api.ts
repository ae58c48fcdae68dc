/**
 * API types: shapes for request/response payloads.
 * Dates are ISO strings; everything else mirrors the domain models.
 */

import type { Citation, EntitySummary, PolicyMode } from './models.js';

// ── Requests ──

export interface DetectRequest {
  query: string;
  mode?: PolicyMode;
  confidenceThreshold?: number;
}

export interface AskRequest extends DetectRequest {
  threadId?: string;
}

// ── Responses ──

export interface EntityResponse {
  category: string;
  subcategory: string | null;
  startOffset: number;
  length: number;
  confidenceScore: number;
}

/**
 * Detection payload. The original query and the entity texts are echoed back
 * only to the caller that sent them.
 */
export interface DetectionResponse {
  originalText: string;
  redactedText: string;
  highlightedText: string;
  entities: Array<EntityResponse & { text: string }>;
  hasPii: boolean;
  shouldReject: boolean;
  summary: EntitySummary;
}

export interface GroundedAnswerResponse {
  answerText: string;
  citations: Citation[];
  citationsMarkdown: string;
  threadId: string;
  runId: string;
  groundingUsed: boolean;
}

export interface AskResponse {
  detection: DetectionResponse;
  response: GroundedAnswerResponse | null;
  groundingError: {
    code: ErrorCode;
    message: string;
    retryable: boolean;
  } | null;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_REQUEST'
  | 'NOT_FOUND'
  | 'THREAD_BUSY'
  | 'QUERY_REJECTED'
  | 'CONFIGURATION_ERROR'
  | 'SERVICE_UNAVAILABLE'
  | 'GROUNDING_FAILED'
  | 'TIMEOUT'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
