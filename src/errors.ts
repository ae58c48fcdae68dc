/**
 * Application error hierarchy.
 * Every fault the core raises is an AppError carrying a stable code and an
 * HTTP status, so the error handler middleware can map it without guessing.
 *
 * A policy rejection is NOT an error: it is reported through
 * DetectionResult.shouldReject. RejectionError only guards the orchestrator
 * against being handed a rejected result.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_REQUEST', 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export type ConfigurationErrorReason =
  | 'MISSING_SETTING'
  | 'INVALID_MODE'
  | 'THRESHOLD_OUT_OF_RANGE'
  | 'UNSUPPORTED_DOMAIN'
  | 'INVALID_BOOLEAN'
  | 'INVALID_NUMBER'
  | 'INVALID_LOG_LEVEL';

/** Fatal for the current request. Raised before any partial processing. */
export class ConfigurationError extends AppError {
  constructor(
    readonly reason: ConfigurationErrorReason,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'CONFIGURATION_ERROR', 500, { reason, ...details });
  }
}

/**
 * Detection or agent service unreachable, throttled or answering garbage.
 * Recoverable by caller-level retry; the core never retries.
 */
export class ServiceError extends AppError {
  constructor(
    readonly service: 'detection' | 'agent',
    message: string,
    readonly retryable: boolean,
    details?: Record<string, unknown>
  ) {
    super(message, 'SERVICE_UNAVAILABLE', 503, { service, retryable, ...details });
  }
}

export class RejectionError extends AppError {
  constructor(entityCount: number) {
    super(
      'Query contains PII/PHI and the reject policy forbids forwarding it',
      'QUERY_REJECTED',
      422,
      { entityCount }
    );
  }
}

export class ThreadBusyError extends AppError {
  constructor(threadId: string) {
    super(
      `Thread "${threadId}" already has a run in progress`,
      'THREAD_BUSY',
      409,
      { threadId }
    );
  }
}

/** Detection succeeded but the agent stage did not produce an answer. */
export class GroundingError extends AppError {
  constructor(
    message: string,
    details?: Record<string, unknown>,
    code: ErrorCode = 'GROUNDING_FAILED',
    statusCode = 502
  ) {
    super(message, code, statusCode, details);
  }
}

export class GroundingTimeoutError extends GroundingError {
  constructor(runId: string, timeoutMs: number) {
    super(
      `Agent run "${runId}" did not complete within ${timeoutMs}ms`,
      { runId, timeoutMs },
      'TIMEOUT',
      504
    );
  }
}

/** Whether the same request may succeed if the caller sends it again. */
export function isRetryable(err: AppError): boolean {
  if (err instanceof ServiceError) return err.retryable;
  return err instanceof GroundingTimeoutError || err instanceof ThreadBusyError;
}
