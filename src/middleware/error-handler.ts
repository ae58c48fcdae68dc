/**
 * Error handler middleware.
 * Maps AppError subclasses to structured JSON responses with their status and
 * details. Transient service errors get a Retry-After hint; unknown errors
 * become 500 without leaking internals.
 */

import { AppError, ServiceError } from '../errors.js';
import type { Handler } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };
const RETRY_AFTER_SECONDS = 5;

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        const body: ApiErrorResponse = {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details && { details: err.details }),
          },
        };

        const headers: Record<string, string> = { ...JSON_HEADERS };

        if (err instanceof ServiceError && err.retryable) {
          headers['Retry-After'] = String(RETRY_AFTER_SECONDS);
        }

        return new Response(JSON.stringify(body), {
          status: err.statusCode,
          headers,
        });
      }

      const body: ApiErrorResponse = {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
        },
      };

      return new Response(JSON.stringify(body), {
        status: 500,
        headers: JSON_HEADERS,
      });
    }
  };
}
