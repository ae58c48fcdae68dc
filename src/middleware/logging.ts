/**
 * Request logging middleware.
 * Records method, path, status and duration for every request. Bodies are
 * never logged: they carry the unredacted query.
 *
 * Level mapping: 2xx → info, 4xx → warn, 5xx and thrown errors → error.
 */

import type { ILogProvider, LogLevel, RequestLogEvent } from '../providers/ILogProvider.js';
import type { Handler, Middleware } from './pipeline.js';

function levelForStatus(status: number): LogLevel {
  if (status >= 500) return 'error';
  if (status >= 400) return 'warn';
  return 'info';
}

export function createLoggingMiddleware(logProvider: ILogProvider): Middleware {
  return (next: Handler): Handler => {
    return async (req, ctx) => {
      const method = req.method;
      const path = new URL(req.url).pathname;
      const start = performance.now();

      let status = 500;
      let failure: string | undefined;
      try {
        const response = await next(req, ctx);
        status = response.status;
        return response;
      } catch (err) {
        failure = err instanceof Error ? err.message : String(err);
        throw err;
      } finally {
        const durationMs = Math.round(performance.now() - start);
        const event: RequestLogEvent = {
          level: failure === undefined ? levelForStatus(status) : 'error',
          message: `${method} ${path} → ${status} (${durationMs}ms)`,
          method,
          path,
          status,
          durationMs,
          ...(failure !== undefined && { fields: { error: failure } }),
          ...(ctx.requestId && { requestId: ctx.requestId }),
        };
        logProvider.log(event);
      }
    };
  };
}
