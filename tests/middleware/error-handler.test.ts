import { describe, it, expect } from 'vitest';
import { errorHandler } from '../../src/middleware/error-handler.js';
import {
  ConfigurationError,
  GroundingTimeoutError,
  NotFoundError,
  RejectionError,
  ServiceError,
  ThreadBusyError,
  ValidationError,
} from '../../src/errors.js';
import type { Handler, HandlerContext } from '../../src/middleware/pipeline.js';

describe('errorHandler', () => {
  const ctx: HandlerContext = { requestId: null };
  const req = new Request('http://test');

  function throwing(err: unknown): Handler {
    return async () => {
      throw err;
    };
  }

  it('should pass through successful responses', async () => {
    const handler: Handler = async () => new Response('{"ok":true}', { status: 200 });

    const res = await errorHandler(handler)(req, ctx);

    expect(res.status).toBe(200);
  });

  it('should map ValidationError to 400 with details', async () => {
    const res = await errorHandler(
      throwing(new ValidationError('query is required', { fields: ['query is required'] }))
    )(req, ctx);

    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: {
        code: 'INVALID_REQUEST',
        message: 'query is required',
        details: { fields: ['query is required'] },
      },
    });
  });

  it('should map NotFoundError to 404 without details', async () => {
    const res = await errorHandler(throwing(new NotFoundError('Thread "t" not found')))(req, ctx);

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: { code: 'NOT_FOUND', message: 'Thread "t" not found' } });
  });

  it('should map ThreadBusyError to 409', async () => {
    const res = await errorHandler(throwing(new ThreadBusyError('thread_1')))(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(409);
    expect(body.error.code).toBe('THREAD_BUSY');
    expect(body.error.details).toEqual({ threadId: 'thread_1' });
  });

  it('should map RejectionError to 422', async () => {
    const res = await errorHandler(throwing(new RejectionError(2)))(req, ctx);

    expect(res.status).toBe(422);
    expect((await res.json()).error.code).toBe('QUERY_REJECTED');
  });

  it('should map ConfigurationError to 500 with its reason', async () => {
    const res = await errorHandler(
      throwing(new ConfigurationError('MISSING_SETTING', 'AZURE_LANGUAGE_KEY is required'))
    )(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(500);
    expect(body.error.code).toBe('CONFIGURATION_ERROR');
    expect(body.error.details).toEqual({ reason: 'MISSING_SETTING' });
  });

  it('should add Retry-After to retryable service errors', async () => {
    const res = await errorHandler(
      throwing(new ServiceError('detection', 'Detection service unreachable', true))
    )(req, ctx);

    expect(res.status).toBe(503);
    expect(res.headers.get('Retry-After')).toBe('5');
  });

  it('should not add Retry-After to permanent service errors', async () => {
    const res = await errorHandler(
      throwing(new ServiceError('agent', 'Agent service error (401): Invalid key', false))
    )(req, ctx);

    expect(res.status).toBe(503);
    expect(res.headers.get('Retry-After')).toBeNull();
  });

  it('should map GroundingTimeoutError to 504', async () => {
    const res = await errorHandler(throwing(new GroundingTimeoutError('run_1', 60000)))(req, ctx);
    const body = await res.json();

    expect(res.status).toBe(504);
    expect(body.error).toEqual({
      code: 'TIMEOUT',
      message: 'Agent run "run_1" did not complete within 60000ms',
      details: { runId: 'run_1', timeoutMs: 60000 },
    });
  });

  it('should hide unknown errors behind a 500', async () => {
    const res = await errorHandler(throwing(new Error('secret internals')))(req, ctx);

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      error: { code: 'INTERNAL_ERROR', message: 'An unexpected error occurred' },
    });
  });
});
