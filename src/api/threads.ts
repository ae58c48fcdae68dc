/**
 * Thread endpoints.
 * DELETE /api/v1/threads/:id: Delete a conversation thread (409 while a run is in flight)
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import { ValidationError } from '../errors.js';

export function createThreadHandlers(container: Container) {
  const del: Handler = pipeline(container.logging, errorHandler)(async (req, _ctx) => {
    const url = new URL(req.url);
    const parts = url.pathname.split('/').filter((p) => p.length > 0);
    const id = decodeThreadId(parts[parts.length - 1] ?? '');
    if (id.length === 0) throw new ValidationError('thread id is required');

    await container.orchestrator.deleteThread(id);

    return new Response(null, { status: 204 });
  });

  return { delete: del };
}

function decodeThreadId(segment: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (err) {
    if (err instanceof URIError) throw new ValidationError('thread id is malformed');
    throw err;
  }
}
