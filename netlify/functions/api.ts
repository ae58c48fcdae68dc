/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 */

import { randomUUID } from 'node:crypto';
import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';
import { errorHandler } from '../../src/middleware/error-handler.js';
import type { Handler } from '../../src/middleware/pipeline.js';

let router: ReturnType<typeof createRouter> | null = null;

// Container is created once per cold start (shared across warm invocations).
// Configuration errors become a structured 500.
const handle: Handler = errorHandler(async (req, ctx) => {
  router ??= createRouter(getProductionContainer());
  return router.handle(req, ctx);
});

export default async (req: Request, context: Context) => {
  const response = await handle(req, { requestId: context.requestId || randomUUID() });
  if (router) await getProductionContainer().logProvider.flush();
  return response;
};

export const config = {
  path: '/api/v1/*',
};
