/**
 * Netlify Function entry point.
 * Single function handles all /api/v1/* routes via the router.
 */

import type { Context } from '@netlify/functions';
import { createRouter } from '../../src/api/router.js';
import { getProductionContainer } from '../../src/container.production.js';

// Container is created once per cold start (shared across warm invocations)
let router: ReturnType<typeof createRouter> | null = null;

export default async (req: Request, context: Context) => {
  router ??= createRouter(getProductionContainer());
  return router.handle(req, { requestId: context.requestId, signal: req.signal });
};

export const config = {
  path: '/api/v1/*',
};
