/**
 * API router.
 * Maps HTTP method + path pattern to handlers.
 * Framework-agnostic: works with any Request/Response based runtime.
 */

import type { Container } from '../container.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import { errorHandler } from '../middleware/error-handler.js';
import { NotFoundError } from '../errors.js';
import { createRetrieveHandlers } from './retrieve.js';
import { createSynthesisHandlers } from './synthesis.js';
import { createIngestHandlers } from './ingest.js';
import { createStatsHandlers } from './stats.js';

interface Route {
  method: string;
  pattern: RegExp;
  handler: Handler;
}

export function createRouter(container: Container) {
  const retrieval = createRetrieveHandlers(container);
  const synthesis = createSynthesisHandlers(container);
  const ingestion = createIngestHandlers(container);
  const stats = createStatsHandlers(container);

  const routes: Route[] = [
    // Retrieval & grounding
    { method: 'POST', pattern: /^\/api\/v1\/retrieve\/?$/, handler: retrieval.retrieve },
    { method: 'POST', pattern: /^\/api\/v1\/analysis\/?$/, handler: synthesis.analysis },
    { method: 'POST', pattern: /^\/api\/v1\/brief\/?$/, handler: synthesis.brief },

    // Ingestion
    { method: 'POST', pattern: /^\/api\/v1\/ingest\/?$/, handler: ingestion.ingest },

    // Store
    { method: 'GET', pattern: /^\/api\/v1\/stats\/?$/, handler: stats.getStats },
  ];

  const notFound: Handler = errorHandler(async (req) => {
    throw new NotFoundError(`No route matches ${req.method} ${new URL(req.url).pathname}`);
  });

  const handle: Handler = async (req: Request, ctx: HandlerContext) => {
    const url = new URL(req.url);
    const method = req.method;

    // CORS preflight
    if (method === 'OPTIONS') {
      return new Response(null, {
        status: 204,
        headers: corsHeaders(),
      });
    }

    for (const route of routes) {
      if (route.method === method && route.pattern.test(url.pathname)) {
        const response = await route.handler(req, ctx);
        return addCorsHeaders(response);
      }
    }

    // Check if path matches but method doesn't
    const pathMatches = routes.some((r) => r.pattern.test(url.pathname));
    if (pathMatches) {
      const allowed = routes
        .filter((r) => r.pattern.test(url.pathname))
        .map((r) => r.method)
        .join(', ');

      return new Response(
        JSON.stringify({
          error: {
            code: 'INVALID_INPUT',
            message: `Method ${method} not allowed`,
          },
        }),
        {
          status: 405,
          headers: {
            'Content-Type': 'application/json',
            Allow: allowed,
            ...corsHeaders(),
          },
        }
      );
    }

    return addCorsHeaders(await notFound(req, ctx));
  };

  return { handle, routes };
}

function corsHeaders(): Record<string, string> {
  return {
    'Access-Control-Allow-Origin': '*',
    'Access-Control-Allow-Methods': 'GET, POST, OPTIONS',
    'Access-Control-Allow-Headers': 'Content-Type',
    'Access-Control-Max-Age': '86400',
  };
}

function addCorsHeaders(response: Response): Response {
  const headers = new Headers(response.headers);
  for (const [key, value] of Object.entries(corsHeaders())) {
    headers.set(key, value);
  }
  return new Response(response.body, {
    status: response.status,
    statusText: response.statusText,
    headers,
  });
}
