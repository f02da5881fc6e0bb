/**
 * Stats endpoint.
 * GET /api/v1/stats: Record count and store-wide embedding dimension
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { StatsResponse } from '../types/api.js';

export function createStatsHandlers(container: Container) {
  const getStats: Handler = pipeline(container.logging, errorHandler)(async (_req, _ctx) => {
    const stats: StatsResponse = await container.feedbackStore.stats();

    return new Response(JSON.stringify(stats), {
      status: 200,
      headers: {
        'Content-Type': 'application/json',
        'Cache-Control': 'public, max-age=60',
      },
    });
  });

  return { getStats };
}
