/**
 * Retrieval endpoint.
 * POST /api/v1/retrieve: Evidence for a question, without synthesis
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { QueryFilter } from '../types/models.js';
import type { RetrieveResponse } from '../types/api.js';
import { MAX_RATING, MIN_RATING } from '../types/models.js';
import { renderEvidenceListing } from '../grounding/serialize.js';
import { topSimilarity } from '../grounding/evidence-set.js';
import { optionalNumber, optionalString, readJsonBody, stringField, type JsonBody } from './body.js';

/** Shared by /retrieve, /analysis and /brief. */
export function queryFilterSchema(maxTopK: number): BodySchema {
  return {
    queryText: { type: 'string', required: true },
    topK: { type: 'integer', min: 1, max: maxTopK },
    country: { type: 'string', nullable: true, maxLength: 100 },
    platform: { type: 'string', nullable: true, maxLength: 100 },
    minRating: { type: 'number', nullable: true, min: MIN_RATING, max: MAX_RATING },
  };
}

export function readQueryFilter(body: JsonBody): QueryFilter {
  return {
    queryText: stringField(body, 'queryText'),
    topK: optionalNumber(body, 'topK') ?? undefined,
    country: optionalString(body, 'country'),
    platform: optionalString(body, 'platform'),
    minRating: optionalNumber(body, 'minRating'),
  };
}

export function createRetrieveHandlers(container: Container) {
  const retrieve: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(queryFilterSchema(container.limits.maxTopK))
  )(async (req, ctx) => {
    const filter = readQueryFilter(await readJsonBody(req));
    const evidence = await container.retrievalService.retrieve(filter, {
      signal: ctx.signal,
    });

    const result: RetrieveResponse = {
      evidence,
      listing: renderEvidenceListing(evidence),
      matches: evidence.items.length,
      topSimilarity: topSimilarity(evidence),
    };

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { retrieve };
}
