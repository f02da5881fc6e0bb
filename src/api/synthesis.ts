/**
 * Synthesis endpoints.
 * POST /api/v1/analysis: Retrieve evidence, then a grounded PM analysis
 * POST /api/v1/brief: Retrieve evidence, then a grounded weekly brief
 *
 * Evidence always comes from retrieval in the same request; clients cannot
 * supply their own.
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody } from '../middleware/validate-body.js';
import type { Handler, HandlerContext } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { SynthesisResponse } from '../types/api.js';
import type { SynthesisKind } from '../types/models.js';
import { queryFilterSchema, readQueryFilter } from './retrieve.js';
import { readJsonBody } from './body.js';

export function createSynthesisHandlers(container: Container) {
  const wrap = pipeline(
    container.logging,
    errorHandler,
    validateBody(queryFilterSchema(container.limits.maxTopK))
  );

  const synthesize = async (
    kind: SynthesisKind,
    req: Request,
    ctx: HandlerContext
  ): Promise<Response> => {
    const filter = readQueryFilter(await readJsonBody(req));
    const evidence = await container.retrievalService.retrieve(filter, {
      signal: ctx.signal,
    });
    ctx.signal?.throwIfAborted();

    const synthesis =
      kind === 'analysis'
        ? await container.synthesisService.analyze(evidence)
        : await container.synthesisService.weeklyBrief(evidence);

    const result: SynthesisResponse = { evidence, synthesis };
    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  };

  const analysis: Handler = wrap((req, ctx) => synthesize('analysis', req, ctx));
  const brief: Handler = wrap((req, ctx) => synthesize('weekly_brief', req, ctx));

  return { analysis, brief };
}
