/**
 * Ingestion endpoint.
 * POST /api/v1/ingest: Embed and store a batch of feedback rows
 *
 * Rejected rows are reported in the response; the request only fails when
 * the whole batch cannot proceed.
 */

import { pipeline, errorHandler } from '../middleware/index.js';
import { validateBody, isJsonObject } from '../middleware/validate-body.js';
import type { Handler } from '../middleware/pipeline.js';
import type { Container } from '../container.js';
import type { BodySchema } from '../types/common.js';
import type { IngestResponse } from '../types/api.js';
import type { RawFeedbackRow } from '../types/models.js';
import { InvalidInputError } from '../errors.js';
import { readJsonBody } from './body.js';

export const MAX_INGEST_ROWS = 500;

const ingestSchema: BodySchema = {
  rows: { type: 'array', required: true, maxLength: MAX_INGEST_ROWS },
};

export function createIngestHandlers(container: Container) {
  const ingest: Handler = pipeline(
    container.logging,
    errorHandler,
    validateBody(ingestSchema)
  )(async (req, ctx) => {
    const body = await readJsonBody(req);
    const rows = readRows(body.rows);

    const report = await container.ingestionService.ingest(rows, {
      signal: ctx.signal,
    });

    const result: IngestResponse = {
      stored: report.stored,
      ids: report.ids,
      failures: report.failures.map((failure) => ({
        index: failure.index,
        code: failure.error.code,
        message: failure.error.message,
      })),
    };

    return new Response(JSON.stringify(result), {
      status: 200,
      headers: { 'Content-Type': 'application/json' },
    });
  });

  return { ingest };
}

function readRows(value: unknown): RawFeedbackRow[] {
  if (!Array.isArray(value)) {
    throw new InvalidInputError('rows must be an array', { field: 'rows' });
  }
  return value.map((row: unknown, index) => {
    if (!isJsonObject(row)) {
      throw new InvalidInputError(`rows[${index}] must be an object`, {
        field: 'rows',
        index,
      });
    }
    return row;
  });
}
