/**
 * Error handler middleware.
 * Catches errors thrown by handlers and maps them to structured JSON responses.
 * AppError subclasses get their status code and details; a cancelled request
 * becomes 499; unknown errors become 500.
 */

import { AppError, isAbortError } from '../errors.js';
import type { Handler } from './pipeline.js';
import type { ApiErrorResponse } from '../types/api.js';

const JSON_HEADERS = { 'Content-Type': 'application/json' };

/** Non-standard "client closed request" status. */
const CLIENT_CLOSED_REQUEST = 499;

export function errorHandler(next: Handler): Handler {
  return async (req, ctx) => {
    try {
      return await next(req, ctx);
    } catch (err) {
      if (err instanceof AppError) {
        const body: ApiErrorResponse = {
          error: {
            code: err.code,
            message: err.message,
            ...(err.details && { details: err.details }),
          },
        };

        return jsonResponse(body, err.statusCode);
      }

      if (isAbortError(err)) {
        return jsonResponse(
          {
            error: {
              code: 'REQUEST_CANCELLED',
              message: 'The request was cancelled before it completed',
            },
          },
          CLIENT_CLOSED_REQUEST
        );
      }

      // Unknown error: don't leak internals
      return jsonResponse(
        {
          error: {
            code: 'INTERNAL_ERROR',
            message: 'An unexpected error occurred',
          },
        },
        500
      );
    }
  };
}

function jsonResponse(body: ApiErrorResponse, status: number): Response {
  return new Response(JSON.stringify(body), { status, headers: JSON_HEADERS });
}
