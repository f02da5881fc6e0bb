/**
 * Application error taxonomy.
 * Every error a component raises on purpose extends AppError, which carries
 * the wire code and HTTP status the error handler maps it to.
 */

import type { ErrorCode } from './types/api.js';

export class AppError extends Error {
  constructor(
    readonly code: ErrorCode,
    message: string,
    readonly statusCode: number,
    readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Malformed query or row. User-correctable, never retried. */
export class InvalidInputError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('INVALID_INPUT', message, 400, details);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super('NOT_FOUND', message, 404);
  }
}

/** Embedding length differs from the store-wide dimension. */
export class DimensionMismatchError extends AppError {
  constructor(readonly expected: number, readonly actual: number) {
    super(
      'DIMENSION_MISMATCH',
      `Embedding has ${actual} dimensions, store expects ${expected}`,
      409,
      { expected, actual }
    );
  }
}

/** Transport, HTTP or auth failure talking to a hosted model. */
export class GatewayUnavailableError extends AppError {
  constructor(gateway: string, message: string, cause?: unknown) {
    super(
      'GATEWAY_UNAVAILABLE',
      `${gateway} unavailable: ${message}`,
      503,
      { gateway },
      { cause }
    );
  }
}

export function isAbortError(err: unknown): boolean {
  return (
    err instanceof Error &&
    (err.name === 'AbortError' || err.name === 'TimeoutError')
  );
}
