/**
 * Typed reads from a JSON body that validateBody has already checked.
 * Each reader re-narrows the value so handlers never cast.
 */

import { InvalidInputError } from '../errors.js';
import { isJsonObject } from '../middleware/validate-body.js';

export type JsonBody = Record<string, unknown>;

export async function readJsonBody(req: Request): Promise<JsonBody> {
  const parsed: unknown = await req.json();
  if (!isJsonObject(parsed)) {
    throw new InvalidInputError('Request body must be a JSON object');
  }
  return parsed;
}

export function stringField(body: JsonBody, field: string): string {
  const value = body[field];
  if (typeof value !== 'string') {
    throw new InvalidInputError(`${field} must be a string`, { field });
  }
  return value;
}

export function optionalString(body: JsonBody, field: string): string | null | undefined {
  const value = body[field];
  if (value === undefined || value === null) return value;
  return stringField(body, field);
}

export function optionalNumber(body: JsonBody, field: string): number | null | undefined {
  const value = body[field];
  if (value === undefined || value === null) return value;
  if (typeof value !== 'number') {
    throw new InvalidInputError(`${field} must be a number`, { field });
  }
  return value;
}
