/**
 * Input policy shared by the embedding providers.
 */

import { GatewayUnavailableError, InvalidInputError } from '../errors.js';

/**
 * 8000 code points stay below the 8191-token input limit of the OpenAI
 * embedding models even at one token per character.
 */
export const DEFAULT_MAX_INPUT_CHARS = 8000;

/**
 * Validate and truncate text before it is sent to an embedding model.
 * Keeps the first `maxChars` code points and drops the tail. Surrogate pairs
 * are never split.
 */
export function prepareEmbeddingInput(text: string, maxChars: number): string {
  if (text.trim().length === 0) {
    throw new InvalidInputError('Cannot embed empty text');
  }
  return truncateForEmbedding(text, maxChars);
}

export function truncateForEmbedding(text: string, maxChars: number): string {
  // Code units >= code points, so a short string needs no scan.
  if (text.length <= maxChars) return text;

  const codePoints = Array.from(text);
  if (codePoints.length <= maxChars) return text;
  return codePoints.slice(0, maxChars).join('');
}

/** A vector of the wrong length means the gateway broke its contract. */
export function assertVectorLength(
  gateway: string,
  vector: number[],
  dimensions: number
): number[] {
  if (vector.length !== dimensions) {
    throw new GatewayUnavailableError(
      gateway,
      `returned ${vector.length} dimensions, expected ${dimensions}`
    );
  }
  return vector;
}
