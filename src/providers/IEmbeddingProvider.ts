/**
 * Embedding gateway interface.
 * Turns text into a fixed-length vector. Implementations must:
 *   - reject empty/whitespace text with InvalidInputError, without a network call
 *   - truncate over-long text (see truncateForEmbedding), never reject it
 *   - report transport/auth failures as GatewayUnavailableError
 */

export interface IEmbeddingProvider {
  /** Length of every vector this provider returns. */
  readonly dimensions: number;
  /** External model identifier, e.g. "text-embedding-3-small". */
  readonly model: string;

  generate(text: string): Promise<number[]>;
}
