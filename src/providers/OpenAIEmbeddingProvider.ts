/**
 * OpenAI embedding provider.
 * Wraps the OpenAI API for text-embedding-3-small (1536 dimensions).
 */

import OpenAI from 'openai';
import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import {
  assertVectorLength,
  DEFAULT_MAX_INPUT_CHARS,
  prepareEmbeddingInput,
} from './embedding-input.js';
import { GatewayUnavailableError } from '../errors.js';

const DEFAULT_MODEL = 'text-embedding-3-small';
const DEFAULT_DIMENSIONS = 1536;
const GATEWAY = 'OpenAI embeddings';

export class OpenAIEmbeddingProvider implements IEmbeddingProvider {
  private client: OpenAI;
  readonly model: string;
  readonly dimensions: number;
  private readonly maxInputChars: number;

  constructor(opts: {
    apiKey: string;
    model?: string;
    dimensions?: number;
    maxInputChars?: number;
  }) {
    // Retries belong to the ingestion pipeline, not the SDK
    this.client = new OpenAI({ apiKey: opts.apiKey, maxRetries: 0 });
    this.model = opts.model ?? DEFAULT_MODEL;
    this.dimensions = opts.dimensions ?? DEFAULT_DIMENSIONS;
    this.maxInputChars = opts.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
  }

  async generate(text: string): Promise<number[]> {
    const input = prepareEmbeddingInput(text, this.maxInputChars);

    let response: OpenAI.CreateEmbeddingResponse;
    try {
      response = await this.client.embeddings.create({
        model: this.model,
        input,
        dimensions: this.dimensions,
      });
    } catch (err) {
      throw new GatewayUnavailableError(
        GATEWAY,
        err instanceof Error ? err.message : String(err),
        err
      );
    }

    const first = response.data[0];
    if (!first) {
      throw new GatewayUnavailableError(GATEWAY, 'response contained no embedding');
    }
    return assertVectorLength(GATEWAY, first.embedding, this.dimensions);
  }
}
