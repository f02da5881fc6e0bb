/**
 * Voyage AI embedding provider.
 * Uses the Voyage API (OpenAI-compatible format) for voyage-4-lite (1024 dimensions).
 * No SDK dependency: uses native fetch.
 */

import type { IEmbeddingProvider } from './IEmbeddingProvider.js';
import {
  assertVectorLength,
  DEFAULT_MAX_INPUT_CHARS,
  prepareEmbeddingInput,
} from './embedding-input.js';
import { GatewayUnavailableError } from '../errors.js';

const API_URL = 'https://api.voyageai.com/v1/embeddings';
const DEFAULT_MODEL = 'voyage-4-lite';
const DEFAULT_DIMENSIONS = 1024;
const GATEWAY = 'Voyage embeddings';

interface VoyageEmbeddingData {
  object: string;
  embedding: number[];
  index: number;
}

interface VoyageEmbeddingResponse {
  object: string;
  data: VoyageEmbeddingData[];
  model: string;
  usage: { total_tokens: number };
}

export class VoyageEmbeddingProvider implements IEmbeddingProvider {
  private apiKey: string;
  readonly model: string;
  readonly dimensions: number;
  private readonly maxInputChars: number;

  constructor(opts: {
    apiKey: string;
    model?: string;
    dimensions?: number;
    maxInputChars?: number;
  }) {
    this.apiKey = opts.apiKey;
    this.model = opts.model ?? DEFAULT_MODEL;
    this.dimensions = opts.dimensions ?? DEFAULT_DIMENSIONS;
    this.maxInputChars = opts.maxInputChars ?? DEFAULT_MAX_INPUT_CHARS;
  }

  async generate(text: string): Promise<number[]> {
    const input = prepareEmbeddingInput(text, this.maxInputChars);
    const response = await this.callApi([input]);

    const first = response.data.find((d) => d.index === 0) ?? response.data[0];
    if (!first) {
      throw new GatewayUnavailableError(GATEWAY, 'response contained no embedding');
    }
    return assertVectorLength(GATEWAY, first.embedding, this.dimensions);
  }

  private async callApi(input: string[]): Promise<VoyageEmbeddingResponse> {
    const body: Record<string, unknown> = {
      input,
      model: this.model,
      input_type: 'document',
      truncation: false,
    };

    // Only include output_dimension for non-default values
    if (this.dimensions !== DEFAULT_DIMENSIONS) {
      body.output_dimension = this.dimensions;
    }

    let res: Response;
    try {
      res = await fetch(API_URL, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(body),
      });
    } catch (err) {
      throw new GatewayUnavailableError(
        GATEWAY,
        err instanceof Error ? err.message : String(err),
        err
      );
    }

    if (!res.ok) {
      const err: unknown = await res.json().catch(() => ({}));
      const detail =
        typeof err === 'object' && err !== null && 'detail' in err
          ? String(err.detail)
          : 'Unknown error';
      throw new GatewayUnavailableError(GATEWAY, `HTTP ${res.status}: ${detail}`);
    }

    return (await res.json()) as VoyageEmbeddingResponse;
  }
}
