/**
 * Runtime configuration.
 * Read once from the environment into an explicit value that is handed to
 * each component; nothing downstream reads process.env.
 */

export type EmbeddingProviderName = 'openai' | 'voyage';

export interface AppConfig {
  embedding: {
    provider: EmbeddingProviderName;
    /** Undefined means the provider's default model. */
    model?: string;
    /** Expected vector length; also pins the store-wide dimension. */
    dimension?: number;
    /** Exact-text cache entries; 0 disables the cache. */
    cacheSize: number;
  };
  retrieval: {
    maxTopK: number;
    defaultTopK: number;
  };
  ingestion: {
    concurrency: number;
    maxRetries: number;
    retryBaseDelayMs: number;
  };
  generation: {
    model?: string;
  };
  credentials: {
    openaiApiKey?: string;
    voyageApiKey?: string;
    supabaseUrl?: string;
    supabaseServiceRoleKey?: string;
    axiomApiKey?: string;
    axiomDataset?: string;
  };
}

export const DEFAULT_MAX_TOP_K = 15;
export const DEFAULT_TOP_K = 6;

type Env = Record<string, string | undefined>;

export function loadConfig(env: Env = process.env): AppConfig {
  const provider = readString(env, 'EMBEDDING_PROVIDER') ?? 'openai';
  if (provider !== 'openai' && provider !== 'voyage') {
    throw new Error(
      `EMBEDDING_PROVIDER must be "openai" or "voyage", got "${provider}"`
    );
  }

  const maxTopK = readInt(env, 'MAX_TOP_K', DEFAULT_MAX_TOP_K, 1);
  const defaultTopK = readInt(env, 'DEFAULT_TOP_K', Math.min(DEFAULT_TOP_K, maxTopK), 1);
  if (defaultTopK > maxTopK) {
    throw new Error(`DEFAULT_TOP_K (${defaultTopK}) exceeds MAX_TOP_K (${maxTopK})`);
  }

  const dimensionRaw = readString(env, 'EMBEDDING_DIMENSIONS');

  return {
    embedding: {
      provider,
      model: readString(env, 'EMBEDDING_MODEL'),
      dimension:
        dimensionRaw === undefined
          ? undefined
          : readInt(env, 'EMBEDDING_DIMENSIONS', 0, 1),
      cacheSize: readInt(env, 'EMBEDDING_CACHE_SIZE', 0, 0),
    },
    retrieval: { maxTopK, defaultTopK },
    ingestion: {
      concurrency: readInt(env, 'INGEST_CONCURRENCY', 1, 1),
      maxRetries: readInt(env, 'INGEST_MAX_RETRIES', 3, 0),
      retryBaseDelayMs: readInt(env, 'INGEST_RETRY_BASE_MS', 500, 0),
    },
    generation: {
      model: readString(env, 'GENERATION_MODEL'),
    },
    credentials: {
      openaiApiKey: readString(env, 'OPENAI_API_KEY'),
      voyageApiKey: readString(env, 'VOYAGE_API_KEY'),
      supabaseUrl: readString(env, 'SUPABASE_URL'),
      supabaseServiceRoleKey: readString(env, 'SUPABASE_SERVICE_ROLE_KEY'),
      axiomApiKey: readString(env, 'AXIOM_API_KEY'),
      axiomDataset: readString(env, 'AXIOM_DATASET'),
    },
  };
}

/** Blank values count as unset. */
function readString(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readInt(env: Env, name: string, fallback: number, min: number): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  if (!/^\d+$/.test(raw)) {
    throw new Error(`${name} must be a non-negative integer, got "${raw}"`);
  }
  const value = Number(raw);
  if (value < min) {
    throw new Error(`${name} must be at least ${min}, got ${value}`);
  }
  return value;
}
