/**
 * Production container: uses real Supabase + hosted model providers.
 * Fails fast when a credential the configuration needs is missing.
 */

import { createContainer, type Container } from './container.js';
import { loadConfig, type AppConfig } from './config.js';
import { getSupabaseClient } from './db.js';
import {
  AxiomLogProvider,
  CachingEmbeddingProvider,
  ConsoleLogProvider,
  OpenAIEmbeddingProvider,
  OpenAITextGenerationProvider,
  VoyageEmbeddingProvider,
  type IEmbeddingProvider,
  type ILogProvider,
} from './providers/index.js';
import { SupabaseFeedbackRepository } from './repositories/SupabaseFeedbackRepository.js';

let cached: Container | null = null;

export function getProductionContainer(config: AppConfig = loadConfig()): Container {
  if (cached) return cached;

  const { supabaseUrl, supabaseServiceRoleKey, openaiApiKey } = config.credentials;
  if (!supabaseUrl || !supabaseServiceRoleKey) {
    throw new Error(
      'Missing required environment variables: SUPABASE_URL, SUPABASE_SERVICE_ROLE_KEY'
    );
  }
  if (!openaiApiKey) {
    throw new Error('Missing required environment variable: OPENAI_API_KEY');
  }

  const db = getSupabaseClient(supabaseUrl, supabaseServiceRoleKey);

  cached = createContainer({
    feedbackRepo: new SupabaseFeedbackRepository(db),
    embeddingProvider: createEmbeddingProvider(config),
    textProvider: new OpenAITextGenerationProvider({
      apiKey: openaiApiKey,
      model: config.generation.model,
    }),
    logProvider: createLogProvider(config),
    config,
  });

  return cached;
}

export function createEmbeddingProvider(config: AppConfig): IEmbeddingProvider {
  const { provider, model, dimension, cacheSize } = config.embedding;
  let embeddings: IEmbeddingProvider;

  if (provider === 'voyage') {
    const apiKey = config.credentials.voyageApiKey;
    if (!apiKey) {
      throw new Error('Missing required environment variable: VOYAGE_API_KEY');
    }
    embeddings = new VoyageEmbeddingProvider({ apiKey, model, dimensions: dimension });
  } else {
    const apiKey = config.credentials.openaiApiKey;
    if (!apiKey) {
      throw new Error('Missing required environment variable: OPENAI_API_KEY');
    }
    embeddings = new OpenAIEmbeddingProvider({ apiKey, model, dimensions: dimension });
  }

  return cacheSize > 0 ? new CachingEmbeddingProvider(embeddings, cacheSize) : embeddings;
}

/** Axiom when configured, console otherwise. */
export function createLogProvider(config: AppConfig): ILogProvider {
  const { axiomApiKey, axiomDataset } = config.credentials;
  return axiomApiKey && axiomDataset
    ? new AxiomLogProvider({ apiToken: axiomApiKey, dataset: axiomDataset })
    : new ConsoleLogProvider({ outputToConsole: true, minLevel: 'info' });
}
