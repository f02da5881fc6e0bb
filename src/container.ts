/**
 * Dependency wiring.
 * Constructs all services with their dependencies.
 * Production passes Supabase and the hosted model providers; tests pass the
 * in-memory repository and mock providers.
 */

import type { IFeedbackRepository } from './repositories/IFeedbackRepository.js';
import type { IEmbeddingProvider } from './providers/IEmbeddingProvider.js';
import type { ITextGenerationProvider } from './providers/ITextGenerationProvider.js';
import type { ILogProvider } from './providers/ILogProvider.js';
import type { Middleware } from './middleware/pipeline.js';
import type { AppConfig } from './config.js';
import { DEFAULT_MAX_TOP_K, DEFAULT_TOP_K } from './config.js';
import { FeedbackStore } from './services/FeedbackStore.js';
import { IngestionService, type IngestionOptions } from './services/IngestionService.js';
import { RetrievalService } from './services/RetrievalService.js';
import { SynthesisService } from './services/SynthesisService.js';
import { createLoggingMiddleware } from './middleware/logging.js';

export interface Container {
  feedbackStore: FeedbackStore;
  ingestionService: IngestionService;
  retrievalService: RetrievalService;
  synthesisService: SynthesisService;
  logProvider: ILogProvider;
  logging: Middleware;
  limits: {
    maxTopK: number;
  };
}

export function createContainer(deps: {
  feedbackRepo: IFeedbackRepository;
  embeddingProvider: IEmbeddingProvider;
  textProvider: ITextGenerationProvider;
  logProvider: ILogProvider;
  /** Sections of AppConfig that tune the services. Defaults apply when omitted. */
  config?: {
    embedding?: Pick<AppConfig['embedding'], 'dimension'>;
    retrieval?: Partial<AppConfig['retrieval']>;
    ingestion?: Partial<AppConfig['ingestion']>;
  };
  /** Overrides the ingestion backoff timer. */
  sleep?: IngestionOptions['sleep'];
}): Container {
  const maxTopK = deps.config?.retrieval?.maxTopK ?? DEFAULT_MAX_TOP_K;
  const defaultTopK = deps.config?.retrieval?.defaultTopK ?? DEFAULT_TOP_K;

  const feedbackStore = new FeedbackStore(deps.feedbackRepo, {
    dimension: deps.config?.embedding?.dimension,
  });
  const ingestionService = new IngestionService(
    feedbackStore,
    deps.embeddingProvider,
    deps.logProvider,
    { ...deps.config?.ingestion, sleep: deps.sleep }
  );
  const retrievalService = new RetrievalService(
    feedbackStore,
    deps.embeddingProvider,
    deps.logProvider,
    { maxTopK, defaultTopK }
  );
  const synthesisService = new SynthesisService(deps.textProvider, deps.logProvider);
  const logging = createLoggingMiddleware(deps.logProvider);

  return {
    feedbackStore,
    ingestionService,
    retrievalService,
    synthesisService,
    logProvider: deps.logProvider,
    logging,
    limits: { maxTopK },
  };
}
