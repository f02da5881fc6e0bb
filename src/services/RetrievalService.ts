/**
 * Retrieval & grounding.
 * The one sanctioned path from a user question to evidence: validate, embed
 * the question, search the store, and freeze the result as an EvidenceSet.
 * Gateway failures propagate unchanged; there is no keyword fallback.
 */

import type { IEmbeddingProvider } from '../providers/IEmbeddingProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { FeedbackStore } from './FeedbackStore.js';
import type { AppliedFilters, EvidenceSet, QueryFilter } from '../types/models.js';
import { InvalidInputError } from '../errors.js';
import { createEvidenceSet, topSimilarity } from '../grounding/evidence-set.js';
import { DEFAULT_MAX_TOP_K, DEFAULT_TOP_K } from '../config.js';

export interface RetrievalOptions {
  maxTopK?: number;
  defaultTopK?: number;
}

export class RetrievalService {
  private readonly maxTopK: number;
  private readonly defaultTopK: number;

  constructor(
    private readonly feedbackStore: FeedbackStore,
    private readonly embeddingProvider: IEmbeddingProvider,
    private readonly logProvider: ILogProvider,
    options: RetrievalOptions = {}
  ) {
    this.maxTopK = options.maxTopK ?? DEFAULT_MAX_TOP_K;
    this.defaultTopK = Math.min(options.defaultTopK ?? DEFAULT_TOP_K, this.maxTopK);
  }

  async retrieve(
    filter: QueryFilter,
    options: { signal?: AbortSignal } = {}
  ): Promise<EvidenceSet> {
    const { signal } = options;
    const start = performance.now();

    const query = this.validateQuery(filter.queryText);
    const topK = this.validateTopK(filter.topK);
    const filters = this.normalizeFilters(filter);

    signal?.throwIfAborted();
    const queryVector = await this.embeddingProvider.generate(query);

    // Nothing has been searched yet; stop here rather than half-finish
    signal?.throwIfAborted();
    const items = await this.feedbackStore.search(queryVector, topK, filters);

    const evidence = createEvidenceSet({ query, filters, topK, items });

    this.logProvider.info('Evidence retrieved', {
      queryLength: query.length,
      topK,
      ...filters,
      matches: evidence.items.length,
      topSimilarity: topSimilarity(evidence),
      durationMs: Math.round(performance.now() - start),
    });

    return evidence;
  }

  // ── Private ──

  private validateQuery(queryText: unknown): string {
    if (typeof queryText !== 'string' || queryText.trim().length === 0) {
      throw new InvalidInputError('queryText is required', { field: 'queryText' });
    }
    return queryText.trim();
  }

  private validateTopK(topK: number | undefined): number {
    if (topK === undefined) return this.defaultTopK;

    if (!Number.isInteger(topK) || topK < 1 || topK > this.maxTopK) {
      throw new InvalidInputError(
        `topK must be an integer between 1 and ${this.maxTopK}`,
        { field: 'topK', maxTopK: this.maxTopK }
      );
    }
    return topK;
  }

  /** Blank strings mean "no constraint", same as absent. */
  private normalizeFilters(filter: QueryFilter): AppliedFilters {
    const minRating = filter.minRating ?? null;
    if (minRating !== null && !Number.isFinite(minRating)) {
      throw new InvalidInputError('minRating must be a finite number', {
        field: 'minRating',
      });
    }

    return {
      country: blankToNull(filter.country),
      platform: blankToNull(filter.platform),
      minRating,
    };
  }
}

function blankToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}
