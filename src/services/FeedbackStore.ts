/**
 * Feedback store.
 * Guards the repository with the store-wide invariants: non-empty text, one
 * embedding dimension for the whole corpus, and evidence ordered by
 * similarity desc / id asc.
 */

import type { IFeedbackRepository } from '../repositories/IFeedbackRepository.js';
import type {
  EmbeddedFeedbackRecord,
  EvidenceItem,
  SearchFilters,
} from '../types/models.js';
import { DimensionMismatchError, InvalidInputError } from '../errors.js';
import { compareBySimilarity, isFiniteVector } from '../search/similarity.js';

export interface FeedbackStoreStats {
  records: number;
  dimension: number | null;
}

export class FeedbackStore {
  /** Store-wide dimension once known. */
  private dimension: number | null;
  /** False while the dimension rests only on inserts that have not completed. */
  private dimensionSettled: boolean;
  private inFlight = 0;
  private dimensionLookup: Promise<void> | null = null;

  constructor(
    private readonly feedbackRepo: IFeedbackRepository,
    options?: { dimension?: number }
  ) {
    this.dimension = options?.dimension ?? null;
    this.dimensionSettled = this.dimension !== null;
  }

  /**
   * Persist one record and return its id.
   * The first insert into an empty store establishes the dimension unless
   * it was configured up front.
   */
  async insert(record: EmbeddedFeedbackRecord): Promise<number> {
    if (record.text.trim().length === 0) {
      throw new InvalidInputError('text must not be empty');
    }
    if (!isFiniteVector(record.embedding)) {
      throw new InvalidInputError('embedding must be a non-empty array of finite numbers');
    }

    await this.loadDimension();
    // No await between reading the dimension and establishing it, so
    // concurrent first inserts cannot establish two different dimensions.
    const known = this.dimension;
    const actual = record.embedding.length;
    if (known === null) {
      this.dimension = actual;
    } else if (known !== actual) {
      throw new DimensionMismatchError(known, actual);
    }

    this.inFlight++;
    try {
      const row = await this.feedbackRepo.insert({
        source: record.sourceChannel,
        country: record.country,
        platform: record.platform,
        rating: record.rating,
        user_type: record.userType,
        created_at: record.createdDate,
        text: record.text,
        embedding: JSON.stringify(record.embedding),
      });
      this.dimensionSettled = true;
      return row.id;
    } finally {
      this.inFlight--;
      // A dimension nothing was stored under is released again
      if (!this.dimensionSettled && this.inFlight === 0) this.dimension = null;
    }
  }

  /**
   * Top-k evidence for a query vector among records passing every filter.
   * Returns [] when nothing matches; that is a result, not an error.
   */
  async search(
    queryVector: number[],
    topK: number,
    filters: SearchFilters = {}
  ): Promise<EvidenceItem[]> {
    if (!Number.isInteger(topK) || topK < 1) {
      throw new InvalidInputError('topK must be a positive integer');
    }
    if (!isFiniteVector(queryVector)) {
      throw new InvalidInputError('query vector must be a non-empty array of finite numbers');
    }

    await this.loadDimension();
    const known = this.dimension;
    if (known === null) return [];
    if (known !== queryVector.length) {
      throw new DimensionMismatchError(known, queryVector.length);
    }

    const rows = await this.feedbackRepo.search(queryVector, {
      topK,
      country: filters.country ?? null,
      platform: filters.platform ?? null,
      minRating: filters.minRating ?? null,
    });

    return rows
      .map((row) => ({
        id: row.id,
        content: row.content,
        country: row.country,
        platform: row.platform,
        rating: row.rating,
        similarity: row.similarity,
      }))
      .sort(compareBySimilarity)
      .slice(0, topK);
  }

  async stats(): Promise<FeedbackStoreStats> {
    const [records] = await Promise.all([
      this.feedbackRepo.count(),
      this.loadDimension(),
    ]);
    return { records, dimension: this.dimension };
  }

  // ── Private ──

  /** Adopt the repository's dimension unless one is configured or established. */
  private async loadDimension(): Promise<void> {
    if (this.dimension !== null) return;

    this.dimensionLookup ??= this.feedbackRepo.embeddingDimension().then(
      (stored) => {
        if (stored !== null && this.dimension === null) {
          this.dimension = stored;
          this.dimensionSettled = true;
        }
      },
      (err: unknown) => {
        // Let the next call retry the lookup
        this.dimensionLookup = null;
        throw err;
      }
    );
    await this.dimensionLookup;
  }
}
