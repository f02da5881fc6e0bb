/**
 * In-process implementation of IFeedbackRepository.
 * Same filter-then-rank-then-limit semantics as `match_feedback`, with an
 * exact scan. Used for local runs without Supabase and throughout the tests.
 */

import type {
  FeedbackSearchOptions,
  IFeedbackRepository,
} from './IFeedbackRepository.js';
import type {
  FeedbackRow,
  MatchFeedbackRow,
  StoredFeedbackRow,
} from '../types/database.js';
import { compareBySimilarity, cosineSimilarity, isFiniteVector } from '../search/similarity.js';

interface StoredEntry {
  row: StoredFeedbackRow;
  vector: number[];
}

export class InMemoryFeedbackRepository implements IFeedbackRepository {
  private rows = new Map<number, StoredEntry>();
  private nextId = 1;

  async insert(row: Omit<FeedbackRow, 'id'>): Promise<StoredFeedbackRow> {
    // Parse before assigning an id so a bad row consumes nothing
    const vector: unknown = JSON.parse(row.embedding);
    if (!isFiniteVector(vector)) {
      throw new Error('Failed to insert feedback: embedding is not a numeric vector');
    }

    const { embedding: _embedding, ...rest } = row;
    const stored: StoredFeedbackRow = { ...rest, id: this.nextId++ };
    this.rows.set(stored.id, { row: stored, vector });
    return { ...stored };
  }

  async search(
    embedding: number[],
    options: FeedbackSearchOptions
  ): Promise<MatchFeedbackRow[]> {
    const { country, platform, minRating } = options;

    const candidates = [...this.rows.values()].filter(({ row }) => {
      if (country !== null && row.country !== country) return false;
      if (platform !== null && row.platform !== platform) return false;
      if (minRating !== null && (row.rating === null || row.rating < minRating))
        return false;
      return true;
    });

    return candidates
      .map(({ row, vector }) => ({
        id: row.id,
        content: row.text,
        country: row.country,
        platform: row.platform,
        rating: row.rating,
        similarity: cosineSimilarity(embedding, vector),
      }))
      .sort(compareBySimilarity)
      .slice(0, options.topK);
  }

  async count(): Promise<number> {
    return this.rows.size;
  }

  async embeddingDimension(): Promise<number | null> {
    const first = this.rows.values().next();
    return first.done ? null : first.value.vector.length;
  }

  /** Snapshot of stored rows in id order. */
  getAll(): StoredFeedbackRow[] {
    return [...this.rows.values()].map(({ row }) => ({ ...row }));
  }
}
