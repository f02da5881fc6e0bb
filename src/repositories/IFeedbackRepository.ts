/**
 * Feedback data access interface.
 * Write-once: there is no update or delete.
 */

import type {
  FeedbackRow,
  MatchFeedbackRow,
  StoredFeedbackRow,
} from '../types/database.js';

export interface FeedbackSearchOptions {
  topK: number;
  /** null = no constraint. */
  country: string | null;
  platform: string | null;
  minRating: number | null;
}

export interface IFeedbackRepository {
  /** Atomically persist one row; the repository assigns the id. */
  insert(row: Omit<FeedbackRow, 'id'>): Promise<StoredFeedbackRow>;

  /**
   * Filter, then rank by cosine similarity (desc, id asc), then limit.
   * Never filters after limiting.
   */
  search(
    embedding: number[],
    options: FeedbackSearchOptions
  ): Promise<MatchFeedbackRow[]>;

  count(): Promise<number>;

  /** Dimension of stored embeddings, or null while empty. */
  embeddingDimension(): Promise<number | null>;
}
