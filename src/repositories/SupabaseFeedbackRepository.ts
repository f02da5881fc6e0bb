/**
 * Supabase implementation of IFeedbackRepository.
 * Uses pgvector; ranking happens in the `match_feedback` SQL function
 * (see supabase/migrations/001_feedback.sql).
 */

import type { SupabaseClient } from '@supabase/supabase-js';
import type {
  FeedbackSearchOptions,
  IFeedbackRepository,
} from './IFeedbackRepository.js';
import type {
  FeedbackRow,
  MatchFeedbackRow,
  StoredFeedbackRow,
} from '../types/database.js';

const TABLE = 'feedback';

export class SupabaseFeedbackRepository implements IFeedbackRepository {
  constructor(private readonly db: SupabaseClient) {}

  async insert(row: Omit<FeedbackRow, 'id'>): Promise<StoredFeedbackRow> {
    const { data, error } = await this.db
      .from(TABLE)
      .insert({
        source: row.source,
        country: row.country,
        platform: row.platform,
        rating: row.rating,
        user_type: row.user_type,
        created_at: row.created_at,
        text: row.text,
        embedding: row.embedding,
      })
      .select()
      .single();

    if (error) throw new Error(`Failed to insert feedback: ${error.message}`);

    const { embedding: _embedding, ...stored } = data as FeedbackRow;
    return { ...stored, id: Number(stored.id) };
  }

  async search(
    embedding: number[],
    options: FeedbackSearchOptions
  ): Promise<MatchFeedbackRow[]> {
    const { data, error } = await this.db.rpc('match_feedback', {
      query_embedding: JSON.stringify(embedding),
      match_count: options.topK,
      filter_country: options.country,
      filter_platform: options.platform,
      min_rating: options.minRating,
    });

    if (error) throw new Error(`Failed to search feedback: ${error.message}`);

    return ((data ?? []) as MatchFeedbackRow[]).map((row) => ({
      id: Number(row.id),
      content: row.content,
      country: row.country,
      platform: row.platform,
      rating: row.rating,
      similarity: Number(row.similarity),
    }));
  }

  async count(): Promise<number> {
    const { count, error } = await this.db
      .from(TABLE)
      .select('*', { count: 'exact', head: true });

    if (error) throw new Error(`Failed to count feedback: ${error.message}`);
    return count ?? 0;
  }

  async embeddingDimension(): Promise<number | null> {
    const { data, error } = await this.db.rpc('feedback_embedding_dimension');

    if (error)
      throw new Error(`Failed to read embedding dimension: ${error.message}`);
    return data === null || data === undefined ? null : Number(data);
  }
}
