/**
 * Database row types: mirror the Supabase `public.feedback` table and the
 * rows returned by its RPC functions.
 * Column names use snake_case to match PostgreSQL conventions.
 */

export interface FeedbackRow {
  id: number;
  source: string;
  country: string | null;
  platform: string | null;
  rating: number | null;
  user_type: string | null;
  created_at: string | null;
  text: string;
  embedding: string; // pgvector serialized
}

/** FeedbackRow as returned from reads, which never select the embedding. */
export type StoredFeedbackRow = Omit<FeedbackRow, 'embedding'>;

/** One row of `match_feedback`. */
export interface MatchFeedbackRow {
  id: number;
  content: string;
  country: string | null;
  platform: string | null;
  rating: number | null;
  similarity: number;
}
