/**
 * Domain models: feedback records and retrieval results as the
 * application understands them.
 * Decoupled from both API shapes and database row shapes.
 */

// ── Feedback ──

/** Source tag applied when a raw row names none. */
export const DEFAULT_SOURCE_CHANNEL = 'app_reviews';

export const MIN_RATING = 1;
export const MAX_RATING = 5;

/** A unit of Voice-of-Customer input, as persisted (write-once). */
export interface FeedbackRecord {
  /** Assigned by the store at insert; never reused. */
  id: number;
  sourceChannel: string;
  country: string | null;
  platform: string | null;
  /** Integer in [MIN_RATING, MAX_RATING]. */
  rating: number | null;
  userType: string | null;
  /** Calendar date, YYYY-MM-DD. */
  createdDate: string | null;
  text: string;
  embedding: number[];
}

/** A validated record before it has an id or an embedding. */
export type NewFeedbackRecord = Omit<FeedbackRecord, 'id' | 'embedding'>;

/** What the store accepts: a validated record with its embedding attached. */
export type EmbeddedFeedbackRecord = NewFeedbackRecord & { embedding: number[] };

/** A loosely-typed input row (CSV line, JSON object) before validation. */
export type RawFeedbackRow = Record<string, unknown>;

// ── Retrieval ──

export interface SearchFilters {
  country?: string | null;
  platform?: string | null;
  /** Inclusive lower bound. Records without a rating never pass it. */
  minRating?: number | null;
}

export interface QueryFilter extends SearchFilters {
  queryText: string;
  topK?: number;
}

export interface EvidenceItem {
  id: number;
  /** The record's text, verbatim. */
  content: string;
  country: string | null;
  platform: string | null;
  rating: number | null;
  /** 1 - cosine distance; higher is more similar. */
  similarity: number;
}

export interface AppliedFilters {
  country: string | null;
  platform: string | null;
  minRating: number | null;
}

/**
 * The grounding boundary: the only material a synthesis step may draw on.
 * Frozen all the way down; items sorted by similarity desc, id asc.
 */
export interface EvidenceSet {
  readonly query: string;
  readonly filters: Readonly<AppliedFilters>;
  readonly topK: number;
  readonly items: ReadonlyArray<Readonly<EvidenceItem>>;
  readonly retrievedAt: string;
}

// ── Synthesis ──

export type SynthesisKind = 'analysis' | 'weekly_brief';

export interface SynthesisResult {
  kind: SynthesisKind;
  text: string;
  /** Evidence ids the text cites, first-seen order. */
  cited: number[];
  /** Cited ids that are not members of the evidence set. */
  ungrounded: number[];
  grounded: boolean;
}
