/**
 * API types: shapes for request/response payloads.
 * Decoupled from domain models so the API can evolve independently.
 */

import type { EvidenceSet, RawFeedbackRow, SynthesisResult } from './models.js';

// ── Requests ──

export interface RetrieveRequest {
  queryText: string;
  topK?: number;
  country?: string | null;
  platform?: string | null;
  minRating?: number | null;
}

export interface IngestRequest {
  rows: RawFeedbackRow[];
}

// ── Responses ──

export interface RetrieveResponse {
  evidence: EvidenceSet;
  /** Markdown evidence listing, ready for display or export. */
  listing: string;
  matches: number;
  topSimilarity: number | null;
}

export interface SynthesisResponse {
  evidence: EvidenceSet;
  synthesis: SynthesisResult;
}

export interface IngestFailureSummary {
  index: number;
  code: ErrorCode;
  message: string;
}

export interface IngestResponse {
  stored: number;
  ids: number[];
  failures: IngestFailureSummary[];
}

export interface StatsResponse {
  records: number;
  dimension: number | null;
}

// ── Errors ──

export type ErrorCode =
  | 'INVALID_INPUT'
  | 'NOT_FOUND'
  | 'DIMENSION_MISMATCH'
  | 'GATEWAY_UNAVAILABLE'
  | 'REQUEST_CANCELLED'
  | 'INTERNAL_ERROR';

export interface ApiErrorResponse {
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, unknown>;
  };
}
