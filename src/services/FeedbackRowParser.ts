/**
 * Converts loosely-typed input rows (CSV lines, JSON objects) into validated
 * feedback records. Column names follow the seed CSV:
 *   source, country, platform, rating, user_type, created_at, text
 * Anything that does not validate becomes an InvalidInputError; values are
 * never silently coerced.
 */

import { InvalidInputError } from '../errors.js';
import {
  DEFAULT_SOURCE_CHANNEL,
  MAX_RATING,
  MIN_RATING,
  type NewFeedbackRecord,
  type RawFeedbackRow,
} from '../types/models.js';

const MAX_TAG_LENGTH = 100;
const ISO_DATE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ].*)?$/;

export function parseFeedbackRow(row: RawFeedbackRow): NewFeedbackRecord {
  const text = readText(row, 'text');
  if (text === null) {
    throw new InvalidInputError('text is required', { field: 'text' });
  }

  return {
    sourceChannel: readTag(row, 'source') ?? DEFAULT_SOURCE_CHANNEL,
    country: readTag(row, 'country'),
    platform: readTag(row, 'platform'),
    rating: readRating(row),
    userType: readTag(row, 'user_type'),
    createdDate: readDate(row),
    text,
  };
}

// ── Field readers ──

/** Trimmed string value; blank or absent → null. */
function readText(row: RawFeedbackRow, field: string): string | null {
  const value = row[field];
  if (value === undefined || value === null) return null;

  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  if (typeof value !== 'string') {
    throw new InvalidInputError(`${field} must be a string`, { field });
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function readTag(row: RawFeedbackRow, field: string): string | null {
  const value = readText(row, field);
  if (value !== null && value.length > MAX_TAG_LENGTH) {
    throw new InvalidInputError(
      `${field} must be ${MAX_TAG_LENGTH} characters or less`,
      { field }
    );
  }
  return value;
}

function readRating(row: RawFeedbackRow): number | null {
  const raw = readText(row, 'rating');
  if (raw === null) return null;

  if (!/^\d+$/.test(raw)) {
    throw new InvalidInputError(`rating must be an integer, got "${raw}"`, {
      field: 'rating',
    });
  }
  const rating = Number(raw);
  if (rating < MIN_RATING || rating > MAX_RATING) {
    throw new InvalidInputError(
      `rating must be between ${MIN_RATING} and ${MAX_RATING}, got ${rating}`,
      { field: 'rating' }
    );
  }
  return rating;
}

/** YYYY-MM-DD, or an ISO timestamp reduced to its date part. */
function readDate(row: RawFeedbackRow): string | null {
  const raw = readText(row, 'created_at');
  if (raw === null) return null;

  const match = ISO_DATE.exec(raw);
  if (!match) {
    throw new InvalidInputError(
      `created_at must be a YYYY-MM-DD date, got "${raw}"`,
      { field: 'created_at' }
    );
  }

  const [, year, month, day] = match;
  const date = `${year}-${month}-${day}`;
  const parsed = new Date(`${date}T00:00:00Z`);
  // Rejects impossible dates such as 2024-02-30, which Date would roll over
  if (Number.isNaN(parsed.getTime()) || parsed.toISOString().slice(0, 10) !== date) {
    throw new InvalidInputError(`created_at is not a valid date: "${raw}"`, {
      field: 'created_at',
    });
  }
  return date;
}
