import { parse } from 'csv-parse/sync';
import { InvalidInputError } from '../errors.js';
import type { RawFeedbackRow } from '../types/models.js';
import { isJsonObject } from '../middleware/validate-body.js';

/**
 * Parse a feedback CSV export into raw rows keyed by lower-cased header.
 * Values stay strings; FeedbackRowParser does the typing.
 */
export function readFeedbackCsv(text: string): RawFeedbackRow[] {
  let records: unknown;
  try {
    records = parse(text, {
      columns: (header: string[]) => header.map(normalizeHeader),
      skip_empty_lines: true,
      bom: true,
      trim: true,
    });
  } catch (err) {
    throw new InvalidInputError(
      `Could not parse CSV: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  if (!Array.isArray(records)) return [];
  return records.filter(isJsonObject);
}

function normalizeHeader(value: string): string {
  return value.trim().toLowerCase();
}
