/**
 * Text renderings of an EvidenceSet.
 *
 * serializeEvidenceSet is the single data channel into a generation model:
 * synthesis prompts contain this string and nothing else factual.
 * renderEvidenceListing is the human-facing markdown listing.
 */

import type { EvidenceItem, EvidenceSet } from '../types/models.js';

const NOT_AVAILABLE = 'n/a';

export function citationTag(id: number): string {
  return `[#${id}]`;
}

export function serializeEvidenceSet(set: EvidenceSet): string {
  const lines = [
    `Question: ${set.query}`,
    `Filters: ${describeFilters(set)}`,
    `Evidence (${set.items.length} item${set.items.length === 1 ? '' : 's'}, most similar first):`,
  ];

  for (const item of set.items) {
    lines.push(
      `${citationTag(item.id)} platform=${orNa(item.platform)} ` +
        `country=${orNa(item.country)} rating=${orNa(item.rating)} ` +
        `similarity=${item.similarity.toFixed(3)}: ${singleLine(item.content)}`
    );
  }

  if (set.items.length === 0) {
    lines.push('(none)');
  }

  return lines.join('\n');
}

export function renderEvidenceListing(set: EvidenceSet): string {
  if (set.items.length === 0) {
    return `No feedback matched "${set.query}" (filters: ${describeFilters(set)}).`;
  }
  return set.items.map(renderItem).join('\n');
}

export function describeFilters(set: EvidenceSet): string {
  const parts = [
    `platform=${set.filters.platform ?? 'all'}`,
    `country=${set.filters.country ?? 'all'}`,
  ];
  if (set.filters.minRating !== null) {
    parts.push(`minRating=${set.filters.minRating}`);
  }
  return parts.join(', ');
}

// ── Private ──

function renderItem(item: Readonly<EvidenceItem>): string {
  return [
    `## Evidence #${item.id}`,
    `- Platform: ${orNa(item.platform)}`,
    `- Country: ${orNa(item.country)}`,
    `- Rating: ${orNa(item.rating)}`,
    `- Similarity: ${item.similarity.toFixed(3)}`,
    '',
    item.content,
    '',
  ].join('\n');
}

function orNa(value: string | number | null): string {
  return value === null ? NOT_AVAILABLE : String(value);
}

/** Newlines inside feedback would break the one-item-per-line format. */
function singleLine(text: string): string {
  return text.replace(/\s*\r?\n\s*/g, ' ');
}
