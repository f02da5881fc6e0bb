/**
 * EvidenceSet construction.
 * The set is frozen all the way down so nothing between retrieval and
 * synthesis can add, drop or rewrite evidence.
 */

import type { AppliedFilters, EvidenceItem, EvidenceSet } from '../types/models.js';
import { compareBySimilarity } from '../search/similarity.js';

export function createEvidenceSet(input: {
  query: string;
  filters: AppliedFilters;
  topK: number;
  items: readonly EvidenceItem[];
  retrievedAt?: Date;
}): EvidenceSet {
  const items = [...input.items]
    .sort(compareBySimilarity)
    .map((item) =>
      Object.freeze({
        id: item.id,
        content: item.content,
        country: item.country,
        platform: item.platform,
        rating: item.rating,
        similarity: item.similarity,
      })
    );

  return Object.freeze({
    query: input.query,
    filters: Object.freeze({ ...input.filters }),
    topK: input.topK,
    items: Object.freeze(items),
    retrievedAt: (input.retrievedAt ?? new Date()).toISOString(),
  });
}

export function evidenceIds(set: EvidenceSet): number[] {
  return set.items.map((item) => item.id);
}

/** Highest similarity in the set, or null when it is empty. */
export function topSimilarity(set: EvidenceSet): number | null {
  return set.items.length > 0 ? set.items[0].similarity : null;
}
