import { describe, it, expect } from 'vitest';
import {
  createEvidenceSet,
  evidenceIds,
  topSimilarity,
} from '../../src/grounding/evidence-set.js';
import type { AppliedFilters, EvidenceItem } from '../../src/types/models.js';

const noFilters: AppliedFilters = { country: null, platform: null, minRating: null };

function item(id: number, similarity: number): EvidenceItem {
  return { id, content: `feedback ${id}`, country: 'US', platform: 'ios', rating: 3, similarity };
}

describe('createEvidenceSet', () => {
  it('should order items by similarity, then id', () => {
    const set = createEvidenceSet({
      query: 'q',
      filters: noFilters,
      topK: 5,
      items: [item(7, 0.5), item(2, 0.9), item(4, 0.5)],
    });

    expect(evidenceIds(set)).toEqual([2, 4, 7]);
  });

  it('should stamp the retrieval time', () => {
    const set = createEvidenceSet({
      query: 'q',
      filters: noFilters,
      topK: 5,
      items: [],
      retrievedAt: new Date('2024-06-03T09:30:00Z'),
    });

    expect(set.retrievedAt).toBe('2024-06-03T09:30:00.000Z');
  });

  it('should be frozen all the way down', () => {
    const set = createEvidenceSet({
      query: 'q',
      filters: noFilters,
      topK: 5,
      items: [item(1, 0.8)],
    });

    expect(Object.isFrozen(set)).toBe(true);
    expect(Object.isFrozen(set.items)).toBe(true);
    expect(Object.isFrozen(set.items[0])).toBe(true);
    expect(Object.isFrozen(set.filters)).toBe(true);
  });

  it('should not share state with the input', () => {
    const items = [item(1, 0.8)];
    const filters: AppliedFilters = { country: 'US', platform: null, minRating: null };
    const set = createEvidenceSet({ query: 'q', filters, topK: 5, items });

    items[0].content = 'rewritten';
    items.push(item(2, 0.9));
    filters.country = 'DE';

    expect(set.items).toHaveLength(1);
    expect(set.items[0].content).toBe('feedback 1');
    expect(set.filters.country).toBe('US');
  });

  it('should throw on attempts to mutate it', () => {
    const set = createEvidenceSet({ query: 'q', filters: noFilters, topK: 5, items: [item(1, 0.8)] });

    expect(() => Object.assign(set.items[0], { content: 'changed' })).toThrow(TypeError);
  });
});

describe('topSimilarity', () => {
  it('should be the first item similarity, or null when empty', () => {
    const base = { query: 'q', filters: noFilters, topK: 5 };

    expect(topSimilarity(createEvidenceSet({ ...base, items: [item(1, 0.3), item(2, 0.7)] }))).toBe(0.7);
    expect(topSimilarity(createEvidenceSet({ ...base, items: [] }))).toBeNull();
  });
});
