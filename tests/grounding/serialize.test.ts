import { describe, it, expect } from 'vitest';
import { createEvidenceSet } from '../../src/grounding/evidence-set.js';
import {
  citationTag,
  describeFilters,
  renderEvidenceListing,
  serializeEvidenceSet,
} from '../../src/grounding/serialize.js';
import type { EvidenceItem } from '../../src/types/models.js';

const items: EvidenceItem[] = [
  {
    id: 12,
    content: 'Login loops back to the\nsign-in screen',
    country: 'US',
    platform: 'ios',
    rating: 1,
    similarity: 0.91234,
  },
  {
    id: 40,
    content: 'Cannot log in with Google',
    country: null,
    platform: 'android',
    rating: null,
    similarity: 0.8,
  },
];

describe('citationTag', () => {
  it('should format an id as a citation', () => {
    expect(citationTag(12)).toBe('[#12]');
  });
});

describe('describeFilters', () => {
  it('should show unset filters as all and omit an unset minRating', () => {
    const set = createEvidenceSet({
      query: 'q',
      filters: { country: null, platform: null, minRating: null },
      topK: 6,
      items: [],
    });
    expect(describeFilters(set)).toBe('platform=all, country=all');
  });

  it('should list every applied filter', () => {
    const set = createEvidenceSet({
      query: 'q',
      filters: { country: 'US', platform: 'ios', minRating: 4 },
      topK: 6,
      items: [],
    });
    expect(describeFilters(set)).toBe('platform=ios, country=US, minRating=4');
  });
});

describe('serializeEvidenceSet', () => {
  it('should render one line per item with its citation tag', () => {
    const set = createEvidenceSet({
      query: 'Why can users not log in?',
      filters: { country: null, platform: null, minRating: null },
      topK: 6,
      items,
    });

    expect(serializeEvidenceSet(set)).toBe(
      [
        'Question: Why can users not log in?',
        'Filters: platform=all, country=all',
        'Evidence (2 items, most similar first):',
        '[#12] platform=ios country=US rating=1 similarity=0.912: Login loops back to the sign-in screen',
        '[#40] platform=android country=n/a rating=n/a similarity=0.800: Cannot log in with Google',
      ].join('\n')
    );
  });

  it('should mark an empty set explicitly', () => {
    const set = createEvidenceSet({
      query: 'refunds',
      filters: { country: 'DE', platform: null, minRating: null },
      topK: 6,
      items: [],
    });

    expect(serializeEvidenceSet(set)).toBe(
      [
        'Question: refunds',
        'Filters: platform=all, country=DE',
        'Evidence (0 items, most similar first):',
        '(none)',
      ].join('\n')
    );
  });
});

describe('renderEvidenceListing', () => {
  it('should render a markdown block per item', () => {
    const set = createEvidenceSet({
      query: 'login',
      filters: { country: null, platform: null, minRating: null },
      topK: 6,
      items: [items[1]],
    });

    expect(renderEvidenceListing(set)).toBe(
      [
        '## Evidence #40',
        '- Platform: android',
        '- Country: n/a',
        '- Rating: n/a',
        '- Similarity: 0.800',
        '',
        'Cannot log in with Google',
        '',
      ].join('\n')
    );
  });

  it('should say so when nothing matched', () => {
    const set = createEvidenceSet({
      query: 'refunds',
      filters: { country: null, platform: 'web', minRating: 2 },
      topK: 6,
      items: [],
    });

    expect(renderEvidenceListing(set)).toBe(
      'No feedback matched "refunds" (filters: platform=web, country=all, minRating=2).'
    );
  });
});
