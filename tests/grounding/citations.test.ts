import { describe, it, expect } from 'vitest';
import { checkGrounding, extractCitations } from '../../src/grounding/citations.js';
import { createEvidenceSet } from '../../src/grounding/evidence-set.js';

describe('extractCitations', () => {
  it('should return unique ids in first-seen order', () => {
    expect(extractCitations('Crashes [#7] and freezes [#3]; see also [#7].')).toEqual([7, 3]);
  });

  it('should ignore text that only resembles a citation', () => {
    expect(extractCitations('Issue #12, [12], [# 4] and [#x]')).toEqual([]);
  });
});

describe('checkGrounding', () => {
  const set = createEvidenceSet({
    query: 'q',
    filters: { country: null, platform: null, minRating: null },
    topK: 5,
    items: [
      { id: 1, content: 'a', country: null, platform: null, rating: null, similarity: 0.9 },
      { id: 2, content: 'b', country: null, platform: null, rating: null, similarity: 0.8 },
    ],
  });

  it('should accept text that cites only members', () => {
    expect(checkGrounding('Users report [#2] and [#1].', set)).toEqual({
      cited: [2, 1],
      ungrounded: [],
    });
  });

  it('should flag citations outside the set', () => {
    expect(checkGrounding('See [#1] and [#99].', set)).toEqual({
      cited: [1, 99],
      ungrounded: [99],
    });
  });
});
