/**
 * Citation extraction and grounding checks for generated text.
 * Generated text cites evidence as [#<id>]; a citation of an id outside the
 * EvidenceSet is ungrounded.
 */

import type { EvidenceSet } from '../types/models.js';

const CITATION = /\[#(\d+)\]/g;

export interface GroundingCheck {
  cited: number[];
  ungrounded: number[];
}

/** Cited ids in first-seen order, without duplicates. */
export function extractCitations(text: string): number[] {
  const seen = new Set<number>();
  for (const match of text.matchAll(CITATION)) {
    seen.add(Number(match[1]));
  }
  return [...seen];
}

export function checkGrounding(text: string, set: EvidenceSet): GroundingCheck {
  const members = new Set(set.items.map((item) => item.id));
  const cited = extractCitations(text);
  return {
    cited,
    ungrounded: cited.filter((id) => !members.has(id)),
  };
}
