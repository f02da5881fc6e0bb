/**
 * Grounded synthesis: PM analysis and weekly brief.
 *
 * Each call takes exactly one input, an EvidenceSet, and the model sees only
 * its serialized form plus fixed instructions. Citations in the output are
 * checked against the set; ungrounded ones are reported, not repaired.
 */

import type { ITextGenerationProvider } from '../providers/ITextGenerationProvider.js';
import type { ILogProvider } from '../providers/ILogProvider.js';
import type { EvidenceSet, SynthesisKind, SynthesisResult } from '../types/models.js';
import { serializeEvidenceSet, describeFilters } from '../grounding/serialize.js';
import { checkGrounding } from '../grounding/citations.js';

const CITATION_RULES = [
  'Use only the evidence listed in the user message. Do not use outside knowledge about the product, its users or its metrics.',
  'Cite every claim with the tag of the evidence it rests on, e.g. [#12]. Only cite tags that appear in the evidence list.',
  'If the evidence does not support a section, say so in that section instead of guessing.',
  'Answer in markdown.',
].join('\n');

const INSTRUCTIONS: Record<SynthesisKind, string> = {
  analysis: [
    'You are a product analyst reviewing customer feedback.',
    CITATION_RULES,
    'Structure: "## Summary", "## What the evidence suggests", "## Likely root-cause buckets", "## Recommended next steps", "## Follow-up questions".',
  ].join('\n\n'),
  weekly_brief: [
    'You are writing a weekly product-management brief from customer feedback.',
    CITATION_RULES,
    "Structure: \"## Weekly PM Brief\", \"### This week's headline\", \"### Why it matters\", \"### Evidence used\", \"### What we think is happening\", \"### Metrics to watch\", \"### Proposed plan\", \"### Risks / dependencies\", \"### Draft ticket\".",
  ].join('\n\n'),
};

export class SynthesisService {
  constructor(
    private readonly textProvider: ITextGenerationProvider,
    private readonly logProvider: ILogProvider
  ) {}

  analyze(evidence: EvidenceSet): Promise<SynthesisResult> {
    return this.synthesize('analysis', evidence);
  }

  weeklyBrief(evidence: EvidenceSet): Promise<SynthesisResult> {
    return this.synthesize('weekly_brief', evidence);
  }

  // ── Private ──

  private async synthesize(
    kind: SynthesisKind,
    evidence: EvidenceSet
  ): Promise<SynthesisResult> {
    if (evidence.items.length === 0) {
      return {
        kind,
        text: noEvidenceText(evidence),
        cited: [],
        ungrounded: [],
        grounded: true,
      };
    }

    const text = await this.textProvider.complete({
      system: INSTRUCTIONS[kind],
      prompt: serializeEvidenceSet(evidence),
    });

    const { cited, ungrounded } = checkGrounding(text, evidence);
    if (ungrounded.length > 0) {
      this.logProvider.warn('Synthesis cited evidence outside the set', {
        kind,
        model: this.textProvider.model,
        ungrounded,
      });
    }

    return { kind, text, cited, ungrounded, grounded: ungrounded.length === 0 };
  }
}

function noEvidenceText(evidence: EvidenceSet): string {
  return [
    '## No evidence',
    `No feedback matched "${evidence.query}" (${describeFilters(evidence)}).`,
    'Nothing can be concluded; try a broader question or fewer filters.',
  ].join('\n\n');
}
