import { config } from "../config";
import type { CaseRecord, SelectionReason, SelectionScores, TermSets } from "../types";
import type { PatternClassifier } from "./termExtractor";

const EPSILON = 1e-9;

export interface SelectorWeights {
  similarity: number;
  symptom: number;
  tonguePulse: number;
  specificity: number;
}

export interface CaseSelectorOptions {
  weights: SelectorWeights;
  tieBreakGap: number;
  regressionThreshold: number;
}

export interface TonguePulseSplitter {
  splitTonguePulse(terms: string[]): { tongue: string[]; pulse: string[] };
}

export interface ScoredCandidate {
  candidate: CaseRecord;
  scores: SelectionScores;
}

export interface Selection extends ScoredCandidate {
  reason: SelectionReason;
}

export interface PreviousAnchor {
  caseId: string;
  coverageRatio: number | null;
}

export interface SelectInput {
  ranked: ScoredCandidate[];
  previous?: PreviousAnchor | null;
  currentCoverage: number;
  contradiction: boolean;
}

/** Jaccard index; two empty sets score 0. */
export const jaccard = (left: string[], right: string[]): number => {
  const a = new Set(left);
  const b = new Set(right);
  const union = new Set([...a, ...b]);
  if (union.size === 0) return 0;
  let shared = 0;
  for (const item of a) {
    if (b.has(item)) shared += 1;
  }
  return shared / union.size;
};

export class CaseSelector {
  constructor(
    private readonly patterns: PatternClassifier & TonguePulseSplitter,
    private readonly options: CaseSelectorOptions = config.selector
  ) {}

  score(candidate: CaseRecord, query: TermSets): SelectionScores {
    const { weights } = this.options;
    const queryChannels = this.patterns.splitTonguePulse(query.tonguePulseTerms);
    const caseChannels = this.patterns.splitTonguePulse(candidate.tonguePulseTerms);

    const channelScores: number[] = [];
    if (queryChannels.tongue.length > 0) channelScores.push(jaccard(queryChannels.tongue, caseChannels.tongue));
    if (queryChannels.pulse.length > 0) channelScores.push(jaccard(queryChannels.pulse, caseChannels.pulse));

    const similarity = candidate.similarity;
    const symptomJaccard = jaccard(query.symptomTerms, candidate.symptomTerms);
    const tonguePulseJaccard =
      channelScores.length > 0 ? channelScores.reduce((sum, value) => sum + value, 0) / channelScores.length : 0;
    const specificity = this.patterns.isSingleOrganPattern(candidate.diagnosis) ? 1 : 0;

    return {
      similarity,
      symptomJaccard,
      tonguePulseJaccard,
      specificity,
      total:
        weights.similarity * similarity +
        weights.symptom * symptomJaccard +
        weights.tonguePulse * tonguePulseJaccard +
        weights.specificity * specificity
    };
  }

  /** Highest total first; equal totals keep retrieval order. */
  rank(candidates: CaseRecord[], query: TermSets): ScoredCandidate[] {
    return candidates
      .map((candidate, index) => ({ candidate, scores: this.score(candidate, query), index }))
      .sort((a, b) => b.scores.total - a.scores.total || a.index - b.index)
      .map(({ candidate, scores }) => ({ candidate, scores }));
  }

  /**
   * Best-scored candidate, except that a single-organ runner-up within the tie-break gap
   * of a compound leader wins.
   */
  pickBest(ranked: ScoredCandidate[]): Selection {
    const [top, second] = ranked;
    if (!top) {
      throw new Error("Cannot select an anchor from an empty candidate list.");
    }

    if (
      second &&
      this.patterns.isCompoundPattern(top.candidate.diagnosis) &&
      this.patterns.isSingleOrganPattern(second.candidate.diagnosis) &&
      top.scores.total - second.scores.total <= this.options.tieBreakGap + EPSILON
    ) {
      return { ...second, reason: "tie_break" };
    }

    return { ...top, reason: "scored" };
  }

  hasRegressed(previousCoverage: number | null, currentCoverage: number): boolean {
    if (previousCoverage === null) return false;
    return previousCoverage - currentCoverage >= this.options.regressionThreshold - EPSILON;
  }

  /** A term the user now negates that the previous anchor relied on. */
  negatedAnchorTerms(previousAnchor: CaseRecord | null, negatedTerms: string[]): string[] {
    if (!previousAnchor) return [];
    const anchorTerms = new Set([...previousAnchor.symptomTerms, ...previousAnchor.tonguePulseTerms]);
    return negatedTerms.filter((term) => anchorTerms.has(term));
  }

  select(input: SelectInput): Selection {
    const best = this.pickBest(input.ranked);
    const previous = input.previous;
    if (!previous) return best;

    const kept = input.ranked.find((item) => item.candidate.caseId === previous.caseId);
    if (kept && !input.contradiction && !this.hasRegressed(previous.coverageRatio, input.currentCoverage)) {
      return { ...kept, reason: "continuity" };
    }
    return best;
  }

  /** Anchor used when the reasoning call failed: the raw top retrieval candidate. */
  degradedTop(ranked: ScoredCandidate[], rawTop: CaseRecord): Selection {
    const scored = ranked.find((item) => item.candidate.caseId === rawTop.caseId);
    return {
      candidate: rawTop,
      scores: scored?.scores ?? { similarity: rawTop.similarity, symptomJaccard: 0, tonguePulseJaccard: 0, specificity: 0, total: 0 },
      reason: "degraded_top"
    };
  }
}
