import { readFileSync } from "node:fs";
import { config } from "../config";
import { type GapCategory, type Lexicon, lexiconSchema } from "../schemas/lexicon";
import type { Domain, RetrievalPlan, TermSets } from "../types";

export const loadLexicon = (filePath = config.lexiconPath): Lexicon =>
  lexiconSchema.parse(JSON.parse(readFileSync(filePath, "utf8")));

export interface PatternClassifier {
  isCompoundPattern(label: string): boolean;
  isSingleOrganPattern(label: string): boolean;
}

export const planTerms = (terms: TermSets): string[] => [
  ...new Set([...terms.symptomTerms, ...terms.tonguePulseTerms, ...terms.zangfuTerms])
];

export const dedupe = (items: string[]): string[] => [...new Set(items.map((item) => item.trim()).filter(Boolean))];

const occurrences = (text: string, term: string): number[] => {
  const found: number[] = [];
  let index = text.indexOf(term);
  while (index !== -1) {
    found.push(index);
    index = text.indexOf(term, index + term.length);
  }
  return found;
};

/**
 * Lexicon-backed term extraction and pattern-label classification.
 * A term counts as negated only when every occurrence is directly preceded by a negation word.
 */
export class TermExtractor implements PatternClassifier {
  constructor(private readonly lexicon: Lexicon = loadLexicon()) {}

  get gapCategories(): GapCategory[] {
    return this.lexicon.gapCategories;
  }

  extract(text: string): RetrievalPlan {
    const negated: string[] = [];
    const collect = (terms: string[]): string[] => {
      const positive: string[] = [];
      for (const term of terms) {
        const hits = occurrences(text, term);
        if (hits.length === 0) continue;
        if (hits.some((index) => !this.isNegatedAt(text, index))) {
          positive.push(term);
        } else {
          negated.push(term);
        }
      }
      return positive;
    };

    const symptomTerms = collect(this.lexicon.symptoms);
    const tonguePulseTerms = [...collect(this.lexicon.tongue), ...collect(this.lexicon.pulse)];
    const positive = new Set([...symptomTerms, ...tonguePulseTerms]);
    const zangfuTerms = Object.entries(this.lexicon.zangfu)
      .filter(([, keywords]) => keywords.some((keyword) => positive.has(keyword)))
      .map(([organ]) => organ);

    return {
      symptomTerms,
      tonguePulseTerms,
      zangfuTerms,
      negatedTerms: dedupe(negated)
    };
  }

  classifyDomain(text: string): Domain {
    if (this.lexicon.domains.digestive.some((keyword) => text.includes(keyword))) return "digestive";
    if (this.lexicon.domains.gynecological.some((keyword) => text.includes(keyword))) return "gynecological";
    return "general";
  }

  organsIn(label: string): string[] {
    return this.lexicon.organs.filter((organ) => label.includes(organ));
  }

  isCompoundPattern(label: string): boolean {
    return this.lexicon.compoundMarkers.some((marker) => label.includes(marker)) || this.organsIn(label).length >= 2;
  }

  isSingleOrganPattern(label: string): boolean {
    return !this.isCompoundPattern(label) && this.organsIn(label).length === 1;
  }

  isPulseTerm(term: string): boolean {
    return this.lexicon.pulse.includes(term) || (!this.lexicon.tongue.includes(term) && term.includes("脈"));
  }

  splitTonguePulse(terms: string[]): { tongue: string[]; pulse: string[] } {
    return {
      tongue: terms.filter((term) => !this.isPulseTerm(term)),
      pulse: terms.filter((term) => this.isPulseTerm(term))
    };
  }

  private isNegatedAt(text: string, index: number): boolean {
    return this.lexicon.negations.some(
      (negation) => index >= negation.length && text.slice(index - negation.length, index) === negation
    );
  }
}
