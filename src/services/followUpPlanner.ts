import type { GapCategory } from "../schemas/lexicon";
import type { FollowUpBand } from "./convergenceEvaluator";
import { dedupe } from "./termExtractor";

export interface FollowUpInput {
  accumulatedQuery: string;
  round: number;
  band: FollowUpBand;
  suggested: string[];
  missingInfo: string[];
}

// Tongue and pulse are asked first on the opening round.
const OPENING_ROUND_FIRST = new Set(["tongue", "pulse"]);

export class FollowUpPlanner {
  constructor(private readonly categories: GapCategory[]) {}

  /** Diagnostic categories the query never mentions, most important first. */
  missingCategories(accumulatedQuery: string, round: number): GapCategory[] {
    return this.categories
      .filter((category) => !category.keywords.some((keyword) => accumulatedQuery.includes(keyword)))
      .map((category, index) => ({
        category,
        index,
        priority: round === 1 && OPENING_ROUND_FIRST.has(category.id) ? 0 : category.priority
      }))
      .sort((a, b) => a.priority - b.priority || a.index - b.index)
      .map(({ category }) => category);
  }

  plan(input: FollowUpInput): string[] {
    if (input.band.max <= 0) return [];

    const questions = dedupe(input.suggested);
    if (questions.length < input.band.min) {
      const gaps = this.missingCategories(input.accumulatedQuery, input.round).map((category) => category.question);
      const fromMissing = input.missingInfo.map((item) => `請補充：${item}`);
      for (const question of dedupe([...gaps, ...fromMissing])) {
        if (questions.length >= input.band.min) break;
        if (!questions.includes(question)) questions.push(question);
      }
    }

    return questions.slice(0, input.band.max);
  }
}
