import { config } from "../config";

export interface ConvergenceOptions {
  maxRounds: number;
  coverageThreshold: number;
  forcedThreshold: number;
  weights: { coverage: number; anchor: number; round: number };
  roundPenaltyStep: number;
  roundPenaltyCap: number;
  /** Coverage below this asks 3–5 follow-ups; below `followUpMid` asks 2–3. */
  followUpLow: number;
  followUpMid: number;
}

export interface FollowUpBand {
  min: number;
  max: number;
}

export interface ConvergenceInput {
  round: number;
  coverageRatio: number;
  anchorMatch: number;
}

export interface ConvergenceSignal {
  convergenceScore: number;
  converged: boolean;
  forcedConvergence: boolean;
  followUps: FollowUpBand;
}

const clampUnit = (value: number): number => Math.min(1, Math.max(0, value));

export class ConvergenceEvaluator {
  constructor(private readonly options: ConvergenceOptions = config.convergence) {}

  get maxRounds(): number {
    return this.options.maxRounds;
  }

  evaluate(input: ConvergenceInput): ConvergenceSignal {
    const { weights } = this.options;
    const coverage = clampUnit(input.coverageRatio);
    const roundFactor = 1 - Math.min(this.options.roundPenaltyCap, Math.max(0, input.round - 1) * this.options.roundPenaltyStep);
    const convergenceScore =
      weights.coverage * coverage + weights.anchor * clampUnit(input.anchorMatch) + weights.round * roundFactor;

    const roundLimitReached = input.round >= this.options.maxRounds;
    const converged = coverage >= this.options.coverageThreshold || roundLimitReached;
    const forcedConvergence = roundLimitReached && coverage < this.options.forcedThreshold;

    return {
      convergenceScore,
      converged,
      forcedConvergence,
      followUps: converged ? { min: 0, max: 0 } : this.followUpBand(coverage)
    };
  }

  /** Convergence for a committed round that never reached Diagnose; only the round limit can end it. */
  roundLimit(round: number, lastCoverage: number | null): Pick<ConvergenceSignal, "converged" | "forcedConvergence"> {
    const reached = round >= this.options.maxRounds;
    return {
      converged: reached,
      forcedConvergence: reached && (lastCoverage === null || lastCoverage < this.options.forcedThreshold)
    };
  }

  followUpBand(coverage: number): FollowUpBand {
    if (coverage < this.options.followUpLow) return { min: 3, max: 5 };
    if (coverage < this.options.followUpMid) return { min: 2, max: 3 };
    return { min: 0, max: 1 };
  }
}
