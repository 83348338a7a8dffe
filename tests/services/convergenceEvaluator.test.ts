import { describe, expect, it } from "vitest";
import { ConvergenceEvaluator, type ConvergenceOptions } from "../../src/services/convergenceEvaluator";

const options: ConvergenceOptions = {
  maxRounds: 7,
  coverageThreshold: 0.8,
  forcedThreshold: 0.75,
  weights: { coverage: 0.5, anchor: 0.3, round: 0.2 },
  roundPenaltyStep: 0.1,
  roundPenaltyCap: 0.5,
  followUpLow: 0.45,
  followUpMid: 0.7
};

const evaluator = new ConvergenceEvaluator(options);

describe("ConvergenceEvaluator", () => {
  it("scores an early round and asks for several follow-ups", () => {
    const signal = evaluator.evaluate({ round: 1, coverageRatio: 0.45, anchorMatch: 0.6 });

    expect(signal.convergenceScore).toBeCloseTo(0.605);
    expect(signal.converged).toBe(false);
    expect(signal.forcedConvergence).toBe(false);
    expect(signal.followUps).toEqual({ min: 2, max: 3 });
  });

  it("converges once coverage reaches the threshold", () => {
    const signal = evaluator.evaluate({ round: 3, coverageRatio: 0.8, anchorMatch: 0.5 });

    expect(signal.converged).toBe(true);
    expect(signal.followUps).toEqual({ min: 0, max: 0 });
  });

  it("forces convergence at the round limit when coverage stays low", () => {
    const signal = evaluator.evaluate({ round: 7, coverageRatio: 0.6, anchorMatch: 0.5 });

    expect(signal.converged).toBe(true);
    expect(signal.forcedConvergence).toBe(true);
  });

  it("does not mark convergence as forced when coverage is close enough at the limit", () => {
    const signal = evaluator.evaluate({ round: 7, coverageRatio: 0.76, anchorMatch: 0.5 });

    expect(signal.converged).toBe(true);
    expect(signal.forcedConvergence).toBe(false);
  });

  it("caps the round penalty", () => {
    expect(evaluator.evaluate({ round: 10, coverageRatio: 0, anchorMatch: 0 }).convergenceScore).toBeCloseTo(0.1);
  });

  it("maps coverage to follow-up bands at the edges", () => {
    expect(evaluator.followUpBand(0.44)).toEqual({ min: 3, max: 5 });
    expect(evaluator.followUpBand(0.45)).toEqual({ min: 2, max: 3 });
    expect(evaluator.followUpBand(0.7)).toEqual({ min: 0, max: 1 });
    expect(evaluator.maxRounds).toBe(7);
  });

  it("reads the follow-up band edges from its options", () => {
    const custom = new ConvergenceEvaluator({ ...options, followUpLow: 0.3, followUpMid: 0.5 });

    expect(custom.followUpBand(0.29)).toEqual({ min: 3, max: 5 });
    expect(custom.followUpBand(0.3)).toEqual({ min: 2, max: 3 });
    expect(custom.followUpBand(0.5)).toEqual({ min: 0, max: 1 });
    expect(custom.evaluate({ round: 1, coverageRatio: 0.4, anchorMatch: 0 }).followUps).toEqual({ min: 2, max: 3 });
  });

  it("converges on the round limit alone when Diagnose never ran", () => {
    expect(evaluator.roundLimit(6, null)).toEqual({ converged: false, forcedConvergence: false });
    expect(evaluator.roundLimit(7, null)).toEqual({ converged: true, forcedConvergence: true });
    expect(evaluator.roundLimit(7, 0.74)).toEqual({ converged: true, forcedConvergence: true });
    expect(evaluator.roundLimit(8, 0.75)).toEqual({ converged: true, forcedConvergence: false });
  });
});
