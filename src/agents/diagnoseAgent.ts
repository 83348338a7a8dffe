import { config } from "../config";
import type { ReasoningLike, ReasoningResult } from "../llm/reasoning";
import { type DiagnoseDraft, diagnoseDraftSchema } from "../schemas/reasoning";
import type { ScoredCandidate } from "../services/caseSelector";
import type { CaseRecord, RetrievalPlan } from "../types";

export interface DiagnoseInput {
  sessionId: string;
  round: number;
  accumulatedQuery: string;
  plan: RetrievalPlan;
  ranked: ScoredCandidate[];
  proposedAnchorId: string;
  previousAnchor: CaseRecord | null;
  previousCoverage: number | null;
}

const describeCandidate = ({ candidate, scores }: ScoredCandidate): string =>
  [
    `- ${candidate.caseId}${candidate.virtual ? " (virtual, built from the query)" : ""}: ${candidate.diagnosis}`,
    `  chief complaint: ${candidate.chiefComplaint}`,
    `  symptoms: ${candidate.symptomTerms.join("、") || "(none)"}; tongue/pulse: ${candidate.tonguePulseTerms.join("、") || "(none)"}`,
    `  selection score: ${scores.total.toFixed(3)}`
  ].join("\n");

export class DiagnoseAgent {
  constructor(
    private readonly reasoning: ReasoningLike,
    private readonly timeoutMs = config.timeouts.diagnoseMs
  ) {}

  diagnose(input: DiagnoseInput): Promise<ReasoningResult<DiagnoseDraft>> {
    const system = [
      "You are a Traditional Chinese Medicine pattern-differentiation assistant reasoning from reference cases.",
      "Return JSON only.",
      "Keys required: anchorCaseId, coverageRatio, missingInfo, primaryPattern, analysis, followUpQuestions, contradictsPreviousAnchor.",
      "anchorCaseId must be one of the listed case ids; prefer the proposed anchor unless the evidence clearly points elsewhere.",
      "coverageRatio is a number in 0..1 estimating how complete the information is for a confident differentiation.",
      "missingInfo lists the diagnostic information still missing; followUpQuestions are questions to ask the patient.",
      "contradictsPreviousAnchor is true only when new information contradicts the previous anchor case.",
      "Write primaryPattern, analysis and questions in Traditional Chinese. Never give herb dosages or promise a cure."
    ].join(" ");

    const user = [
      `Round: ${input.round}`,
      `Conversation:\n${input.accumulatedQuery}`,
      `Extracted terms: symptoms=${input.plan.symptomTerms.join("、") || "(none)"}; tongue/pulse=${input.plan.tonguePulseTerms.join("、") || "(none)"}; organs=${input.plan.zangfuTerms.join("、") || "(none)"}`,
      `Denied by the patient: ${input.plan.negatedTerms.join("、") || "(none)"}`,
      `Candidate cases:\n${input.ranked.map(describeCandidate).join("\n")}`,
      `Proposed anchor: ${input.proposedAnchorId}`,
      input.previousAnchor
        ? `Previous anchor: ${input.previousAnchor.caseId} (${input.previousAnchor.diagnosis}), previous coverage ${input.previousCoverage ?? "unknown"}`
        : "Previous anchor: (none)"
    ].join("\n\n");

    return this.reasoning.call(
      { sessionId: input.sessionId, round: input.round, stage: "diagnose", role: "diagnoser", system, user, timeoutMs: this.timeoutMs },
      diagnoseDraftSchema
    );
  }
}
