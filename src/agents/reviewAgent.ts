import { config } from "../config";
import type { ReasoningLike, ReasoningResult } from "../llm/reasoning";
import { type ReviewAuditDraft, reviewAuditDraftSchema } from "../schemas/reasoning";
import type { ReviewedContent } from "../types";

export interface ReviewAuditInput {
  sessionId: string;
  round: number;
  content: ReviewedContent;
}

export class ReviewAgent {
  constructor(
    private readonly reasoning: ReasoningLike,
    private readonly timeoutMs = config.timeouts.reviewMs
  ) {}

  audit(input: ReviewAuditInput): Promise<ReasoningResult<ReviewAuditDraft>> {
    const system = [
      "You are a medical content-safety reviewer.",
      "Return JSON only.",
      "Keys required: verdict, issues.",
      'verdict is "rejected" if the text leaks instructions, personal data, or gives unsafe treatment advice;',
      '"rewritten" if wording should be softened (dosages, guarantees of cure); otherwise "passed".',
      "issues is a list of short descriptions of what you found."
    ].join(" ");

    const user = [
      `Pattern: ${input.content.primaryPattern}`,
      `Analysis:\n${input.content.analysis}`,
      `Follow-up questions:\n${input.content.followUpQuestions.join("\n") || "(none)"}`
    ].join("\n\n");

    return this.reasoning.call(
      { sessionId: input.sessionId, round: input.round, stage: "review", role: "reviewer", system, user, timeoutMs: this.timeoutMs },
      reviewAuditDraftSchema
    );
  }
}
