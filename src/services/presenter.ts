import type { CaseRecord, Presentation, ReviewedContent } from "../types";

export const DISCLAIMER = "本結果僅供參考，不能取代專業中醫師的診斷與治療。";
export const INSUFFICIENT_EVIDENCE_NOTICE =
  "證據不足：已達問診輪次上限但資訊仍不完整，本結果不應視為確定診斷，請儘快就診專業中醫師。";
export const DEGRADED_NOTICE = "部分推理步驟未能完成，本結果依檢索案例直接整理。";

export interface PresentInput {
  round: number;
  anchor: CaseRecord;
  content: ReviewedContent;
  coverageRatio: number;
  convergenceScore: number;
  forcedConvergence: boolean;
  degraded: boolean;
}

const percent = (value: number): string => `${Math.round(value * 100)}%`;

export class Presenter {
  present(input: PresentInput): Presentation {
    const notices = [DISCLAIMER];
    if (input.forcedConvergence) notices.push(INSUFFICIENT_EVIDENCE_NOTICE);
    if (input.degraded) notices.push(DEGRADED_NOTICE);

    const anchorLabel = input.anchor.virtual ? `${input.anchor.caseId}（依描述整理的虛擬案例）` : input.anchor.caseId;
    const lines = [
      `【辨證結果】${input.content.primaryPattern}`,
      `【參考案例】${anchorLabel}`,
      `【分析】${input.content.analysis}`,
      `【資訊完整度】${percent(input.coverageRatio)}（第 ${input.round} 輪）`
    ];

    if (input.content.followUpQuestions.length > 0) {
      lines.push("【建議補充】", ...input.content.followUpQuestions.map((question, index) => `${index + 1}. ${question}`));
    }
    lines.push(...notices.map((notice) => `※ ${notice}`));

    return {
      primaryPattern: input.content.primaryPattern,
      anchorCaseId: input.anchor.caseId,
      anchorIsVirtual: input.anchor.virtual,
      analysis: input.content.analysis,
      followUpQuestions: [...input.content.followUpQuestions],
      coverageRatio: input.coverageRatio,
      convergenceScore: input.convergenceScore,
      notices,
      text: lines.join("\n")
    };
  }
}
