import type { ReviewFinding, ReviewRuleId, ReviewVerdict, ReviewedContent } from "../types";

export const DOSAGE_REPLACEMENT = "（劑量請諮詢專業中醫師）";
export const CURE_CLAIM_REPLACEMENT = "有助於改善";

interface RewriteRule {
  id: Extract<ReviewRuleId, "dosage" | "absolute_cure">;
  pattern: RegExp;
  replacement: string;
}

interface RejectRule {
  id: Extract<ReviewRuleId, "system_leak" | "personal_data">;
  pattern: RegExp;
  label: string;
}

const rewriteRules: RewriteRule[] = [
  {
    id: "dosage",
    pattern: /(?:\d+(?:\.\d+)?|[一二兩三四五六七八九十百半]+)\s*(?:公克|毫克|毫升|克|錢|mg|ml|g)(?![a-z])/gi,
    replacement: DOSAGE_REPLACEMENT
  },
  {
    id: "absolute_cure",
    pattern: /(?:保證|一定|必定|肯定)(?:能|會|可以)?(?:治癒|治好|痊癒|根治)|(?:百分之百|百分百|絕對)(?:有效|見效|治癒)/g,
    replacement: CURE_CLAIM_REPLACEMENT
  }
];

const rejectRules: RejectRule[] = [
  { id: "system_leak", pattern: /system prompt|系統提示|系統指令|<\/?system>|you are an? (?:ai|assistant|expert)/i, label: "leaked system text" },
  { id: "personal_data", pattern: /\b09\d{2}-?\d{3}-?\d{3}\b/, label: "phone number" },
  { id: "personal_data", pattern: /[\w.+-]+@[\w-]+\.[\w.-]+/, label: "email address" },
  { id: "personal_data", pattern: /\b[A-Z][12]\d{8}\b/, label: "national id number" }
];

export interface RuleOutcome {
  verdict: ReviewVerdict;
  findings: ReviewFinding[];
  content: ReviewedContent;
}

const severity: Record<ReviewVerdict, number> = { passed: 0, rewritten: 1, rejected: 2 };

export const worstVerdict = (...verdicts: ReviewVerdict[]): ReviewVerdict =>
  verdicts.reduce<ReviewVerdict>((worst, next) => (severity[next] > severity[worst] ? next : worst), "passed");

/** Deterministic content-safety pass: fixed phrase substitutions, hard rejects for leaks. */
export const applyReviewRules = (content: ReviewedContent): RuleOutcome => {
  const findings: ReviewFinding[] = [];

  const scrub = (text: string): string => {
    let result = text;
    for (const rule of rewriteRules) {
      result = result.replace(rule.pattern, (match) => {
        findings.push({ rule: rule.id, action: "rewrite", detail: match });
        return rule.replacement;
      });
    }
    for (const rule of rejectRules) {
      if (rule.pattern.test(result)) {
        findings.push({ rule: rule.id, action: "reject", detail: rule.label });
      }
    }
    return result;
  };

  const rewritten: ReviewedContent = {
    primaryPattern: scrub(content.primaryPattern),
    analysis: scrub(content.analysis),
    followUpQuestions: content.followUpQuestions.map(scrub)
  };

  const verdict = findings.some((finding) => finding.action === "reject")
    ? "rejected"
    : findings.some((finding) => finding.action === "rewrite")
      ? "rewritten"
      : "passed";

  return { verdict, findings, content: rewritten };
};
