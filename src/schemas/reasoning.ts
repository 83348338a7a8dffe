import { z } from "zod";

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const readFirstString = (record: Record<string, unknown>, keys: string[]): string => {
  for (const key of keys) {
    const value = record[key];
    if (typeof value === "string" && value.trim()) {
      return value.trim();
    }
  }
  return "";
};

// Models sometimes return objects where plain strings are expected.
const stringList = z.preprocess(
  (value) =>
    Array.isArray(value)
      ? value
          .map((item) => (typeof item === "string" ? item.trim() : isRecord(item) ? readFirstString(item, ["text", "term", "question", "detail"]) : ""))
          .filter((item) => item.length > 0)
      : value,
  z.array(z.string())
);

// Percentages (0..100) are accepted and scaled to a ratio.
const ratio = z.preprocess(
  (value) => (typeof value === "number" && value > 1 && value <= 100 ? value / 100 : value),
  z.number().finite().min(0).max(1)
);

export const gateDraftSchema = z.object({
  action: z.enum(["proceed", "reject", "ask_more"]),
  reason: z.string().default(""),
  symptomTerms: stringList.default([]),
  tonguePulseTerms: stringList.default([]),
  zangfuTerms: stringList.default([]),
  clarification: z.string().optional()
});

export const diagnoseDraftSchema = z.object({
  anchorCaseId: z.string().min(1),
  coverageRatio: ratio,
  missingInfo: stringList,
  primaryPattern: z.string().default(""),
  analysis: z.string().default(""),
  followUpQuestions: stringList.default([]),
  contradictsPreviousAnchor: z.boolean().default(false)
});

export const reviewAuditDraftSchema = z.object({
  verdict: z.enum(["passed", "rewritten", "rejected"]),
  issues: stringList.default([])
});

export type GateDraft = z.infer<typeof gateDraftSchema>;
export type DiagnoseDraft = z.infer<typeof diagnoseDraftSchema>;
export type ReviewAuditDraft = z.infer<typeof reviewAuditDraftSchema>;
