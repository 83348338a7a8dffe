import { z } from "zod";

const unitScore = z.number().finite().min(0).max(1);
const terms = z.array(z.string()).default([]);

export const domainSchema = z.enum(["digestive", "gynecological", "general"]);

/** Shape of a corpus entry on disk, before any retrieval scores are attached. */
export const storedCaseSchema = z.object({
  caseId: z.string().min(1),
  chiefComplaint: z.string().default(""),
  presentIllness: z.string().default(""),
  diagnosis: z.string().min(1),
  symptomTerms: terms,
  tonguePulseTerms: terms,
  zangfuTerms: terms,
  domain: domainSchema.optional()
});

/** Shape every retrieval hit must have before it may become a candidate. */
export const retrievedCaseSchema = storedCaseSchema.extend({
  similarity: unitScore,
  lexical: unitScore,
  score: unitScore.optional()
});

export type StoredCase = z.infer<typeof storedCaseSchema>;
export type RetrievedCase = z.infer<typeof retrievedCaseSchema>;
