import type { z } from "zod";
import type { ReasoningLike, ReasoningRequest, ReasoningResult } from "../../src/llm/reasoning";
import type { DiagnoseDraft, GateDraft, ReviewAuditDraft } from "../../src/schemas/reasoning";
import type { RetrievalCapability } from "../../src/services/corpusIndex";
import type { CaseRecord, GateAction, ReasoningFailureKind, RoundRecord } from "../../src/types";

export const ok = <T>(value: T): ReasoningResult<T> => ({ ok: true, value, attempts: 1 });

export const fail = <T>(kind: ReasoningFailureKind): ReasoningResult<T> => ({
  ok: false,
  error: { kind, message: `${kind} failure`, attempts: 1 }
});

export const gateDraft = (action: GateAction = "proceed", overrides: Partial<GateDraft> = {}): GateDraft => ({
  action,
  reason: "test gate",
  symptomTerms: [],
  tonguePulseTerms: [],
  zangfuTerms: [],
  ...overrides
});

export const diagnoseDraft = (overrides: Partial<DiagnoseDraft> = {}): DiagnoseDraft => ({
  anchorCaseId: "C-002",
  coverageRatio: 0.5,
  missingInfo: [],
  primaryPattern: "心血虛",
  analysis: "心血不足，心神失養。",
  followUpQuestions: [],
  contradictsPreviousAnchor: false,
  ...overrides
});

export const passAudit = ok<ReviewAuditDraft>({ verdict: "passed", issues: [] });

export const caseRecord = (caseId: string, diagnosis: string, overrides: Partial<CaseRecord> = {}): CaseRecord => ({
  caseId,
  chiefComplaint: "",
  presentIllness: "",
  diagnosis,
  symptomTerms: [],
  tonguePulseTerms: [],
  zangfuTerms: [],
  domain: "general",
  similarity: 0.5,
  lexical: 0.5,
  score: 0.5,
  virtual: false,
  ...overrides
});

export const roundRecord = (round: number): RoundRecord => ({
  round,
  input: `input ${round}`,
  status: "presented",
  anchorCaseId: null,
  coverageRatio: null,
  converged: false,
  forcedConvergence: false,
  degraded: false,
  completedAt: "2026-01-01T00:00:00.000Z"
});

/** Retrieval stand-in: fixed records per field and for the corpus listing, truncated to the requested limit. */
export class FakeRetrieval implements RetrievalCapability {
  readonly calls: Array<{ field: string; limit: number }> = [];
  readonly listCalls: number[] = [];

  constructor(
    private readonly byField: Record<string, unknown[]>,
    private readonly corpus: unknown[] = []
  ) {}

  async search(_query: string, field: string, limit: number): Promise<unknown[]> {
    this.calls.push({ field, limit });
    return (this.byField[field] ?? []).slice(0, limit);
  }

  async list(limit: number): Promise<unknown[]> {
    this.listCalls.push(limit);
    return this.corpus.slice(0, limit);
  }
}

/** Reasoning stand-in that records each request and validates a canned body with the caller's schema. */
export class RecordingReasoning implements ReasoningLike {
  readonly requests: ReasoningRequest[] = [];

  constructor(private readonly body: unknown) {}

  async call<T>(request: ReasoningRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ReasoningResult<T>> {
    this.requests.push(request);
    const parsed = schema.safeParse(this.body);
    return parsed.success
      ? { ok: true, value: parsed.data, attempts: 1 }
      : { ok: false, error: { kind: "malformed", message: parsed.error.message, attempts: 1 } };
  }
}

export const deferred = () => {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((done) => {
    resolve = done;
  });
  return { promise, resolve };
};

export const wait = (ms: number) => new Promise((resolve) => setTimeout(resolve, ms));
