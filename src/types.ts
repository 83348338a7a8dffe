export type AgentRole = "orchestrator" | "security" | "gate" | "diagnoser" | "reviewer" | "presenter";

export type StageName = "gate" | "diagnose" | "review" | "present";

export type GateAction = "proceed" | "reject" | "ask_more";
export type DiagnoseOutcome = "diagnosed" | "degraded" | "no_data";
export type ReviewVerdict = "passed" | "rewritten" | "rejected";
export type PresentOutcome = "presented";

export interface StageOutcomes {
  gate: GateAction;
  diagnose: DiagnoseOutcome;
  review: ReviewVerdict;
  present: PresentOutcome;
}

export type Domain = "digestive" | "gynecological" | "general";

export interface TermSets {
  symptomTerms: string[];
  tonguePulseTerms: string[];
  zangfuTerms: string[];
}

export interface RetrievalPlan extends TermSets {
  negatedTerms: string[];
}

export interface CaseRecord extends TermSets {
  caseId: string;
  chiefComplaint: string;
  presentIllness: string;
  diagnosis: string;
  domain: Domain;
  similarity: number;
  lexical: number;
  score: number;
  virtual: boolean;
}

export type VirtualCase = CaseRecord & { virtual: true };

export type RoundStatus = "presented" | "needs_more_info" | "no_data" | "withheld" | "rejected";

export type ReasoningFailureKind = "timeout" | "malformed" | "unavailable";

export type PipelineIssue =
  | { kind: "ScopeRejected"; reason: string }
  | { kind: "SecurityRejected"; phase: "input" | "output"; reason: string }
  | { kind: "RetrievalEmpty" }
  | { kind: "StageDegraded"; stage: StageName; cause: Exclude<ReasoningFailureKind, "unavailable"> }
  | { kind: "StageTimeout"; stage: StageName }
  | { kind: "ConvergenceForced"; round: number; coverageRatio: number };

export interface TraceEntry {
  stage: StageName | "security";
  event: string;
  message: string;
  at: string;
  data?: Record<string, unknown>;
}

export interface GateOutput {
  action: GateAction;
  reason: string;
  domain: Domain;
  plan: RetrievalPlan;
  clarification?: string;
  degraded: boolean;
}

export type SelectionReason = "scored" | "tie_break" | "continuity" | "degraded_top";

export interface SelectionScores {
  similarity: number;
  symptomJaccard: number;
  tonguePulseJaccard: number;
  specificity: number;
  total: number;
}

export interface DiagnosisResult {
  anchor: CaseRecord;
  selectionReason: SelectionReason;
  scores: SelectionScores;
  primaryPattern: string;
  analysis: string;
  coverageRatio: number;
  missingInfo: string[];
  followUpQuestions: string[];
  contradiction: boolean;
  degraded: boolean;
}

export interface ReviewedContent {
  primaryPattern: string;
  analysis: string;
  followUpQuestions: string[];
}

export type ReviewRuleId = "dosage" | "absolute_cure" | "system_leak" | "personal_data" | "audit";

export interface ReviewFinding {
  rule: ReviewRuleId;
  action: "rewrite" | "reject" | "note";
  detail: string;
}

export interface ReviewResult {
  verdict: ReviewVerdict;
  findings: ReviewFinding[];
  content: ReviewedContent;
  degraded: boolean;
}

export interface Presentation {
  primaryPattern: string;
  anchorCaseId: string;
  anchorIsVirtual: boolean;
  analysis: string;
  followUpQuestions: string[];
  coverageRatio: number;
  convergenceScore: number;
  notices: string[];
  text: string;
}

export interface RoundResult {
  sessionId: string;
  round: number;
  status: RoundStatus;
  message: string;
  gateOutput: GateOutput | null;
  candidates: CaseRecord[];
  diagnosis: DiagnosisResult | null;
  reviewVerdict: ReviewResult | null;
  presentation: Presentation | null;
  trace: TraceEntry[];
  coverageRatio: number | null;
  convergenceScore: number | null;
  converged: boolean;
  forcedConvergence: boolean;
  degraded: boolean;
  degradedStages: StageName[];
  issues: PipelineIssue[];
  committed: boolean;
}

export interface RoundRecord {
  round: number;
  input: string;
  status: RoundStatus;
  anchorCaseId: string | null;
  coverageRatio: number | null;
  converged: boolean;
  forcedConvergence: boolean;
  degraded: boolean;
  completedAt: string;
}

export interface Session {
  id: string;
  roundCount: number;
  accumulatedQuery: string;
  history: RoundRecord[];
  lastAnchorCaseId: string | null;
  lastAnchor: CaseRecord | null;
  lastCoverageRatio: number | null;
  securityFlagCount: number;
  converged: boolean;
  createdAt: string;
  lastUpdatedAt: string;
  version: number;
  /** Fresh for every creation of an id, so a reset and recreated session never matches an older snapshot. */
  incarnation: string;
}

export interface SessionEvent {
  id: string;
  sessionId: string;
  timestamp: string;
  role: AgentRole;
  type: string;
  message: string;
  stage?: StageName;
  round?: number;
  data?: Record<string, unknown>;
}

export interface SessionStats {
  resident: number;
  capacity: number;
  idleMs: number;
  inFlight: number;
}
