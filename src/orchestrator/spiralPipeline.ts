import { config, type BusyPolicy } from "../config";
import type { DiagnoseInput } from "../agents/diagnoseAgent";
import type { GateInput } from "../agents/gateAgent";
import type { ReviewAuditInput } from "../agents/reviewAgent";
import { ReasoningUnavailableError } from "../errors";
import type { ReasoningFailure, ReasoningResult } from "../llm/reasoning";
import { componentLogger } from "../logger";
import type { DiagnoseDraft, GateDraft, ReviewAuditDraft } from "../schemas/reasoning";
import type { CaseSelector, Selection } from "../services/caseSelector";
import type { ConvergenceEvaluator } from "../services/convergenceEvaluator";
import type { FollowUpPlanner } from "../services/followUpPlanner";
import { Presenter } from "../services/presenter";
import type { AssembleInput, AssembledCandidates } from "../services/retrievalAssembler";
import { applyReviewRules, worstVerdict } from "../services/reviewRules";
import { PassThroughScreen, type SecurityScreen } from "../services/securityScreen";
import { appendToQuery, type SessionStore } from "../services/sessionStore";
import { dedupe, planTerms } from "../services/termExtractor";
import type {
  AgentRole,
  CaseRecord,
  DiagnoseOutcome,
  DiagnosisResult,
  Domain,
  GateAction,
  GateOutput,
  PipelineIssue,
  Presentation,
  RetrievalPlan,
  ReviewFinding,
  ReviewResult,
  ReviewVerdict,
  RoundResult,
  RoundStatus,
  Session,
  StageName,
  StageOutcomes,
  TraceEntry
} from "../types";

const log = componentLogger("pipeline");

export const REFUSAL_TEXT = "抱歉，這個問題超出本系統可協助的中醫辨證範圍，無法提供回答。如有身體不適，請諮詢專業醫師。";
export const SECURITY_REFUSAL_TEXT = "抱歉，您的訊息未通過安全檢查，無法處理。";
export const DEFAULT_CLARIFICATION = "請再多描述一些您的狀況，例如主要不適症狀、持續多久、睡眠與飲食情況，以及舌象或脈象。";
export const NO_DATA_MESSAGE = "目前找不到足以參考的案例，請補充更具體的症狀描述。";
export const WITHHELD_MESSAGE = "本輪分析內容未通過安全審查，暫不提供結果，請調整描述後再試。";

export interface GateAgentLike {
  assess(input: GateInput): Promise<ReasoningResult<GateDraft>>;
}

export interface DiagnoseAgentLike {
  diagnose(input: DiagnoseInput): Promise<ReasoningResult<DiagnoseDraft>>;
}

export interface ReviewAgentLike {
  audit(input: ReviewAuditInput): Promise<ReasoningResult<ReviewAuditDraft>>;
}

export interface RetrievalAssemblerLike {
  assemble(input: AssembleInput): Promise<AssembledCandidates>;
}

export interface TermExtractorLike {
  extract(text: string): RetrievalPlan;
  classifyDomain(text: string): Domain;
}

export interface SpiralPipelineDeps {
  store: SessionStore;
  assembler: RetrievalAssemblerLike;
  selector: CaseSelector;
  evaluator: ConvergenceEvaluator;
  extractor: TermExtractorLike;
  followUps: FollowUpPlanner;
  gateAgent: GateAgentLike;
  diagnoseAgent: DiagnoseAgentLike;
  reviewAgent: ReviewAgentLike;
  presenter?: Presenter;
  security?: SecurityScreen;
}

export interface SpiralPipelineOptions {
  busyPolicy: BusyPolicy;
}

export interface RoundInput {
  sessionId?: string;
  text: string;
}

type NextStage = StageName | "end";

export const stageTransitions: { [S in StageName]: Record<StageOutcomes[S], NextStage> } = {
  gate: { proceed: "diagnose", reject: "end", ask_more: "end" },
  diagnose: { diagnosed: "review", degraded: "review", no_data: "end" },
  review: { passed: "present", rewritten: "present", rejected: "end" },
  present: { presented: "end" }
};

const stageRoles: Record<TraceEntry["stage"], AgentRole> = {
  security: "security",
  gate: "gate",
  diagnose: "diagnoser",
  review: "reviewer",
  present: "presenter"
};

interface RoundContext {
  session: Session;
  round: number;
  latestInput: string;
  accumulatedQuery: string;
  status: RoundStatus;
  message: string;
  gateOutput: GateOutput | null;
  candidates: CaseRecord[];
  diagnosis: DiagnosisResult | null;
  review: ReviewResult | null;
  presentation: Presentation | null;
  convergenceScore: number | null;
  converged: boolean;
  forcedConvergence: boolean;
  trace: TraceEntry[];
  issues: PipelineIssue[];
  degradedStages: Set<StageName>;
}

export class SpiralPipeline {
  private readonly presenter: Presenter;
  private readonly security: SecurityScreen;

  constructor(
    private readonly deps: SpiralPipelineDeps,
    private readonly options: SpiralPipelineOptions = { busyPolicy: config.sessions.busyPolicy }
  ) {
    this.presenter = deps.presenter ?? new Presenter();
    this.security = deps.security ?? new PassThroughScreen();
  }

  async runRound(input: RoundInput): Promise<RoundResult> {
    const session = this.deps.store.getOrCreate(input.sessionId);
    return this.deps.store.runExclusive(session.id, () => this.executeRound(session.id, input.text), this.options.busyPolicy);
  }

  private async executeRound(sessionId: string, text: string): Promise<RoundResult> {
    // re-read under the lock; a queued round sees the previous round's commit
    const session = this.deps.store.get(sessionId) ?? this.deps.store.getOrCreate(sessionId);
    const ctx: RoundContext = {
      session,
      round: session.roundCount + 1,
      latestInput: text,
      accumulatedQuery: session.accumulatedQuery,
      status: "presented",
      message: "",
      gateOutput: null,
      candidates: [],
      diagnosis: null,
      review: null,
      presentation: null,
      convergenceScore: null,
      converged: false,
      forcedConvergence: false,
      trace: [],
      issues: [],
      degradedStages: new Set()
    };

    try {
      const screened = await this.security.screenInput(text);
      if (!screened.passed) {
        this.rejectForSecurity(ctx, "input", screened.reason ?? "input screen failed");
        return this.finish(ctx, false);
      }

      ctx.latestInput = screened.text;
      ctx.accumulatedQuery = appendToQuery(session.accumulatedQuery, screened.text, ctx.round);

      let next: NextStage = "gate";
      while (next !== "end") {
        switch (next) {
          case "gate":
            next = stageTransitions.gate[await this.runGate(ctx)];
            break;
          case "diagnose":
            next = stageTransitions.diagnose[await this.runDiagnose(ctx)];
            break;
          case "review":
            next = stageTransitions.review[await this.runReview(ctx)];
            break;
          case "present":
            next = stageTransitions.present[this.runPresent(ctx)];
            break;
        }
      }

      if (!ctx.diagnosis && ctx.status !== "rejected") {
        this.applyRoundLimit(ctx);
      }

      if (ctx.presentation) {
        const outgoing = await this.security.screenOutput(ctx.presentation.text);
        if (!outgoing.passed) {
          this.rejectForSecurity(ctx, "output", outgoing.reason ?? "output screen failed");
          return this.finish(ctx, false);
        }
        ctx.presentation = { ...ctx.presentation, text: outgoing.text };
        ctx.message = outgoing.text;
      }

      return this.finish(ctx, ctx.status !== "rejected");
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      log.error({ sessionId, round: ctx.round, err: message }, "round failed");
      this.deps.store.pushEvent(sessionId, "orchestrator", "round_failed", message, { round: ctx.round });
      throw error;
    }
  }

  private async runGate(ctx: RoundContext): Promise<GateAction> {
    const local = this.deps.extractor.extract(ctx.accumulatedQuery);
    const domain = this.deps.extractor.classifyDomain(ctx.accumulatedQuery);
    const result = await this.deps.gateAgent.assess({
      sessionId: ctx.session.id,
      round: ctx.round,
      accumulatedQuery: ctx.accumulatedQuery,
      latestInput: ctx.latestInput
    });

    let output: GateOutput;
    if (result.ok) {
      const draft = result.value;
      const negated = new Set(local.negatedTerms);
      const merge = (fromModel: string[], fromLexicon: string[]) =>
        dedupe([...fromLexicon, ...fromModel]).filter((term) => !negated.has(term));
      output = {
        action: draft.action,
        reason: draft.reason,
        domain,
        plan: {
          symptomTerms: merge(draft.symptomTerms, local.symptomTerms),
          tonguePulseTerms: merge(draft.tonguePulseTerms, local.tonguePulseTerms),
          zangfuTerms: merge(draft.zangfuTerms, local.zangfuTerms),
          negatedTerms: local.negatedTerms
        },
        clarification: draft.clarification?.trim() || undefined,
        degraded: false
      };
    } else {
      this.degrade(ctx, "gate", result.error);
      output = {
        action: planTerms(local).length > 0 ? "proceed" : "ask_more",
        reason: `local lexicon fallback after ${result.error.kind}`,
        domain,
        plan: local,
        degraded: true
      };
    }

    ctx.gateOutput = output;
    if (output.action === "reject") {
      ctx.status = "rejected";
      ctx.message = REFUSAL_TEXT;
      ctx.issues.push({ kind: "ScopeRejected", reason: output.reason });
    } else if (output.action === "ask_more") {
      ctx.status = "needs_more_info";
      ctx.message = output.clarification ?? DEFAULT_CLARIFICATION;
    }

    this.trace(ctx, "gate", "gate_decided", `Gate chose ${output.action}${output.degraded ? " (degraded)" : ""}.`, {
      action: output.action,
      degraded: output.degraded,
      domain,
      terms: planTerms(output.plan).length,
      negated: output.plan.negatedTerms
    });
    return output.action;
  }

  private async runDiagnose(ctx: RoundContext): Promise<DiagnoseOutcome> {
    const gate = this.requireGate(ctx);
    const assembled = await this.deps.assembler.assemble({ query: ctx.accumulatedQuery, plan: gate.plan });
    ctx.trace.push(...assembled.trace);
    ctx.candidates = assembled.candidates;

    const [rawTop] = assembled.candidates;
    if (assembled.empty || !rawTop) {
      ctx.status = "no_data";
      ctx.message = NO_DATA_MESSAGE;
      ctx.issues.push({ kind: "RetrievalEmpty" });
      return "no_data";
    }

    const { selector } = this.deps;
    const ranked = selector.rank(assembled.candidates, gate.plan);
    const proposed = selector.pickBest(ranked);
    const previousAnchor = ctx.session.lastAnchor;
    const previousCoverage = ctx.session.lastCoverageRatio;

    const drafted = await this.deps.diagnoseAgent.diagnose({
      sessionId: ctx.session.id,
      round: ctx.round,
      accumulatedQuery: ctx.accumulatedQuery,
      plan: gate.plan,
      ranked,
      proposedAnchorId: proposed.candidate.caseId,
      previousAnchor,
      previousCoverage
    });
    const result = this.requireKnownAnchor(drafted, assembled.candidates);

    let selection: Selection;
    let coverageRatio: number;
    let primaryPattern: string;
    let analysis: string;
    let missingInfo: string[] = [];
    let suggested: string[] = [];
    let contradiction = false;

    if (result.ok) {
      const draft = result.value;
      const negatedHits = selector.negatedAnchorTerms(previousAnchor, gate.plan.negatedTerms);
      coverageRatio = draft.coverageRatio;
      contradiction = draft.contradictsPreviousAnchor || negatedHits.length > 0;
      selection = selector.select({
        ranked,
        previous: previousAnchor ? { caseId: previousAnchor.caseId, coverageRatio: previousCoverage } : null,
        currentCoverage: coverageRatio,
        contradiction
      });
      primaryPattern = draft.primaryPattern.trim() || selection.candidate.diagnosis;
      analysis = draft.analysis.trim() || `最相近的參考案例為 ${selection.candidate.caseId}（${selection.candidate.diagnosis}）。`;
      missingInfo = draft.missingInfo;
      suggested = draft.followUpQuestions;
    } else {
      this.degrade(ctx, "diagnose", result.error);
      coverageRatio = previousCoverage ?? 0;
      selection = selector.degradedTop(ranked, rawTop);
      primaryPattern = rawTop.diagnosis;
      analysis = `推理服務暫時無法完成分析，以下依檢索結果最相近的參考案例 ${rawTop.caseId}（${rawTop.diagnosis}）整理。`;
    }

    this.trace(ctx, "diagnose", "case_selected", `Anchored on ${selection.candidate.caseId} (${selection.reason}).`, {
      caseId: selection.candidate.caseId,
      reason: selection.reason,
      scores: selection.scores,
      modelAnchorCaseId: result.ok ? result.value.anchorCaseId : null
    });
    if (result.ok && result.value.anchorCaseId !== selection.candidate.caseId) {
      this.trace(
        ctx,
        "diagnose",
        "anchor_disagreement",
        `Model preferred ${result.value.anchorCaseId}; selector anchored on ${selection.candidate.caseId}.`,
        { modelAnchorCaseId: result.value.anchorCaseId, selectedCaseId: selection.candidate.caseId, reason: selection.reason }
      );
    }
    if (previousAnchor && result.ok) {
      const kept = selection.candidate.caseId === previousAnchor.caseId;
      this.trace(
        ctx,
        "diagnose",
        kept ? "anchor_kept" : "anchor_switched",
        kept ? `Kept anchor ${previousAnchor.caseId}.` : `Switched anchor from ${previousAnchor.caseId} to ${selection.candidate.caseId}.`,
        { previous: previousAnchor.caseId, previousCoverage, coverageRatio, contradiction }
      );
    }

    const signal = this.deps.evaluator.evaluate({
      round: ctx.round,
      coverageRatio,
      anchorMatch: selection.scores.total
    });
    const followUpQuestions = this.deps.followUps.plan({
      accumulatedQuery: ctx.accumulatedQuery,
      round: ctx.round,
      band: signal.followUps,
      suggested,
      missingInfo
    });

    ctx.convergenceScore = signal.convergenceScore;
    ctx.converged = signal.converged;
    ctx.forcedConvergence = signal.forcedConvergence;
    if (signal.forcedConvergence) {
      ctx.issues.push({ kind: "ConvergenceForced", round: ctx.round, coverageRatio });
    }
    ctx.diagnosis = {
      anchor: selection.candidate,
      selectionReason: selection.reason,
      scores: selection.scores,
      primaryPattern,
      analysis,
      coverageRatio,
      missingInfo,
      followUpQuestions,
      contradiction,
      degraded: !result.ok
    };

    this.trace(ctx, "diagnose", "convergence_evaluated", signal.converged ? "Converged." : "Not converged; follow-up needed.", {
      coverageRatio,
      convergenceScore: signal.convergenceScore,
      converged: signal.converged,
      forcedConvergence: signal.forcedConvergence,
      followUps: followUpQuestions.length
    });

    return result.ok ? "diagnosed" : "degraded";
  }

  /** A draft naming a case outside the candidate list is treated as malformed. */
  private requireKnownAnchor(result: ReasoningResult<DiagnoseDraft>, candidates: CaseRecord[]): ReasoningResult<DiagnoseDraft> {
    if (!result.ok) return result;
    const { anchorCaseId } = result.value;
    if (candidates.some((candidate) => candidate.caseId === anchorCaseId)) return result;
    return {
      ok: false,
      error: { kind: "malformed", message: `anchorCaseId "${anchorCaseId}" is not one of the candidates.`, attempts: result.attempts }
    };
  }

  /** Rounds that end before Diagnose still count toward the round limit. */
  private applyRoundLimit(ctx: RoundContext): void {
    const lastCoverage = ctx.session.lastCoverageRatio;
    const signal = this.deps.evaluator.roundLimit(ctx.round, lastCoverage);
    if (!signal.converged) return;

    ctx.converged = true;
    ctx.forcedConvergence = signal.forcedConvergence;
    if (signal.forcedConvergence) {
      ctx.issues.push({ kind: "ConvergenceForced", round: ctx.round, coverageRatio: lastCoverage ?? 0 });
    }
    const stage = ctx.status === "no_data" ? "diagnose" : "gate";
    this.trace(ctx, stage, "round_limit_reached", `Round ${ctx.round} reached the round limit without a diagnosis.`, {
      status: ctx.status,
      lastCoverageRatio: lastCoverage,
      forcedConvergence: signal.forcedConvergence
    });
  }

  private async runReview(ctx: RoundContext): Promise<ReviewVerdict> {
    const diagnosis = this.requireDiagnosis(ctx);
    const rules = applyReviewRules({
      primaryPattern: diagnosis.primaryPattern,
      analysis: diagnosis.analysis,
      followUpQuestions: diagnosis.followUpQuestions
    });

    let verdict: ReviewVerdict = rules.verdict;
    const findings: ReviewFinding[] = [...rules.findings];
    let degraded = false;

    if (rules.verdict !== "rejected") {
      const audit = await this.deps.reviewAgent.audit({ sessionId: ctx.session.id, round: ctx.round, content: rules.content });
      if (audit.ok) {
        findings.push(...audit.value.issues.map((detail): ReviewFinding => ({ rule: "audit", action: "note", detail })));
        // the audit can only escalate to a reject; rewrites are limited to the fixed substitutions
        verdict = worstVerdict(verdict, audit.value.verdict === "rejected" ? "rejected" : "passed");
      } else {
        this.degrade(ctx, "review", audit.error);
        degraded = true;
      }
    }

    const review: ReviewResult = { verdict, findings, content: rules.content, degraded };
    ctx.review = review;
    if (verdict === "rejected") {
      ctx.status = "withheld";
      ctx.message = WITHHELD_MESSAGE;
    }

    this.trace(ctx, "review", "review_decided", `Review verdict: ${verdict}${degraded ? " (rules only)" : ""}.`, {
      verdict,
      degraded,
      findings: findings.map((finding) => `${finding.rule}:${finding.action}`)
    });
    return verdict;
  }

  private runPresent(ctx: RoundContext): "presented" {
    const diagnosis = this.requireDiagnosis(ctx);
    const content = ctx.review?.content ?? {
      primaryPattern: diagnosis.primaryPattern,
      analysis: diagnosis.analysis,
      followUpQuestions: diagnosis.followUpQuestions
    };

    const presentation = this.presenter.present({
      round: ctx.round,
      anchor: diagnosis.anchor,
      content,
      coverageRatio: diagnosis.coverageRatio,
      convergenceScore: ctx.convergenceScore ?? 0,
      forcedConvergence: ctx.forcedConvergence,
      degraded: ctx.degradedStages.size > 0
    });

    ctx.presentation = presentation;
    ctx.status = "presented";
    ctx.message = presentation.text;
    this.trace(ctx, "present", "presented", `Presented ${presentation.primaryPattern}.`, {
      notices: presentation.notices.length,
      followUps: presentation.followUpQuestions.length
    });
    return "presented";
  }

  private rejectForSecurity(ctx: RoundContext, phase: "input" | "output", reason: string): void {
    this.deps.store.recordSecurityFlag(ctx.session.id);
    ctx.status = "rejected";
    ctx.message = SECURITY_REFUSAL_TEXT;
    ctx.presentation = null;
    ctx.issues.push({ kind: "SecurityRejected", phase, reason });
    this.trace(ctx, "security", "security_rejected", `Security ${phase} screen failed.`, { phase, reason });
  }

  private degrade(ctx: RoundContext, stage: StageName, failure: ReasoningFailure): void {
    const cause = failure.kind;
    if (cause === "unavailable") {
      throw new ReasoningUnavailableError(stage, failure.attempts, failure.message);
    }

    ctx.degradedStages.add(stage);
    if (cause === "timeout") {
      ctx.issues.push({ kind: "StageTimeout", stage });
    }
    ctx.issues.push({ kind: "StageDegraded", stage, cause });
    log.warn({ sessionId: ctx.session.id, round: ctx.round, stage, cause, err: failure.message }, "stage degraded");
  }

  private trace(ctx: RoundContext, stage: TraceEntry["stage"], event: string, message: string, data?: Record<string, unknown>): void {
    ctx.trace.push({ stage, event, message, at: new Date().toISOString(), data });
  }

  private requireGate(ctx: RoundContext): GateOutput {
    if (!ctx.gateOutput) throw new Error("Diagnose stage reached without a gate decision.");
    return ctx.gateOutput;
  }

  private requireDiagnosis(ctx: RoundContext): DiagnosisResult {
    if (!ctx.diagnosis) throw new Error(`Stage reached without a diagnosis in round ${ctx.round}.`);
    return ctx.diagnosis;
  }

  private finish(ctx: RoundContext, commit: boolean): RoundResult {
    const { store } = this.deps;
    const sessionId = ctx.session.id;
    let committed = false;

    if (commit) {
      const diagnosis = ctx.diagnosis;
      // a degraded round never moves the anchor or coverage; virtual cases live for one round only
      const trusted = diagnosis && !diagnosis.degraded ? diagnosis : null;
      const updated = store.commitRound(sessionId, ctx.session, {
        accumulatedQuery: ctx.accumulatedQuery,
        anchor: trusted && !trusted.anchor.virtual ? trusted.anchor : null,
        coverageRatio: trusted?.coverageRatio ?? null,
        converged: ctx.converged,
        record: {
          round: ctx.round,
          input: ctx.latestInput,
          status: ctx.status,
          anchorCaseId: ctx.diagnosis?.anchor.caseId ?? null,
          coverageRatio: ctx.diagnosis?.coverageRatio ?? null,
          converged: ctx.converged,
          forcedConvergence: ctx.forcedConvergence,
          degraded: ctx.degradedStages.size > 0,
          completedAt: new Date().toISOString()
        }
      });
      committed = updated !== undefined;
      if (!committed) {
        log.warn({ sessionId, round: ctx.round }, "session was reset during the round; result not committed");
      }
    }

    for (const entry of ctx.trace) {
      store.pushEvent(sessionId, stageRoles[entry.stage], entry.event, entry.message, {
        stage: entry.stage === "security" ? undefined : entry.stage,
        round: ctx.round,
        data: entry.data
      });
    }
    store.pushEvent(sessionId, "orchestrator", "round_finished", `Round ${ctx.round} finished: ${ctx.status}.`, {
      round: ctx.round,
      data: { committed, converged: ctx.converged }
    });
    log.info({ sessionId, round: ctx.round, status: ctx.status, committed, degraded: [...ctx.degradedStages] }, "round finished");

    return {
      sessionId,
      round: ctx.round,
      status: ctx.status,
      message: ctx.message,
      gateOutput: ctx.gateOutput,
      candidates: ctx.candidates,
      diagnosis: ctx.diagnosis,
      reviewVerdict: ctx.review,
      presentation: ctx.presentation,
      trace: ctx.trace,
      coverageRatio: ctx.diagnosis?.coverageRatio ?? null,
      convergenceScore: ctx.convergenceScore,
      converged: ctx.converged,
      forcedConvergence: ctx.forcedConvergence,
      degraded: ctx.degradedStages.size > 0,
      degradedStages: [...ctx.degradedStages],
      issues: ctx.issues,
      committed
    };
  }
}
