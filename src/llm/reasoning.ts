import type { z } from "zod";
import { config } from "../config";
import { EmptyOutputError } from "../errors";
import { componentLogger } from "../logger";
import type { AgentRole, ReasoningFailureKind, StageName } from "../types";
import { extractJsonObject } from "../utils/json";
import { TimeoutError, withTimeout } from "../utils/timeout";

const log = componentLogger("reasoning");

export interface JsonLlmLike {
  /** `signal` is aborted once the caller stops waiting for the answer. */
  completeJsonObject(system: string, user: string, signal?: AbortSignal): Promise<string>;
}

export interface ReasoningRequest {
  sessionId: string;
  round: number;
  stage: StageName;
  role: AgentRole;
  system: string;
  user: string;
  timeoutMs: number;
}

export interface PromptTrace {
  sessionId: string;
  round: number;
  stage: StageName;
  role: AgentRole;
  system: string;
  user: string;
}

export interface ReasoningFailure {
  kind: ReasoningFailureKind;
  message: string;
  attempts: number;
}

export type ReasoningResult<T> = { ok: true; value: T; attempts: number } | { ok: false; error: ReasoningFailure };

export interface ReasoningLike {
  call<T>(request: ReasoningRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ReasoningResult<T>>;
}

const describe = (error: unknown): string => (error instanceof Error ? error.message : String(error));

/**
 * Wraps the JSON-mode LLM call as a Result. Timeouts, empty answers and malformed bodies fail immediately;
 * transport errors are retried up to the retry budget before reporting `unavailable`.
 */
export class ReasoningClient implements ReasoningLike {
  constructor(
    private readonly llm: JsonLlmLike,
    private readonly retryBudget = config.reasoningRetryBudget,
    private readonly onPrompt?: (trace: PromptTrace) => void
  ) {}

  async call<T>(request: ReasoningRequest, schema: z.ZodType<T, z.ZodTypeDef, unknown>): Promise<ReasoningResult<T>> {
    this.onPrompt?.({
      sessionId: request.sessionId,
      round: request.round,
      stage: request.stage,
      role: request.role,
      system: request.system,
      user: request.user
    });

    const maxAttempts = 1 + Math.max(0, this.retryBudget);
    let lastError = "";

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      let raw: string;
      const controller = new AbortController();
      try {
        raw = await withTimeout(
          this.llm.completeJsonObject(request.system, request.user, controller.signal),
          request.timeoutMs,
          `${request.stage} reasoning call`
        );
      } catch (error: unknown) {
        if (error instanceof TimeoutError) {
          controller.abort(error);
          log.warn({ stage: request.stage, sessionId: request.sessionId, ms: error.ms }, "reasoning call timed out");
          return { ok: false, error: { kind: "timeout", message: error.message, attempts: attempt } };
        }
        if (error instanceof EmptyOutputError) {
          return { ok: false, error: { kind: "malformed", message: error.message, attempts: attempt } };
        }
        lastError = describe(error);
        log.warn({ stage: request.stage, sessionId: request.sessionId, attempt, err: lastError }, "reasoning call failed");
        continue;
      }

      let body: unknown;
      try {
        body = JSON.parse(extractJsonObject(raw));
      } catch (error: unknown) {
        return { ok: false, error: { kind: "malformed", message: describe(error), attempts: attempt } };
      }

      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        const message = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
        log.warn({ stage: request.stage, sessionId: request.sessionId, issues: message }, "reasoning output rejected by schema");
        return { ok: false, error: { kind: "malformed", message, attempts: attempt } };
      }

      return { ok: true, value: parsed.data, attempts: attempt };
    }

    return { ok: false, error: { kind: "unavailable", message: lastError || "no response", attempts: maxAttempts } };
  }
}
