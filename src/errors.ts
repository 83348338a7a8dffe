import type { StageName } from "./types";

export class ReasoningUnavailableError extends Error {
  readonly statusCode = 503;

  constructor(
    readonly stage: StageName,
    readonly attempts: number,
    message: string
  ) {
    super(`Reasoning capability unavailable during ${stage} after ${attempts} attempt(s): ${message}`);
    this.name = "ReasoningUnavailableError";
  }
}

/** The provider answered, but with no content to parse. */
export class EmptyOutputError extends Error {
  constructor() {
    super("LLM returned empty output.");
    this.name = "EmptyOutputError";
  }
}

export class SessionBusyError extends Error {
  readonly statusCode = 409;
  readonly retryable = true;

  constructor(readonly sessionId: string) {
    super(`Session ${sessionId} already has a round in flight. Retry shortly.`);
    this.name = "SessionBusyError";
  }
}

export class SessionVersionConflictError extends Error {
  readonly statusCode = 409;

  constructor(
    readonly sessionId: string,
    readonly expectedVersion: number,
    readonly actualVersion: number
  ) {
    super(`Session ${sessionId} changed during the round (expected version ${expectedVersion}, found ${actualVersion}).`);
    this.name = "SessionVersionConflictError";
  }
}
