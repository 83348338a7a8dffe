import { randomUUID } from "node:crypto";
import { EventEmitter } from "node:events";
import { config, type BusyPolicy } from "../config";
import { SessionVersionConflictError } from "../errors";
import { componentLogger } from "../logger";
import type { AgentRole, CaseRecord, RoundRecord, Session, SessionEvent, SessionStats, StageName } from "../types";
import { SessionLock } from "./sessionLock";

const log = componentLogger("session-store");

export const FOLLOW_UP_MARKER = "\n補充：";
export const REPEATED_FOLLOW_UP_MARKER = "\n再補充：";

/**
 * Extends the accumulated query for the given round number.
 * Round 1 is the raw text, round 2 uses the first follow-up marker, later rounds the repeated one.
 */
export const appendToQuery = (prior: string, text: string, round: number): string => {
  if (round <= 1 || !prior) return text;
  return `${prior}${round === 2 ? FOLLOW_UP_MARKER : REPEATED_FOLLOW_UP_MARKER}${text}`;
};

export interface SessionStoreOptions {
  maxResident: number;
  idleMs: number;
  reapIntervalMs: number;
}

export interface RoundCommit {
  accumulatedQuery: string;
  record: RoundRecord;
  anchor: CaseRecord | null;
  coverageRatio: number | null;
  converged: boolean;
}

export type SessionSnapshot = Pick<Session, "incarnation" | "version">;

interface EventOptions {
  data?: Record<string, unknown>;
  stage?: StageName;
  round?: number;
}

export class SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly touchedAt = new Map<string, number>();
  private readonly events = new Map<string, SessionEvent[]>();
  private readonly emitter = new EventEmitter();
  private reaper?: NodeJS.Timeout;

  constructor(
    private readonly options: SessionStoreOptions = config.sessions,
    private readonly lock = new SessionLock(),
    private readonly now: () => number = () => Date.now(),
    private readonly idFactory: () => string = () => randomUUID()
  ) {}

  getOrCreate(sessionId?: string): Session {
    if (sessionId) {
      const existing = this.sessions.get(sessionId);
      if (existing) {
        this.touchedAt.set(sessionId, this.now());
        return structuredClone(existing);
      }
    }

    this.makeRoom();

    const timestamp = new Date(this.now()).toISOString();
    const session: Session = {
      id: sessionId ?? this.idFactory(),
      roundCount: 0,
      accumulatedQuery: "",
      history: [],
      lastAnchorCaseId: null,
      lastAnchor: null,
      lastCoverageRatio: null,
      securityFlagCount: 0,
      converged: false,
      createdAt: timestamp,
      lastUpdatedAt: timestamp,
      version: 0,
      incarnation: randomUUID()
    };
    this.sessions.set(session.id, session);
    this.touchedAt.set(session.id, this.now());
    this.events.set(session.id, []);
    return structuredClone(session);
  }

  get(sessionId: string): Session | undefined {
    const session = this.sessions.get(sessionId);
    return session ? structuredClone(session) : undefined;
  }

  has(sessionId: string): boolean {
    return this.sessions.has(sessionId);
  }

  /**
   * Applies a finished round only if nobody else changed the session since `expected` was read.
   * Returns undefined when the session was reset or evicted in the meantime, even if the id was recreated since.
   */
  commitRound(sessionId: string, expected: SessionSnapshot, commit: RoundCommit): Session | undefined {
    const current = this.sessions.get(sessionId);
    if (!current || current.incarnation !== expected.incarnation) return undefined;

    if (current.version !== expected.version) {
      throw new SessionVersionConflictError(sessionId, expected.version, current.version);
    }

    current.roundCount += 1;
    current.accumulatedQuery = commit.accumulatedQuery;
    current.history.push(commit.record);
    if (commit.anchor) {
      current.lastAnchor = commit.anchor;
      current.lastAnchorCaseId = commit.anchor.caseId;
    }
    if (commit.coverageRatio !== null) {
      current.lastCoverageRatio = commit.coverageRatio;
    }
    current.converged = commit.converged;
    this.bump(current);
    return structuredClone(current);
  }

  recordSecurityFlag(sessionId: string): void {
    const current = this.sessions.get(sessionId);
    if (!current) return;
    current.securityFlagCount += 1;
    this.bump(current);
  }

  reset(sessionId: string): boolean {
    const existed = this.sessions.delete(sessionId);
    this.touchedAt.delete(sessionId);
    this.events.delete(sessionId);
    if (existed) {
      log.info({ sessionId }, "session reset");
    }
    return existed;
  }

  runExclusive<T>(sessionId: string, task: () => Promise<T>, policy: BusyPolicy = config.sessions.busyPolicy): Promise<T> {
    return this.lock.run(sessionId, task, policy);
  }

  /** Evicts idle sessions, then the oldest-idle ones while over capacity. Sessions with a round in flight are skipped. */
  reap(nowMs = this.now()): string[] {
    const evicted: string[] = [];

    for (const [sessionId, touched] of this.touchedAt.entries()) {
      if (nowMs - touched > this.options.idleMs && !this.lock.isHeld(sessionId)) {
        this.evict(sessionId);
        evicted.push(sessionId);
      }
    }

    evicted.push(...this.trimTo(this.options.maxResident));

    if (evicted.length > 0) {
      log.info({ evicted: evicted.length, resident: this.sessions.size }, "reaped sessions");
    }
    return evicted;
  }

  start(): void {
    if (this.reaper) return;
    this.reaper = setInterval(() => {
      this.reap();
    }, this.options.reapIntervalMs);
    this.reaper.unref();
  }

  stop(): void {
    if (!this.reaper) return;
    clearInterval(this.reaper);
    this.reaper = undefined;
  }

  stats(): SessionStats {
    return {
      resident: this.sessions.size,
      capacity: this.options.maxResident,
      idleMs: this.options.idleMs,
      inFlight: this.lock.heldCount
    };
  }

  pushEvent(
    sessionId: string,
    role: AgentRole,
    type: string,
    message: string,
    options: EventOptions = {}
  ): SessionEvent {
    const event: SessionEvent = {
      id: randomUUID(),
      sessionId,
      timestamp: new Date(this.now()).toISOString(),
      role,
      type,
      message,
      stage: options.stage,
      round: options.round,
      data: options.data
    };

    const list = this.events.get(sessionId);
    if (list) {
      list.push(event);
    }
    this.emitter.emit(`session:${sessionId}`, event);
    return event;
  }

  getEvents(sessionId: string): SessionEvent[] {
    return [...(this.events.get(sessionId) ?? [])];
  }

  subscribe(sessionId: string, handler: (event: SessionEvent) => void): () => void {
    const channel = `session:${sessionId}`;
    this.emitter.on(channel, handler);
    return () => this.emitter.off(channel, handler);
  }

  private bump(session: Session): void {
    session.version += 1;
    session.lastUpdatedAt = new Date(this.now()).toISOString();
    this.touchedAt.set(session.id, this.now());
  }

  private makeRoom(): void {
    const evicted = this.trimTo(this.options.maxResident - 1);
    if (evicted.length > 0) {
      log.warn({ evicted }, "session capacity reached, evicted oldest idle sessions");
    }
  }

  private trimTo(limit: number): string[] {
    if (this.sessions.size <= limit) return [];

    const evicted: string[] = [];
    const oldestFirst = [...this.touchedAt.entries()].sort((a, b) => a[1] - b[1]);
    for (const [sessionId] of oldestFirst) {
      if (this.sessions.size <= limit) break;
      if (this.lock.isHeld(sessionId)) continue;
      this.evict(sessionId);
      evicted.push(sessionId);
    }
    return evicted;
  }

  private evict(sessionId: string): void {
    this.sessions.delete(sessionId);
    this.touchedAt.delete(sessionId);
    this.events.delete(sessionId);
  }
}
