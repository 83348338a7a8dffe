import { describe, expect, it } from "vitest";
import { SessionVersionConflictError } from "../../src/errors";
import { SessionLock } from "../../src/services/sessionLock";
import { SessionStore, appendToQuery } from "../../src/services/sessionStore";
import { caseRecord, deferred, roundRecord } from "../helpers/fixtures";

const options = { maxResident: 10, idleMs: 10_000, reapIntervalMs: 1_000 };

describe("appendToQuery", () => {
  it("keeps the raw text on round 1 and marks later additions", () => {
    expect(appendToQuery("", "失眠", 1)).toBe("失眠");
    expect(appendToQuery("失眠", "多夢", 2)).toBe("失眠\n補充：多夢");
    expect(appendToQuery("失眠\n補充：多夢", "心悸", 3)).toBe("失眠\n補充：多夢\n再補充：心悸");
  });
});

describe("SessionStore", () => {
  it("creates a session with the requested id and returns it on later calls", () => {
    const store = new SessionStore(options);
    const created = store.getOrCreate("s-1");
    expect(created).toMatchObject({ id: "s-1", roundCount: 0, accumulatedQuery: "", version: 0, lastAnchorCaseId: null });
    expect(store.getOrCreate("s-1").createdAt).toBe(created.createdAt);
    expect(store.stats().resident).toBe(1);
  });

  it("commits a round only when the version matches", () => {
    const store = new SessionStore(options);
    const { incarnation } = store.getOrCreate("s-1");

    const anchor = caseRecord("C-002", "心血虛");
    const committed = store.commitRound("s-1", { incarnation, version: 0 }, {
      accumulatedQuery: "失眠",
      record: roundRecord(1),
      anchor,
      coverageRatio: 0.4,
      converged: false
    });

    expect(committed).toMatchObject({ roundCount: 1, version: 1, lastAnchorCaseId: "C-002", lastCoverageRatio: 0.4 });
    expect(() =>
      store.commitRound("s-1", { incarnation, version: 0 }, {
        accumulatedQuery: "失眠\n補充：多夢",
        record: roundRecord(2),
        anchor: null,
        coverageRatio: null,
        converged: false
      })
    ).toThrow(SessionVersionConflictError);
    expect(store.get("s-1")?.roundCount).toBe(1);
    expect(store.get("s-1")?.accumulatedQuery).toBe("失眠");
  });

  it("keeps the previous anchor and coverage when a round has none", () => {
    const store = new SessionStore(options);
    const { incarnation } = store.getOrCreate("s-1");
    store.commitRound("s-1", { incarnation, version: 0 }, {
      accumulatedQuery: "失眠",
      record: roundRecord(1),
      anchor: caseRecord("C-002", "心血虛"),
      coverageRatio: 0.5,
      converged: false
    });
    const updated = store.commitRound("s-1", { incarnation, version: 1 }, {
      accumulatedQuery: "失眠\n補充：嗯",
      record: roundRecord(2),
      anchor: null,
      coverageRatio: null,
      converged: false
    });

    expect(updated).toMatchObject({ roundCount: 2, lastAnchorCaseId: "C-002", lastCoverageRatio: 0.5 });
    expect(updated?.history.map((item) => item.round)).toEqual([1, 2]);
  });

  it("returns undefined when committing to a session that was reset", () => {
    const store = new SessionStore(options);
    const { incarnation } = store.getOrCreate("s-1");
    expect(store.reset("s-1")).toBe(true);
    expect(
      store.commitRound("s-1", { incarnation, version: 0 }, {
        accumulatedQuery: "x",
        record: roundRecord(1),
        anchor: null,
        coverageRatio: null,
        converged: false
      })
    ).toBeUndefined();
    expect(store.reset("s-1")).toBe(false);
  });

  it("does not commit a stale round into a session recreated under the same id", () => {
    const store = new SessionStore(options);
    const stale = store.getOrCreate("s-1");
    store.reset("s-1");
    const fresh = store.getOrCreate("s-1");

    expect(fresh.incarnation).not.toBe(stale.incarnation);
    expect(
      store.commitRound("s-1", { incarnation: stale.incarnation, version: 0 }, {
        accumulatedQuery: "舊的輸入",
        record: roundRecord(1),
        anchor: caseRecord("C-002", "心血虛"),
        coverageRatio: 0.4,
        converged: false
      })
    ).toBeUndefined();
    expect(store.get("s-1")).toMatchObject({ roundCount: 0, accumulatedQuery: "", lastAnchorCaseId: null, version: 0 });
  });

  it("counts security flags without advancing the round", () => {
    const store = new SessionStore(options);
    store.getOrCreate("s-1");
    store.recordSecurityFlag("s-1");

    expect(store.get("s-1")).toMatchObject({ securityFlagCount: 1, roundCount: 0, version: 1 });
  });

  it("returns copies so callers cannot mutate stored state", () => {
    const store = new SessionStore(options);
    const session = store.getOrCreate("s-1");
    session.roundCount = 99;
    expect(store.get("s-1")?.roundCount).toBe(0);
  });

  it("evicts the oldest idle session when capacity is reached", () => {
    let now = 1_000;
    const store = new SessionStore({ ...options, maxResident: 2 }, undefined, () => now);
    store.getOrCreate("a");
    now = 2_000;
    store.getOrCreate("b");
    now = 3_000;
    store.getOrCreate("a");
    now = 4_000;
    store.getOrCreate("c");

    expect(store.has("a")).toBe(true);
    expect(store.has("b")).toBe(false);
    expect(store.has("c")).toBe(true);
  });

  it("reaps sessions idle longer than the timeout", () => {
    let now = 0;
    const store = new SessionStore(options, undefined, () => now);
    store.getOrCreate("a");
    now = 5_000;
    store.getOrCreate("b");

    expect(store.reap(12_000)).toEqual(["a"]);
    expect(store.has("b")).toBe(true);
  });

  it("does not reap a session with a round in flight", async () => {
    const lock = new SessionLock();
    const store = new SessionStore(options, lock, () => 0);
    store.getOrCreate("a");

    const hold = deferred();
    const running = store.runExclusive("a", () => hold.promise, "queue");

    expect(store.reap(60_000)).toEqual([]);
    expect(store.stats().inFlight).toBe(1);

    hold.resolve();
    await running;
    expect(store.reap(60_000)).toEqual(["a"]);
  });

  it("stores events and notifies subscribers", () => {
    const store = new SessionStore(options);
    store.getOrCreate("s-1");
    const received: string[] = [];
    const unsubscribe = store.subscribe("s-1", (event) => received.push(event.type));

    store.pushEvent("s-1", "gate", "gate_decided", "Gate chose proceed.", { stage: "gate", round: 1 });
    unsubscribe();
    store.pushEvent("s-1", "orchestrator", "round_finished", "done");

    const events = store.getEvents("s-1");
    expect(events.map((event) => event.type)).toEqual(["gate_decided", "round_finished"]);
    expect(events[0]).toMatchObject({ role: "gate", stage: "gate", round: 1 });
    expect(received).toEqual(["gate_decided"]);
  });
});
