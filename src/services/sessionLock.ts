import type { BusyPolicy } from "../config";
import { SessionBusyError } from "../errors";

export class SessionLock {
  private readonly tails = new Map<string, Promise<void>>();
  private readonly pending = new Map<string, number>();

  isHeld(sessionId: string): boolean {
    return this.pending.has(sessionId);
  }

  get heldCount(): number {
    return this.pending.size;
  }

  async run<T>(sessionId: string, task: () => Promise<T>, policy: BusyPolicy = "queue"): Promise<T> {
    if (policy === "reject" && this.pending.has(sessionId)) {
      throw new SessionBusyError(sessionId);
    }

    const previous = this.tails.get(sessionId) ?? Promise.resolve();
    const current = previous.then(() => task());
    const tail = current.then(
      () => undefined,
      () => undefined
    );

    this.tails.set(sessionId, tail);
    this.pending.set(sessionId, (this.pending.get(sessionId) ?? 0) + 1);

    try {
      return await current;
    } finally {
      const left = (this.pending.get(sessionId) ?? 1) - 1;
      if (left > 0) {
        this.pending.set(sessionId, left);
      } else {
        this.pending.delete(sessionId);
        if (this.tails.get(sessionId) === tail) {
          this.tails.delete(sessionId);
        }
      }
    }
  }
}
