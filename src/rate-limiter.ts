/**
 * Process-wide request rate limiter.
 * Admits at most one analysis per `1000 / targetFps` ms, measured from the last
 * accepted invocation. It does not distinguish callers.
 */

export interface SlotReservation {
  /** Clock time the request may start. */
  admittedAt: number;
  /** How long the caller must wait before starting; 0 when admitted now. */
  waitMs: number;
}

export class RequestRateLimiter {
  private readonly intervalMs: number;
  private lastAcceptedAt = -Infinity;

  constructor(
    targetFps: number,
    private readonly now: () => number = Date.now,
  ) {
    this.intervalMs = 1000 / targetFps;
  }

  get minIntervalMs(): number {
    return this.intervalMs;
  }

  /** True (and the slot is taken) if a request may run right now. */
  shouldProcessNow(): boolean {
    const now = this.now();
    if (now - this.lastAcceptedAt >= this.intervalMs) {
      this.lastAcceptedAt = now;
      return true;
    }
    return false;
  }

  timeUntilNextSlotMs(): number {
    const remaining = this.lastAcceptedAt + this.intervalMs - this.now();
    return remaining > 0 ? Math.ceil(remaining) : 0;
  }

  /**
   * Book the next free slot. Slots are handed out in call order, each one
   * interval after the previous booking. Returns null, leaving the schedule
   * untouched, if the slot is more than `maxWaitMs` away.
   */
  reserveSlot(maxWaitMs = Infinity): SlotReservation | null {
    const now = this.now();
    const admittedAt = Math.max(now, this.lastAcceptedAt + this.intervalMs);
    const waitMs = admittedAt - now;
    if (waitMs > maxWaitMs) return null;
    this.lastAcceptedAt = admittedAt;
    return { admittedAt, waitMs };
  }

  reset(): void {
    this.lastAcceptedAt = -Infinity;
  }
}
