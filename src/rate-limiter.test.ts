import { describe, it, expect } from "vitest";
import { RequestRateLimiter } from "./rate-limiter.js";

function makeLimiter(targetFps = 2) {
  const clock = { now: 10_000 };
  const limiter = new RequestRateLimiter(targetFps, () => clock.now);
  return { limiter, clock };
}

describe("RequestRateLimiter", () => {
  it("should derive the interval from the target rate", () => {
    expect(makeLimiter(2).limiter.minIntervalMs).toBe(500);
    expect(makeLimiter(4).limiter.minIntervalMs).toBe(250);
  });

  it("should admit the first call and reject calls inside the interval", () => {
    const { limiter, clock } = makeLimiter();
    expect(limiter.shouldProcessNow()).toBe(true);
    clock.now += 499;
    expect(limiter.shouldProcessNow()).toBe(false);
    clock.now += 1;
    expect(limiter.shouldProcessNow()).toBe(true);
  });

  it("should measure the interval from the last accepted call, not the last attempt", () => {
    const { limiter, clock } = makeLimiter();
    limiter.shouldProcessNow();
    clock.now += 300;
    limiter.shouldProcessNow();
    clock.now += 200;
    expect(limiter.shouldProcessNow()).toBe(true);
  });

  it("should report time until the next slot", () => {
    const { limiter, clock } = makeLimiter();
    expect(limiter.timeUntilNextSlotMs()).toBe(0);
    limiter.shouldProcessNow();
    clock.now += 120;
    expect(limiter.timeUntilNextSlotMs()).toBe(380);
    clock.now += 1_000;
    expect(limiter.timeUntilNextSlotMs()).toBe(0);
  });

  it("should hand out queued reservations one interval apart", () => {
    const { limiter } = makeLimiter();
    expect(limiter.reserveSlot()).toEqual({ admittedAt: 10_000, waitMs: 0 });
    expect(limiter.reserveSlot()).toEqual({ admittedAt: 10_500, waitMs: 500 });
    expect(limiter.reserveSlot()).toEqual({ admittedAt: 11_000, waitMs: 1_000 });
  });

  it("should refuse reservations beyond the maximum wait without consuming a slot", () => {
    const { limiter } = makeLimiter();
    limiter.reserveSlot(600);
    limiter.reserveSlot(600);
    expect(limiter.reserveSlot(600)).toBeNull();
    // the refused call left the second booking (10_500) as the latest
    expect(limiter.timeUntilNextSlotMs()).toBe(1_000);
  });

  it("should forget history on reset", () => {
    const { limiter } = makeLimiter();
    limiter.shouldProcessNow();
    limiter.reset();
    expect(limiter.shouldProcessNow()).toBe(true);
  });
});
