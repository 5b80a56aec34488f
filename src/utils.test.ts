import { describe, it, expect } from "vitest";
import { clamp01, fingerprintBucket, mean, sleep, throwIfAborted } from "./utils.js";
import { AnalysisAbortedError } from "./errors.js";

describe("clamp01", () => {
  it("should pass through values inside the unit interval", () => {
    expect(clamp01(0.42)).toBe(0.42);
  });

  it("should clamp values outside the unit interval", () => {
    expect(clamp01(-3)).toBe(0);
    expect(clamp01(1.7)).toBe(1);
  });

  it("should map NaN to 0", () => {
    expect(clamp01(Number.NaN)).toBe(0);
  });
});

describe("mean", () => {
  it("should average values and return 0 for an empty list", () => {
    expect(mean([1, 2, 3, 6])).toBe(3);
    expect(mean([])).toBe(0);
  });
});

describe("fingerprintBucket", () => {
  it("should use the first four hex digits of the digest modulo 100", () => {
    // 0x00ff = 255 -> 55
    expect(fingerprintBucket("roofing:00ffabcdef")).toBe(55);
    // 0xffff = 65535 -> 35
    expect(fingerprintBucket("electrical:ffff0000")).toBe(35);
  });

  it("should ignore the work type prefix", () => {
    expect(fingerprintBucket("roofing:0064aa")).toBe(fingerprintBucket("welding:0064bb"));
    expect(fingerprintBucket("roofing:0064aa")).toBe(0);
  });

  it("should return 0 for a fingerprint without hex digits", () => {
    expect(fingerprintBucket("other:zz")).toBe(0);
  });
});

describe("sleep / throwIfAborted", () => {
  it("should resolve after the delay", async () => {
    await expect(sleep(5)).resolves.toBeUndefined();
  });

  it("should reject immediately for an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(sleep(10_000, controller.signal)).rejects.toBeInstanceOf(AnalysisAbortedError);
  });

  it("should reject when the signal aborts mid-wait", async () => {
    const controller = new AbortController();
    const pending = sleep(10_000, controller.signal);
    controller.abort();
    await expect(pending).rejects.toBeInstanceOf(AnalysisAbortedError);
  });

  it("should throw only for aborted signals", () => {
    expect(() => throwIfAborted(undefined)).not.toThrow();
    expect(() => throwIfAborted(new AbortController().signal)).not.toThrow();
    const controller = new AbortController();
    controller.abort();
    expect(() => throwIfAborted(controller.signal)).toThrow(AnalysisAbortedError);
  });
});
