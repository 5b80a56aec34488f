// Shared utilities for the site safety dispatcher.
//
// Small deterministic helpers used by the coordinator, the strategies and the
// cache. Nothing here holds state.

import { AnalysisAbortedError } from "./errors.js";

// ─── Numbers ────────────────────────────────────────────────────────────────────

export function clamp01(value: number): number {
  if (Number.isNaN(value)) return 0;
  return Math.min(1, Math.max(0, value));
}

export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

// ─── Cancellation ───────────────────────────────────────────────────────────────

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new AnalysisAbortedError(undefined, { cause: signal.reason });
  }
}

/**
 * Resolve after `ms`, or reject with AnalysisAbortedError as soon as `signal`
 * aborts. The timer is always cleared.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AnalysisAbortedError(undefined, { cause: signal.reason }));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AnalysisAbortedError(undefined, { cause: signal?.reason }));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

// ─── Fingerprints ───────────────────────────────────────────────────────────────

/**
 * Map a cache fingerprint (`<workType>:<sha256 hex>`) to a stable bucket in
 * [0, 100) from the first four hex digits of its digest.
 */
export function fingerprintBucket(fingerprint: string): number {
  const digest = fingerprint.slice(fingerprint.lastIndexOf(":") + 1);
  const prefix = Number.parseInt(digest.slice(0, 4), 16);
  return Number.isNaN(prefix) ? 0 : prefix % 100;
}
