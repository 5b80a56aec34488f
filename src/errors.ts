// Error taxonomy for the analysis dispatcher.
//
// Per-strategy errors are recorded by the coordinator and never reach the
// caller; only AllStrategiesExhaustedError, ValidationError, RateLimitedError
// and AnalysisAbortedError surface from analyze().

import type { AnalysisType, Backend, ThermalState } from "./types.js";

export type AnalysisErrorCode =
  | "configuration"
  | "unavailable"
  | "timeout"
  | "thermal_throttling"
  | "out_of_memory"
  | "inference"
  | "all_strategies_exhausted"
  | "validation"
  | "rate_limited"
  | "aborted";

export class AnalysisError extends Error {
  readonly code: AnalysisErrorCode;

  constructor(code: AnalysisErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The strategy never became usable (missing credential, failed backend init). */
export class ConfigurationError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("configuration", message, options);
  }
}

export class UnavailableError extends AnalysisError {
  constructor(
    readonly strategyName: string,
    readonly reason: string,
  ) {
    super("unavailable", `${strategyName} unavailable: ${reason}`);
  }
}

export class TimeoutError extends AnalysisError {
  constructor(
    readonly strategyName: string,
    readonly timeoutMs: number,
  ) {
    super("timeout", `${strategyName} timed out after ${timeoutMs}ms`);
  }
}

export class ThermalThrottlingError extends AnalysisError {
  constructor(
    readonly thermalState: ThermalState,
    message = `Thermal state "${thermalState}" forced a CPU downgrade`,
  ) {
    super("thermal_throttling", message);
  }
}

export class OutOfMemoryError extends AnalysisError {
  constructor(
    message: string,
    readonly backend: Backend | null = null,
    options?: { cause?: unknown },
  ) {
    super("out_of_memory", message, options);
  }
}

/** The strategy ran but produced an error or an unusable result. */
export class InferenceError extends AnalysisError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("inference", message, options);
  }
}

export class ValidationError extends AnalysisError {
  constructor(message: string) {
    super("validation", message);
  }
}

export class RateLimitedError extends AnalysisError {
  constructor(readonly retryAfterMs: number) {
    super("rate_limited", `Analysis rate limit reached; next slot in ${retryAfterMs}ms`);
  }
}

export class AnalysisAbortedError extends AnalysisError {
  constructor(message = "Analysis aborted by caller", options?: { cause?: unknown }) {
    super("aborted", message, options);
  }
}

// ─── Aggregate Failure ──────────────────────────────────────────────────────────

export interface SkippedStrategy {
  name: string;
  analysisType: AnalysisType;
  /** e.g. "unavailable", "disabled", "not in rollout" */
  reason: string;
}

export interface FailedAttempt {
  name: string;
  analysisType: AnalysisType;
  error: AnalysisError;
  latencyMs: number;
}

export class AllStrategiesExhaustedError extends AnalysisError {
  constructor(
    readonly skipped: readonly SkippedStrategy[],
    readonly failed: readonly FailedAttempt[],
    readonly lastError: AnalysisError | null,
  ) {
    super("all_strategies_exhausted", formatExhaustedMessage(skipped, failed, lastError), {
      cause: lastError ?? undefined,
    });
  }
}

function formatExhaustedMessage(
  skipped: readonly SkippedStrategy[],
  failed: readonly FailedAttempt[],
  lastError: AnalysisError | null,
): string {
  const parts = ["All analysis strategies exhausted."];
  if (skipped.length > 0) {
    parts.push(`Skipped: ${skipped.map((s) => `${s.name} (${s.reason})`).join(", ")}.`);
  }
  if (failed.length > 0) {
    parts.push(`Failed: ${failed.map((f) => `${f.name} (${f.error.code})`).join(", ")}.`);
  }
  parts.push(`Last error: ${lastError ? lastError.message : "none"}`);
  return parts.join(" ");
}

// ─── Helpers ────────────────────────────────────────────────────────────────────

/** Extract a readable message from anything that was thrown. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === "string") return err;
  return String(err);
}

/**
 * Normalize an arbitrary rejection from a strategy into the taxonomy.
 * Already-classified errors pass through untouched.
 */
export function toAnalysisError(err: unknown): AnalysisError {
  if (err instanceof AnalysisError) return err;
  return new InferenceError(describeError(err), { cause: err });
}
