// Analysis Coordinator
// Runs one safety-photo analysis through the cascade:
//
//   CACHE_CHECK → RATE_GATE → TRY_STRATEGY(i) → SUCCESS | NEXT_STRATEGY | EXHAUSTED
//
// Strategies are tried in descending priority. Each attempt gets its own
// AbortController, aborted by the attempt timeout or by the caller's signal.
// Identical requests in flight at the same time share one cascade.

import { v4 as uuidv4 } from "uuid";
import type { CapabilityAssessor } from "./capability-assessor.js";
import { isWorkType, resolveOrchestratorConfig } from "./config.js";
import type { OrchestratorConfigInput } from "./config.js";
import { validateDetectionParameters } from "./detector-fallback-strategy.js";
import {
  AllStrategiesExhaustedError,
  AnalysisAbortedError,
  AnalysisError,
  ConfigurationError,
  RateLimitedError,
  TimeoutError,
  UnavailableError,
  ValidationError,
  describeError,
  toAnalysisError,
} from "./errors.js";
import type { FailedAttempt, SkippedStrategy } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import type { Logger } from "./logger.js";
import { RequestRateLimiter } from "./rate-limiter.js";
import { ResultCache, computeFingerprint } from "./result-cache.js";
import { StatsTracker } from "./stats-tracker.js";
import { uniqueLines } from "./analysis-payload.js";
import { clamp01, fingerprintBucket, sleep as abortableSleep, throwIfAborted } from "./utils.js";
import type {
  AnalysisRequest,
  AnalysisType,
  AnalyzerStrategy,
  ConnectivityMonitor,
  DeviceCapability,
  HealthCheckResult,
  MemoryPressure,
  OrchestratorConfig,
  OrchestratorStats,
  SafetyAnalysis,
  StrategyHealth,
  WorkType,
} from "./types.js";

// ─── Constants ──────────────────────────────────────────────────────────────────

export const DEGRADED_CAVEATS: readonly string[] = [
  "Limited analysis: advanced analysis services unavailable",
  "Manual safety review recommended for a comprehensive assessment",
];

export const DEFAULT_BATCH_CONCURRENCY = 3;

// ─── Dependency injection interface ─────────────────────────────────────────────

type TimerHandle = ReturnType<typeof setTimeout>;

/** Starts and clears attempt timeout clocks. */
export interface AttemptTimers {
  set(callback: () => void, ms: number): TimerHandle;
  clear(handle: TimerHandle): void;
}

const NODE_TIMERS: AttemptTimers = {
  set: (callback, ms) => setTimeout(callback, ms),
  clear: (handle) => clearTimeout(handle),
};

export interface AnalysisCoordinatorDeps {
  strategies: readonly AnalyzerStrategy[];
  assessor: CapabilityAssessor;
  config?: OrchestratorConfigInput;
  connectivity?: ConnectivityMonitor;
  cache?: ResultCache;
  rateLimiter?: RequestRateLimiter;
  stats?: StatsTracker;
  logger?: Logger;
  now?: () => number;
  timers?: AttemptTimers;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface AnalyzeOptions {
  signal?: AbortSignal;
}

export interface BatchItem {
  image: Buffer;
  workType: WorkType;
}

export interface StrategyConfigureResult {
  name: string;
  analysisType: AnalysisType;
  ok: boolean;
  error: string | null;
}

interface InFlightCascade {
  promise: Promise<SafetyAnalysis>;
  controller: AbortController;
  participants: number;
}

// ─── Coordinator ────────────────────────────────────────────────────────────────

export class AnalysisCoordinator {
  readonly config: OrchestratorConfig;
  private readonly strategies: readonly AnalyzerStrategy[];
  private readonly assessor: CapabilityAssessor;
  private readonly connectivity: ConnectivityMonitor | null;
  private readonly cache: ResultCache;
  private readonly rateLimiter: RequestRateLimiter;
  private readonly stats: StatsTracker;
  private readonly logger: Logger;
  private readonly now: () => number;
  private readonly timers: AttemptTimers;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  private readonly disabled: Set<AnalysisType>;
  private readonly inFlight = new Map<string, InFlightCascade>();
  private disposed = false;

  constructor(deps: AnalysisCoordinatorDeps) {
    this.config = resolveOrchestratorConfig(deps.config);
    this.now = deps.now ?? Date.now;
    this.assessor = deps.assessor;
    this.connectivity = deps.connectivity ?? null;
    this.cache =
      deps.cache ??
      new ResultCache({ ttlMs: this.config.cache.ttlMs, maxEntries: this.config.cache.maxEntries, now: this.now });
    this.rateLimiter = deps.rateLimiter ?? new RequestRateLimiter(this.config.targetFps, this.now);
    this.stats = deps.stats ?? new StatsTracker(this.config.rollingWindowSize);
    this.logger = deps.logger ?? createConsoleLogger("AnalysisCoordinator");
    this.timers = deps.timers ?? NODE_TIMERS;
    this.sleep = deps.sleep ?? abortableSleep;
    this.disabled = new Set(this.config.disabledStrategies);

    const seen = new Set<AnalysisType>();
    for (const strategy of deps.strategies) {
      if (seen.has(strategy.analysisType)) {
        throw new ConfigurationError(`Duplicate strategy for analysis type "${strategy.analysisType}"`);
      }
      seen.add(strategy.analysisType);
    }
    this.strategies = [...deps.strategies].sort((a, b) => b.priority - a.priority);
    this.logger.info(
      `Strategy order: ${this.strategies.map((s) => `${s.name} (${s.priority})`).join(" → ") || "none"}`,
    );
  }

  // ─── Analysis ─────────────────────────────────────────────────────────────

  /**
   * Analyze one photo. Resolves with the first strategy result (or a cached
   * one); rejects with ValidationError, RateLimitedError, AnalysisAbortedError
   * or AllStrategiesExhaustedError.
   */
  async analyze(image: Buffer, workType: WorkType, options: AnalyzeOptions = {}): Promise<SafetyAnalysis> {
    if (this.disposed) throw new ConfigurationError("Analysis coordinator has been disposed");
    if (image.length === 0) throw new ValidationError("Image must not be empty");
    if (!isWorkType(workType)) throw new ValidationError(`Unknown work type "${workType}"`);
    throwIfAborted(options.signal);

    const request: AnalysisRequest = { id: uuidv4(), image, workType, createdAt: this.now() };
    const fingerprint = computeFingerprint(image, workType);

    if (this.config.cache.enabled) {
      const cached = this.cache.get(fingerprint);
      if (cached) {
        this.stats.recordRequest();
        this.stats.recordCacheHit();
        this.logger.debug(`Request ${request.id}: cache hit (${cached.analysisType})`);
        return cached;
      }
    }

    let flight = this.config.coalesceInFlight ? this.inFlight.get(fingerprint) : undefined;
    // every earlier caller left; the cascade is winding down and must not be joined
    if (flight?.controller.signal.aborted) flight = undefined;
    if (flight) {
      this.logger.debug(`Request ${request.id}: joined in-flight analysis`);
    } else {
      const controller = new AbortController();
      const promise = this.runCascade(request, fingerprint, controller.signal).finally(() => {
        if (this.inFlight.get(fingerprint)?.controller === controller) this.inFlight.delete(fingerprint);
      });
      flight = { promise, controller, participants: 0 };
      if (this.config.coalesceInFlight) this.inFlight.set(fingerprint, flight);
    }
    return this.participate(flight, options.signal);
  }

  /** Analyze many photos with at most `maxConcurrency` cascades at once. Outcomes keep input order. */
  async analyzeBatch(
    items: readonly BatchItem[],
    maxConcurrency = DEFAULT_BATCH_CONCURRENCY,
    options: AnalyzeOptions = {},
  ): Promise<PromiseSettledResult<SafetyAnalysis>[]> {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new ValidationError(`maxConcurrency must be a positive integer, got ${maxConcurrency}`);
    }

    const results: PromiseSettledResult<SafetyAnalysis>[] = new Array(items.length);
    let next = 0;
    const worker = async () => {
      while (next < items.length) {
        const index = next++;
        const item = items[index];
        try {
          results[index] = { status: "fulfilled", value: await this.analyze(item.image, item.workType, options) };
        } catch (reason) {
          results[index] = { status: "rejected", reason };
        }
      }
    };

    await Promise.all(Array.from({ length: Math.min(maxConcurrency, items.length) }, worker));
    return results;
  }

  // ─── Queries ──────────────────────────────────────────────────────────────

  getDeviceCapability(): Promise<DeviceCapability> {
    return this.assessor.assess();
  }

  getStats(): OrchestratorStats {
    return this.stats.snapshot();
  }

  resetStats(): void {
    this.stats.reset();
    this.logger.info("Stats reset");
  }

  /** Probe strategy availability and connectivity without running an analysis. */
  healthCheck(): HealthCheckResult {
    const below = this.stats.strategiesBelowFloor(this.config.successRateFloor, this.config.minSamplesForFloor);
    const strategies: StrategyHealth[] = this.strategies.map((strategy) => {
      const started = this.now();
      const available = strategy.isAvailable();
      return {
        name: strategy.name,
        analysisType: strategy.analysisType,
        enabled: !this.disabled.has(strategy.analysisType),
        available,
        probeLatencyMs: this.now() - started,
        averageLatencyMs: this.stats.averageLatencyMs(strategy.analysisType),
        rollingSuccessRate: this.stats.rollingSuccessRate(strategy.analysisType),
      };
    });

    return {
      strategies,
      networkConnected: this.connectivity ? this.connectivity.isConnected : null,
      overallHealthy: strategies.some((s) => s.enabled && s.available && !below.includes(s.analysisType)),
      strategiesBelowFloor: below,
      checkedAt: new Date(this.now()).toISOString(),
    };
  }

  isStrategyEnabled(type: AnalysisType): boolean {
    return !this.disabled.has(type);
  }

  // ─── Control ──────────────────────────────────────────────────────────────

  /** Emergency switch: a disabled strategy is skipped until re-enabled. */
  setStrategyEnabled(type: AnalysisType, enabled: boolean): void {
    if (enabled) this.disabled.delete(type);
    else this.disabled.add(type);
    this.logger.warn(`Strategy ${type} ${enabled ? "enabled" : "disabled"}`);
  }

  updateDetectionParameters(confidenceThreshold: number, iouThreshold: number): void {
    const params = { confidenceThreshold, iouThreshold };
    validateDetectionParameters(params);
    for (const strategy of this.strategies) {
      strategy.updateDetectionParameters?.(params);
    }
    this.logger.info(`Detection parameters set: confidence ${confidenceThreshold}, IoU ${iouThreshold}`);
  }

  /**
   * Configure every strategy. A strategy that fails stays unavailable and is
   * reported; the others are still configured.
   */
  async configure(credential?: string): Promise<StrategyConfigureResult[]> {
    const results: StrategyConfigureResult[] = [];
    for (const strategy of this.strategies) {
      try {
        await strategy.configure(credential);
        results.push({ name: strategy.name, analysisType: strategy.analysisType, ok: true, error: null });
      } catch (err) {
        this.logger.warn(`${strategy.name} could not be configured: ${describeError(err)}`);
        results.push({
          name: strategy.name,
          analysisType: strategy.analysisType,
          ok: false,
          error: describeError(err),
        });
      }
    }
    return results;
  }

  /** Shrink the result cache for the reported pressure level. Returns the evicted count. */
  handleMemoryPressure(level: MemoryPressure): number {
    const evicted = this.cache.trim(level);
    if (evicted > 0) this.logger.info(`Memory pressure ${level}: evicted ${evicted} cached analyses`);
    return evicted;
  }

  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;
    for (const flight of this.inFlight.values()) {
      flight.controller.abort(new AnalysisAbortedError("Analysis coordinator disposed"));
    }
    this.inFlight.clear();
    this.cache.clear();

    const released = await Promise.allSettled(this.strategies.map((s) => s.release?.()));
    released.forEach((outcome, i) => {
      if (outcome.status === "rejected") {
        this.logger.warn(`${this.strategies[i].name} release failed: ${describeError(outcome.reason)}`);
      }
    });
  }

  // ─── Cascade ──────────────────────────────────────────────────────────────

  /** Each caller waits on the shared cascade; it is aborted once every caller has aborted. */
  private participate(flight: InFlightCascade, signal: AbortSignal | undefined): Promise<SafetyAnalysis> {
    flight.participants++;
    return new Promise<SafetyAnalysis>((resolve, reject) => {
      const onAbort = () => {
        flight.participants--;
        if (flight.participants === 0) flight.controller.abort(signal?.reason);
        reject(new AnalysisAbortedError(undefined, { cause: signal?.reason }));
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      void flight.promise.then(
        (analysis) => {
          signal?.removeEventListener("abort", onAbort);
          resolve(analysis);
        },
        (err: unknown) => {
          signal?.removeEventListener("abort", onAbort);
          reject(err);
        },
      );
    });
  }

  private async runCascade(request: AnalysisRequest, fingerprint: string, signal: AbortSignal): Promise<SafetyAnalysis> {
    const reservation = this.rateLimiter.reserveSlot(this.config.maxRateLimitWaitMs);
    if (!reservation) {
      const retryAfterMs = this.rateLimiter.timeUntilNextSlotMs();
      this.logger.warn(`Request ${request.id}: rate limited, next slot in ${retryAfterMs}ms`);
      throw new RateLimitedError(retryAfterMs);
    }
    if (reservation.waitMs > 0) await this.sleep(reservation.waitMs, signal);

    this.stats.recordRequest();
    const startedAt = this.now();
    const skipped: SkippedStrategy[] = [];
    const failed: FailedAttempt[] = [];
    let lastUnavailable: UnavailableError | null = null;

    for (const strategy of this.strategies) {
      throwIfAborted(signal);

      const skipReason = this.skipReason(strategy, fingerprint);
      if (skipReason) {
        skipped.push({ name: strategy.name, analysisType: strategy.analysisType, reason: skipReason });
        if (skipReason === "unavailable") lastUnavailable = new UnavailableError(strategy.name, "not ready");
        this.logger.debug(`Request ${request.id}: skipping ${strategy.name} (${skipReason})`);
        continue;
      }

      const timeoutMs = await this.timeoutFor(strategy);
      throwIfAborted(signal);
      const attemptStart = this.now();
      try {
        const result = await this.attempt(strategy, request, timeoutMs, signal);
        this.stats.recordSuccess(strategy.analysisType, this.now() - attemptStart);
        const passedOver = [...skipped.map((s) => s.name), ...failed.map((f) => f.name)];
        const analysis = this.finalize(result, strategy, passedOver, this.now() - startedAt);
        if (this.config.cache.enabled) this.cache.put(fingerprint, analysis);
        this.logger.debug(`Request ${request.id}: ${strategy.name} succeeded in ${analysis.processingTimeMs}ms`);
        return analysis;
      } catch (err) {
        if (signal.aborted) {
          throw err instanceof AnalysisAbortedError ? err : new AnalysisAbortedError(undefined, { cause: signal.reason });
        }
        const error = toAnalysisError(err);
        const latencyMs = this.now() - attemptStart;
        this.stats.recordFailure(strategy.analysisType, latencyMs);
        failed.push({ name: strategy.name, analysisType: strategy.analysisType, error, latencyMs });
        this.logger.warn(`Request ${request.id}: ${strategy.name} failed (${error.code}): ${error.message}`);
      }
    }

    this.stats.recordExhausted();
    const lastError: AnalysisError | null = failed.at(-1)?.error ?? lastUnavailable;
    const exhausted = new AllStrategiesExhaustedError(skipped, failed, lastError);
    this.logger.error(`Request ${request.id}: ${exhausted.message}`);
    throw exhausted;
  }

  private skipReason(strategy: AnalyzerStrategy, fingerprint: string): string | null {
    if (this.disabled.has(strategy.analysisType)) return "disabled";
    const rollout = this.config.rolloutPercentage[strategy.analysisType];
    if (rollout !== undefined && rollout < 100 && fingerprintBucket(fingerprint) >= rollout) {
      return "not in rollout";
    }
    if (!strategy.isAvailable()) return "unavailable";
    return null;
  }

  private async timeoutFor(strategy: AnalyzerStrategy): Promise<number> {
    const { timeouts, thermalTimeoutPenalty } = this.config;
    const timeoutMs =
      strategy.kind === "on-device"
        ? timeouts.onDevice[(await this.assessor.assess()).tier]
        : strategy.kind === "cloud"
          ? timeouts.cloud
          : timeouts.degraded;

    if (!strategy.currentCondition) return timeoutMs;
    try {
      const { throttling } = await strategy.currentCondition();
      if (!throttling) return timeoutMs;
      const penalized = Math.round(timeoutMs * thermalTimeoutPenalty);
      this.logger.warn(`${strategy.name} is throttled (${throttling.thermalState}); timeout ${penalized}ms`);
      return penalized;
    } catch (err) {
      this.logger.warn(`${strategy.name} condition check failed: ${describeError(err)}`);
      return timeoutMs;
    }
  }

  /** Run one strategy under its timeout; the caller's abort stops waiting immediately. */
  private attempt(
    strategy: AnalyzerStrategy,
    request: AnalysisRequest,
    timeoutMs: number,
    parent: AbortSignal,
  ): Promise<SafetyAnalysis> {
    return new Promise<SafetyAnalysis>((resolve, reject) => {
      if (parent.aborted) {
        reject(new AnalysisAbortedError(undefined, { cause: parent.reason }));
        return;
      }
      const controller = new AbortController();
      const finish = () => {
        this.timers.clear(timer);
        parent.removeEventListener("abort", onAbort);
      };
      const onAbort = () => {
        finish();
        controller.abort(parent.reason);
        reject(new AnalysisAbortedError(undefined, { cause: parent.reason }));
      };
      const timer = this.timers.set(() => {
        finish();
        const err = new TimeoutError(strategy.name, timeoutMs);
        controller.abort(err);
        reject(err);
      }, timeoutMs);
      parent.addEventListener("abort", onAbort, { once: true });

      let pending: Promise<SafetyAnalysis>;
      try {
        pending = strategy.analyze(request.image, request.workType, controller.signal);
      } catch (err) {
        finish();
        reject(err);
        return;
      }
      void pending.then(
        (analysis) => {
          finish();
          resolve(analysis);
        },
        (err: unknown) => {
          finish();
          reject(err);
        },
      );
    });
  }

  /** Build the returned value; the strategy's result is never mutated. */
  private finalize(
    result: SafetyAnalysis,
    strategy: AnalyzerStrategy,
    passedOver: readonly string[],
    processingTimeMs: number,
  ): SafetyAnalysis {
    let confidence = result.confidence;
    let recommendations: readonly string[] = result.recommendations;

    if (strategy.kind === "degraded") {
      confidence = clamp01(confidence * this.config.degradedConfidenceFactor);
      recommendations = uniqueLines([...recommendations, ...DEGRADED_CAVEATS]);
    } else if (strategy.kind === "cloud" && passedOver.length > 0) {
      recommendations = [...recommendations, `Analyzed by ${strategy.name}; ${passedOver.join(", ")} did not complete`];
    }

    return {
      ...result,
      analysisType: strategy.analysisType,
      confidence,
      recommendations,
      processingTimeMs,
    };
  }
}
