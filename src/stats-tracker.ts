// Per-strategy success/failure and latency accounting.
//
// Counters accumulate for the life of the tracker until reset(). Each strategy
// also keeps a bounded window of recent outcomes for the rolling success rate
// that health checks compare against the configured floor.

import type { AnalysisType, OrchestratorStats, StrategyStats } from "./types.js";

interface StrategyCounters {
  successes: number;
  failures: number;
  totalLatencyMs: number;
  recentOutcomes: boolean[];
}

export class StatsTracker {
  private readonly counters = new Map<AnalysisType, StrategyCounters>();
  private totalRequests = 0;
  private cacheHits = 0;
  private exhaustedRequests = 0;

  constructor(private readonly windowSize = 50) {}

  recordRequest(): void {
    this.totalRequests++;
  }

  /** A cache hit counts as a served request with zero processing latency. */
  recordCacheHit(): void {
    this.cacheHits++;
  }

  recordExhausted(): void {
    this.exhaustedRequests++;
  }

  recordSuccess(type: AnalysisType, latencyMs: number): void {
    this.record(type, true, latencyMs);
  }

  recordFailure(type: AnalysisType, latencyMs: number): void {
    this.record(type, false, latencyMs);
  }

  rollingSuccessRate(type: AnalysisType): number | null {
    const recent = this.counters.get(type)?.recentOutcomes;
    if (!recent || recent.length === 0) return null;
    return recent.filter(Boolean).length / recent.length;
  }

  averageLatencyMs(type: AnalysisType): number | null {
    const c = this.counters.get(type);
    if (!c) return null;
    const attempts = c.successes + c.failures;
    return attempts === 0 ? null : c.totalLatencyMs / attempts;
  }

  /** Strategies with at least `minSamples` recent attempts whose rolling rate is under `floor`. */
  strategiesBelowFloor(floor: number, minSamples: number): AnalysisType[] {
    const below: AnalysisType[] = [];
    for (const [type, c] of this.counters) {
      if (c.recentOutcomes.length < minSamples) continue;
      const rate = this.rollingSuccessRate(type);
      if (rate !== null && rate < floor) below.push(type);
    }
    return below;
  }

  snapshot(): OrchestratorStats {
    const strategies: StrategyStats[] = [];
    for (const [analysisType, c] of this.counters) {
      const attempts = c.successes + c.failures;
      strategies.push({
        analysisType,
        successes: c.successes,
        failures: c.failures,
        totalLatencyMs: c.totalLatencyMs,
        successRate: attempts === 0 ? 0 : c.successes / attempts,
        averageLatencyMs: attempts === 0 ? 0 : c.totalLatencyMs / attempts,
        rollingSuccessRate: this.rollingSuccessRate(analysisType),
      });
    }

    return {
      strategies,
      totalRequests: this.totalRequests,
      cacheHits: this.cacheHits,
      exhaustedRequests: this.exhaustedRequests,
      overallSuccessRate:
        this.totalRequests === 0 ? 0 : (this.totalRequests - this.exhaustedRequests) / this.totalRequests,
      preferredStrategy: preferredStrategy(strategies),
    };
  }

  reset(): void {
    this.counters.clear();
    this.totalRequests = 0;
    this.cacheHits = 0;
    this.exhaustedRequests = 0;
  }

  private record(type: AnalysisType, success: boolean, latencyMs: number): void {
    let c = this.counters.get(type);
    if (!c) {
      c = { successes: 0, failures: 0, totalLatencyMs: 0, recentOutcomes: [] };
      this.counters.set(type, c);
    }
    if (success) c.successes++;
    else c.failures++;
    c.totalLatencyMs += Math.max(0, latencyMs);
    c.recentOutcomes.push(success);
    if (c.recentOutcomes.length > this.windowSize) c.recentOutcomes.shift();
  }
}

/** Most successes wins; ties go to the lower average latency. */
function preferredStrategy(strategies: readonly StrategyStats[]): AnalysisType | null {
  let best: StrategyStats | null = null;
  for (const s of strategies) {
    if (s.successes === 0) continue;
    if (
      best === null ||
      s.successes > best.successes ||
      (s.successes === best.successes && s.averageLatencyMs < best.averageLatencyMs)
    ) {
      best = s;
    }
  }
  return best?.analysisType ?? null;
}
