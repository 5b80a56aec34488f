import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";
import { AnalysisCoordinator } from "./analysis-coordinator.js";
import { CapabilityAssessor } from "./capability-assessor.js";
import { AllStrategiesExhaustedError, InferenceError } from "./errors.js";
import type { Logger } from "./logger.js";
import { AnalysisType, WorkType } from "./types.js";
import type { AnalyzerStrategy, PlatformProbe, SafetyAnalysis, StrategyKind } from "./types.js";

type Outcome = "succeed" | "fail" | "unavailable";

const silentLogger: Logger = { debug: () => {}, info: () => {}, warn: () => {}, error: () => {} };

const probe: PlatformProbe = {
  availableMemoryMb: async () => 6144,
  totalMemoryMb: async () => 12288,
  cpuCoreCount: async () => 8,
  hasGpu: async () => true,
  hasNpu: async () => false,
  platformVersion: async () => 34,
  screenSize: async () => null,
  productName: async () => "rugged-tablet",
  temperatureCelsius: async () => null,
  cpuFrequencyScaling: async () => null,
};

const LADDER: ReadonlyArray<[AnalysisType, StrategyKind, number]> = [
  [AnalysisType.ON_DEVICE_MULTIMODAL, "on-device", 150],
  [AnalysisType.CLOUD_VISION, "cloud", 100],
  [AnalysisType.LOCAL_DETECTOR_FALLBACK, "degraded", 50],
];

function makeStrategy(analysisType: AnalysisType, kind: StrategyKind, priority: number, outcome: Outcome) {
  const analyze = vi.fn(async (_image: Buffer, workType: WorkType, _signal: AbortSignal): Promise<SafetyAnalysis> => {
    if (outcome === "fail") throw new InferenceError(`${analysisType} failed`);
    return {
      id: analysisType,
      workType,
      analysisType,
      hazards: [],
      ppeStatus: null,
      recommendations: [],
      overallRiskLevel: "minimal",
      confidence: 1,
      processingTimeMs: 0,
      analyzedAt: "2026-01-01T00:00:00.000Z",
    };
  });
  const strategy: AnalyzerStrategy = {
    name: analysisType,
    analysisType,
    kind,
    priority,
    capabilities: new Set(),
    isAvailable: () => outcome !== "unavailable",
    configure: async () => {},
    analyze,
  };
  return { strategy, analyze };
}

const outcomeArb = fc.constantFrom<Outcome>("succeed", "fail", "unavailable");

describe("Property: cascade selection", () => {
  it("should return the first succeeding strategy in priority order, or exhaust", async () => {
    await fc.assert(
      fc.asyncProperty(fc.tuple(outcomeArb, outcomeArb, outcomeArb), fc.boolean(), async (outcomes, shuffle) => {
        const built = LADDER.map(([type, kind, priority], i) => makeStrategy(type, kind, priority, outcomes[i]));
        const strategies = built.map((b) => b.strategy);
        const setTimer = vi.fn((callback: () => void, ms: number) => setTimeout(callback, ms));
        const coordinator = new AnalysisCoordinator({
          strategies: shuffle ? [...strategies].reverse() : strategies,
          assessor: new CapabilityAssessor(probe, { logger: silentLogger }),
          logger: silentLogger,
          timers: { set: setTimer, clear: (handle) => clearTimeout(handle) },
        });

        const winner = outcomes.indexOf("succeed");
        const attempted = outcomes.filter((o, i) => o !== "unavailable" && (winner === -1 || i <= winner)).length;

        if (winner === -1) {
          await expect(coordinator.analyze(Buffer.from("frame"), WorkType.INSPECTION)).rejects.toBeInstanceOf(
            AllStrategiesExhaustedError,
          );
        } else {
          const result = await coordinator.analyze(Buffer.from("frame"), WorkType.INSPECTION);
          expect(result.analysisType).toBe(LADDER[winner][0]);
          expect(result.confidence).toBe(LADDER[winner][1] === "degraded" ? 0.7 : 1);
        }

        built.forEach(({ analyze }, i) => {
          const shouldRun = outcomes[i] !== "unavailable" && (winner === -1 || i <= winner);
          expect(analyze).toHaveBeenCalledTimes(shouldRun ? 1 : 0);
        });
        expect(setTimer).toHaveBeenCalledTimes(attempted);
      }),
      { numRuns: 60 },
    );
  });
});
