/**
 * Capability assessor: scores the host once, classifies it into a performance
 * tier and exposes live thermal / memory-pressure readings.
 *
 * The scoring and classification functions are pure and exported so they can be
 * checked without a probe. The assessor memoizes only successful probes; a
 * failed probe yields CONSERVATIVE_CAPABILITY and the next call probes again.
 */

import { describeError } from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { PerformanceTier } from "./types.js";
import type {
  DeviceCapability,
  DeviceClass,
  MemoryPressure,
  PlatformProbe,
  ScreenSize,
  ThermalState,
} from "./types.js";

// ─── Orderings ──────────────────────────────────────────────────────────────────

export const THERMAL_RANK: Record<ThermalState, number> = {
  nominal: 0,
  light: 1,
  moderate: 2,
  severe: 3,
  critical: 4,
};

export const MEMORY_PRESSURE_RANK: Record<MemoryPressure, number> = {
  low: 0,
  moderate: 1,
  high: 2,
  critical: 3,
};

export function isThermalAtLeast(state: ThermalState, threshold: ThermalState): boolean {
  return THERMAL_RANK[state] >= THERMAL_RANK[threshold];
}

// ─── Scoring ────────────────────────────────────────────────────────────────────

export type PlatformVersionTier = "newest" | "recent" | "older";

export interface PlatformVersionPolicy {
  /** Versions at or above this are "newest". */
  newest: number;
  /** Versions at or above this (and below newest) are "recent". */
  recent: number;
}

export const DEFAULT_VERSION_POLICY: PlatformVersionPolicy = { newest: 29, recent: 26 };

export interface CapabilitySignals {
  availableMemoryMb: number;
  cpuCores: number;
  hasGpu: boolean;
  versionTier: PlatformVersionTier;
}

export function memoryPoints(availableMemoryMb: number): number {
  if (availableMemoryMb >= 6144) return 3;
  if (availableMemoryMb >= 4096) return 2;
  if (availableMemoryMb >= 3072) return 1;
  return 0;
}

export function corePoints(cpuCores: number): number {
  if (cpuCores >= 8) return 3;
  if (cpuCores >= 6) return 2;
  if (cpuCores >= 4) return 1;
  return 0;
}

const VERSION_POINTS: Record<PlatformVersionTier, number> = { newest: 2, recent: 1, older: 0 };

/** 0..10 */
export function scoreCapability(signals: CapabilitySignals): number {
  return (
    memoryPoints(signals.availableMemoryMb) +
    corePoints(signals.cpuCores) +
    (signals.hasGpu ? 2 : 0) +
    VERSION_POINTS[signals.versionTier]
  );
}

export function tierForScore(score: number): PerformanceTier {
  if (score >= 8) return PerformanceTier.HIGH;
  if (score >= 5) return PerformanceTier.MEDIUM;
  return PerformanceTier.LOW;
}

export function classifyPlatformVersion(
  version: number,
  policy: PlatformVersionPolicy = DEFAULT_VERSION_POLICY,
): PlatformVersionTier {
  if (version >= policy.newest) return "newest";
  if (version >= policy.recent) return "recent";
  return "older";
}

// ─── Classification ─────────────────────────────────────────────────────────────

export const TABLET_MIN_SMALLEST_DP = 600;
export const DEFAULT_TV_PRODUCT_PATTERNS: readonly string[] = ["tv", "television", "chromecast", "firestick"];

export function classifyDevice(
  screen: ScreenSize | null,
  productName: string,
  tvPatterns: readonly string[] = DEFAULT_TV_PRODUCT_PATTERNS,
): DeviceClass {
  if (screen && Math.min(screen.widthDp, screen.heightDp) >= TABLET_MIN_SMALLEST_DP) return "tablet";
  const name = productName.toLowerCase();
  if (tvPatterns.some((pattern) => name.includes(pattern.toLowerCase()))) return "other";
  return screen ? "phone" : "other";
}

export function classifyMemoryPressure(availableMemoryMb: number, totalMemoryMb: number): MemoryPressure {
  if (!(totalMemoryMb > 0)) return "low";
  const ratio = availableMemoryMb / totalMemoryMb;
  if (ratio < 0.1) return "critical";
  if (ratio < 0.2) return "high";
  if (ratio < 0.4) return "moderate";
  return "low";
}

export function thermalStateForTemperature(celsius: number): ThermalState {
  if (celsius < 40) return "nominal";
  if (celsius < 45) return "light";
  if (celsius < 50) return "moderate";
  if (celsius < 55) return "severe";
  return "critical";
}

/** Frequency scaled below half of maximum means the host is already throttling. */
export function applyFrequencyScaling(state: ThermalState, scaling: number | null): ThermalState {
  if (scaling !== null && scaling < 0.5 && THERMAL_RANK[state] < THERMAL_RANK.moderate) return "moderate";
  return state;
}

// ─── Conservative Default ───────────────────────────────────────────────────────

export const CONSERVATIVE_CAPABILITY: DeviceCapability = {
  deviceClass: "other",
  availableMemoryMb: 1024,
  totalMemoryMb: 1024,
  cpuCores: 4,
  hasGpu: false,
  hasNpu: false,
  platformVersion: 0,
  score: scoreCapability({ availableMemoryMb: 1024, cpuCores: 4, hasGpu: false, versionTier: "older" }),
  tier: PerformanceTier.LOW,
  source: "default",
};

// ─── Assessor ───────────────────────────────────────────────────────────────────

export interface CapabilityAssessorOptions {
  versionPolicy?: PlatformVersionPolicy;
  tvProductPatterns?: readonly string[];
  logger?: Logger;
}

function requireCount(label: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`probe returned invalid ${label}: ${value}`);
  }
  return value;
}

export class CapabilityAssessor {
  private cached: DeviceCapability | null = null;
  private inFlight: Promise<DeviceCapability> | null = null;
  private readonly versionPolicy: PlatformVersionPolicy;
  private readonly tvPatterns: readonly string[];
  private readonly logger: Logger;

  constructor(
    private readonly probe: PlatformProbe,
    options: CapabilityAssessorOptions = {},
  ) {
    this.versionPolicy = options.versionPolicy ?? DEFAULT_VERSION_POLICY;
    this.tvPatterns = options.tvProductPatterns ?? DEFAULT_TV_PRODUCT_PATTERNS;
    this.logger = options.logger ?? createConsoleLogger("CapabilityAssessor");
  }

  /** Memoized after the first successful probe; concurrent callers share one probe. */
  assess(): Promise<DeviceCapability> {
    if (this.cached) return Promise.resolve(this.cached);
    if (!this.inFlight) {
      this.inFlight = this.probeCapability().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  get cachedCapability(): DeviceCapability | null {
    return this.cached;
  }

  async currentThermalState(): Promise<ThermalState> {
    try {
      const [celsius, scaling] = await Promise.all([
        this.probe.temperatureCelsius(),
        this.probe.cpuFrequencyScaling(),
      ]);
      const base = celsius === null ? "nominal" : thermalStateForTemperature(celsius);
      return applyFrequencyScaling(base, scaling);
    } catch (err) {
      this.logger.warn(`Thermal probe failed, assuming nominal: ${describeError(err)}`);
      return "nominal";
    }
  }

  async currentMemoryPressure(): Promise<MemoryPressure> {
    try {
      const [available, total] = await Promise.all([
        this.probe.availableMemoryMb(),
        this.probe.totalMemoryMb(),
      ]);
      return classifyMemoryPressure(available, total);
    } catch (err) {
      this.logger.warn(`Memory probe failed, assuming low pressure: ${describeError(err)}`);
      return "low";
    }
  }

  private async probeCapability(): Promise<DeviceCapability> {
    try {
      const [availableMemoryMb, totalMemoryMb, cpuCores, hasGpu, hasNpu, platformVersion, screen, productName] =
        await Promise.all([
          this.probe.availableMemoryMb(),
          this.probe.totalMemoryMb(),
          this.probe.cpuCoreCount(),
          this.probe.hasGpu(),
          this.probe.hasNpu(),
          this.probe.platformVersion(),
          this.probe.screenSize(),
          this.probe.productName(),
        ]);

      const signals: CapabilitySignals = {
        availableMemoryMb: requireCount("available memory", availableMemoryMb),
        cpuCores: requireCount("cpu core count", cpuCores),
        hasGpu,
        versionTier: classifyPlatformVersion(platformVersion, this.versionPolicy),
      };
      const score = scoreCapability(signals);
      const capability: DeviceCapability = {
        deviceClass: classifyDevice(screen, productName, this.tvPatterns),
        availableMemoryMb,
        totalMemoryMb: requireCount("total memory", totalMemoryMb),
        cpuCores,
        hasGpu,
        hasNpu,
        platformVersion,
        score,
        tier: tierForScore(score),
        source: "probe",
      };

      this.cached = capability;
      this.logger.info(
        `Device assessed: ${capability.deviceClass}, score ${score}, tier ${capability.tier}`,
      );
      return capability;
    } catch (err) {
      this.logger.warn(`Capability probe failed, using conservative defaults: ${describeError(err)}`);
      return CONSERVATIVE_CAPABILITY;
    }
  }
}
