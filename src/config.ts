// Configuration defaults, merging and environment loading.
//
// The orchestrator config is always injected; nothing in the dispatcher reads
// process.env except loadAppConfig().

import { ConfigurationError } from "./errors.js";
import { AnalysisType, Backend, PerformanceTier, WorkType } from "./types.js";
import type { OrchestratorConfig, ScreenSize, StrategyTimeouts } from "./types.js";
import type { ProbeOverrides } from "./platform-probe.js";

// ─── Defaults ───────────────────────────────────────────────────────────────────

export const MIN_CACHE_TTL_MS = 30_000;
export const MAX_CACHE_TTL_MS = 5 * 60_000;

export const DEFAULT_ORCHESTRATOR_CONFIG: OrchestratorConfig = {
  targetFps: 2,
  maxRateLimitWaitMs: 10_000,
  timeouts: {
    onDevice: {
      [PerformanceTier.HIGH]: 8_000,
      [PerformanceTier.MEDIUM]: 10_000,
      [PerformanceTier.LOW]: 15_000,
    },
    cloud: 15_000,
    degraded: 8_000,
  },
  thermalTimeoutPenalty: 0.5,
  degradedConfidenceFactor: 0.7,
  cache: { enabled: true, ttlMs: MAX_CACHE_TTL_MS, maxEntries: 25 },
  successRateFloor: 0.9,
  rollingWindowSize: 50,
  minSamplesForFloor: 10,
  disabledStrategies: [],
  rolloutPercentage: {},
  coalesceInFlight: true,
};

/** Cache size bound per device tier, used when the entry point sizes the cache. */
export const CACHE_SIZE_BY_TIER: Record<PerformanceTier, number> = {
  [PerformanceTier.LOW]: 10,
  [PerformanceTier.MEDIUM]: 25,
  [PerformanceTier.HIGH]: 50,
};

// ─── Merge & Validation ─────────────────────────────────────────────────────────

export interface OrchestratorConfigInput
  extends Partial<Omit<OrchestratorConfig, "timeouts" | "cache">> {
  timeouts?: Partial<Omit<StrategyTimeouts, "onDevice">> & {
    onDevice?: Partial<StrategyTimeouts["onDevice"]>;
  };
  cache?: Partial<OrchestratorConfig["cache"]>;
}

/**
 * Merge a partial config over the defaults and validate the result.
 * Throws ConfigurationError listing every problem found.
 */
export function resolveOrchestratorConfig(input: OrchestratorConfigInput = {}): OrchestratorConfig {
  const d = DEFAULT_ORCHESTRATOR_CONFIG;
  const onDevice = input.timeouts?.onDevice ?? {};
  const config: OrchestratorConfig = {
    targetFps: input.targetFps ?? d.targetFps,
    maxRateLimitWaitMs: input.maxRateLimitWaitMs ?? d.maxRateLimitWaitMs,
    timeouts: {
      onDevice: {
        [PerformanceTier.HIGH]: onDevice[PerformanceTier.HIGH] ?? d.timeouts.onDevice[PerformanceTier.HIGH],
        [PerformanceTier.MEDIUM]: onDevice[PerformanceTier.MEDIUM] ?? d.timeouts.onDevice[PerformanceTier.MEDIUM],
        [PerformanceTier.LOW]: onDevice[PerformanceTier.LOW] ?? d.timeouts.onDevice[PerformanceTier.LOW],
      },
      cloud: input.timeouts?.cloud ?? d.timeouts.cloud,
      degraded: input.timeouts?.degraded ?? d.timeouts.degraded,
    },
    thermalTimeoutPenalty: input.thermalTimeoutPenalty ?? d.thermalTimeoutPenalty,
    degradedConfidenceFactor: input.degradedConfidenceFactor ?? d.degradedConfidenceFactor,
    cache: {
      enabled: input.cache?.enabled ?? d.cache.enabled,
      ttlMs: input.cache?.ttlMs ?? d.cache.ttlMs,
      maxEntries: input.cache?.maxEntries ?? d.cache.maxEntries,
    },
    successRateFloor: input.successRateFloor ?? d.successRateFloor,
    rollingWindowSize: input.rollingWindowSize ?? d.rollingWindowSize,
    minSamplesForFloor: input.minSamplesForFloor ?? d.minSamplesForFloor,
    disabledStrategies: [...(input.disabledStrategies ?? d.disabledStrategies)],
    rolloutPercentage: { ...(input.rolloutPercentage ?? d.rolloutPercentage) },
    coalesceInFlight: input.coalesceInFlight ?? d.coalesceInFlight,
  };

  const problems = validateOrchestratorConfig(config);
  if (problems.length > 0) {
    throw new ConfigurationError(`Invalid orchestrator config: ${problems.join("; ")}`);
  }
  return config;
}

export function validateOrchestratorConfig(config: OrchestratorConfig): string[] {
  const problems: string[] = [];
  const positive = (label: string, value: number) => {
    if (!Number.isFinite(value) || value <= 0) problems.push(`${label} must be a positive number`);
  };

  positive("targetFps", config.targetFps);
  if (!(config.maxRateLimitWaitMs >= 0)) problems.push("maxRateLimitWaitMs must be >= 0");
  for (const tier of Object.values(PerformanceTier)) {
    positive(`timeouts.onDevice.${tier}`, config.timeouts.onDevice[tier]);
  }
  positive("timeouts.cloud", config.timeouts.cloud);
  positive("timeouts.degraded", config.timeouts.degraded);
  if (!(config.thermalTimeoutPenalty > 0 && config.thermalTimeoutPenalty <= 1)) {
    problems.push("thermalTimeoutPenalty must be in (0, 1]");
  }
  if (!(config.degradedConfidenceFactor > 0 && config.degradedConfidenceFactor <= 1)) {
    problems.push("degradedConfidenceFactor must be in (0, 1]");
  }
  if (!(config.cache.ttlMs >= MIN_CACHE_TTL_MS && config.cache.ttlMs <= MAX_CACHE_TTL_MS)) {
    problems.push(`cache.ttlMs must be between ${MIN_CACHE_TTL_MS} and ${MAX_CACHE_TTL_MS}`);
  }
  if (!Number.isInteger(config.cache.maxEntries) || config.cache.maxEntries < 1) {
    problems.push("cache.maxEntries must be a positive integer");
  }
  if (!(config.successRateFloor >= 0 && config.successRateFloor <= 1)) {
    problems.push("successRateFloor must be in [0, 1]");
  }
  if (!Number.isInteger(config.rollingWindowSize) || config.rollingWindowSize < 1) {
    problems.push("rollingWindowSize must be a positive integer");
  }
  if (!Number.isInteger(config.minSamplesForFloor) || config.minSamplesForFloor < 1) {
    problems.push("minSamplesForFloor must be a positive integer");
  }
  for (const type of config.disabledStrategies) {
    if (!isAnalysisType(type)) problems.push(`unknown disabled strategy "${type}"`);
  }
  for (const [type, pct] of Object.entries(config.rolloutPercentage)) {
    if (!isAnalysisType(type)) problems.push(`unknown rollout strategy "${type}"`);
    if (pct === undefined || !(pct >= 0 && pct <= 100)) {
      problems.push(`rolloutPercentage.${type} must be in [0, 100]`);
    }
  }
  return problems;
}

export function isAnalysisType(value: string): value is AnalysisType {
  return Object.values<string>(AnalysisType).includes(value);
}

export function isWorkType(value: string): value is WorkType {
  return Object.values<string>(WorkType).includes(value);
}

export function isBackend(value: string): value is Backend {
  return Object.values<string>(Backend).includes(value);
}

// ─── Environment ────────────────────────────────────────────────────────────────

export interface AppConfig {
  port: number;
  openai: { apiKey: string | null; model: string };
  localRuntimeUrl: string | null;
  localDetectorUrl: string | null;
  connectivityHost: string;
  allowLowTierOnDevice: boolean;
  backendOverride: Backend | null;
  probe: ProbeOverrides;
  orchestrator: OrchestratorConfig;
  /** False when the cache bound came from the defaults and may be sized by device tier. */
  cacheMaxEntriesPinned: boolean;
}

type Env = Record<string, string | undefined>;

function readString(env: Env, key: string): string | null {
  const value = env[key]?.trim();
  return value ? value : null;
}

function readNumber(env: Env, key: string): number | undefined {
  const raw = readString(env, key);
  if (raw === null) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${key} must be a number, got "${raw}"`);
  }
  return value;
}

function readBoolean(env: Env, key: string): boolean | undefined {
  const raw = readString(env, key)?.toLowerCase();
  if (raw === undefined) return undefined;
  if (["1", "true", "yes"].includes(raw)) return true;
  if (["0", "false", "no"].includes(raw)) return false;
  throw new ConfigurationError(`${key} must be a boolean, got "${raw}"`);
}

function readScreen(env: Env, key: string): ScreenSize | null | undefined {
  const raw = readString(env, key);
  if (raw === null) return undefined;
  if (raw.toLowerCase() === "none") return null;
  const match = /^(\d+)x(\d+)$/i.exec(raw);
  if (!match) throw new ConfigurationError(`${key} must look like 1080x2340 or "none", got "${raw}"`);
  return { widthDp: Number(match[1]), heightDp: Number(match[2]) };
}

function readDisabledStrategies(env: Env, key: string): AnalysisType[] | undefined {
  const raw = readString(env, key);
  if (raw === null) return undefined;
  const types: AnalysisType[] = [];
  for (const entry of raw.split(",").map((s) => s.trim()).filter(Boolean)) {
    if (!isAnalysisType(entry)) throw new ConfigurationError(`${key} names unknown strategy "${entry}"`);
    types.push(entry);
  }
  return types;
}

/** Read the process configuration. Throws ConfigurationError on malformed values. */
export function loadAppConfig(env: Env = process.env): AppConfig {
  const override = readString(env, "ANALYSIS_BACKEND_OVERRIDE");
  if (override !== null && !isBackend(override)) {
    throw new ConfigurationError(`ANALYSIS_BACKEND_OVERRIDE must be one of ${Object.values(Backend).join(", ")}`);
  }

  const cacheMaxEntries = readNumber(env, "ANALYSIS_CACHE_MAX_ENTRIES");

  return {
    port: readNumber(env, "PORT") ?? 3000,
    openai: {
      apiKey: readString(env, "OPENAI_API_KEY"),
      model: readString(env, "OPENAI_VISION_MODEL") ?? "gpt-4o-mini",
    },
    localRuntimeUrl: readString(env, "LOCAL_RUNTIME_URL"),
    localDetectorUrl: readString(env, "LOCAL_DETECTOR_URL"),
    connectivityHost: readString(env, "CONNECTIVITY_CHECK_HOST") ?? "api.openai.com",
    allowLowTierOnDevice: readBoolean(env, "ANALYSIS_ALLOW_LOW_TIER_ON_DEVICE") ?? false,
    backendOverride: override,
    probe: {
      hasGpu: readBoolean(env, "DEVICE_HAS_GPU"),
      hasNpu: readBoolean(env, "DEVICE_HAS_NPU"),
      platformVersion: readNumber(env, "DEVICE_PLATFORM_VERSION"),
      screen: readScreen(env, "DEVICE_SCREEN"),
      productName: readString(env, "DEVICE_PRODUCT_NAME") ?? undefined,
    },
    orchestrator: resolveOrchestratorConfig({
      targetFps: readNumber(env, "ANALYSIS_TARGET_FPS"),
      successRateFloor: readNumber(env, "ANALYSIS_SUCCESS_RATE_FLOOR"),
      disabledStrategies: readDisabledStrategies(env, "ANALYSIS_DISABLED_STRATEGIES"),
      cache: {
        ttlMs: readNumber(env, "ANALYSIS_CACHE_TTL_MS"),
        maxEntries: cacheMaxEntries,
      },
    }),
    cacheMaxEntriesPinned: cacheMaxEntries !== undefined,
  };
}
