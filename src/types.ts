// Site Safety Dispatcher - Shared TypeScript interfaces and types
//
// Runtime code lives in the component modules; this barrel only carries enums,
// interfaces and type aliases shared between them.

import type { ThermalThrottlingError } from "./errors.js";

// ─── Work & Analysis Tags ───────────────────────────────────────────────────────

export enum WorkType {
  GENERAL_CONSTRUCTION = "general_construction",
  ELECTRICAL = "electrical",
  PLUMBING = "plumbing",
  HVAC = "hvac",
  ROOFING = "roofing",
  CONCRETE = "concrete",
  STEEL_WORK = "steel_work",
  EXCAVATION = "excavation",
  PAINTING = "painting",
  WELDING = "welding",
  CARPENTRY = "carpentry",
  DEMOLITION = "demolition",
  INSPECTION = "inspection",
  MAINTENANCE = "maintenance",
  FALL_PROTECTION = "fall_protection",
  CRANE_LIFTING = "crane_lifting",
  CONFINED_SPACE = "confined_space",
  OTHER = "other",
}

/** Which strategy produced an analysis. */
export enum AnalysisType {
  ON_DEVICE_MULTIMODAL = "on_device_multimodal",
  CLOUD_VISION = "cloud_vision",
  LOCAL_DETECTOR_FALLBACK = "local_detector_fallback",
}

export enum AnalysisCapability {
  MULTIMODAL_VISION = "multimodal_vision",
  PPE_DETECTION = "ppe_detection",
  HAZARD_IDENTIFICATION = "hazard_identification",
  OSHA_COMPLIANCE = "osha_compliance",
  OFFLINE_ANALYSIS = "offline_analysis",
  REAL_TIME_PROCESSING = "real_time_processing",
  HARDWARE_ACCELERATION = "hardware_acceleration",
}

/**
 * Coarse role of a strategy in the cascade. The coordinator derives timeout
 * budgets and post-processing (degraded caveats, cloud notes) from it.
 */
export type StrategyKind = "on-device" | "cloud" | "degraded";

// ─── Safety Analysis Result ─────────────────────────────────────────────────────

export type Severity = "low" | "medium" | "high" | "critical";

export type RiskLevel = "minimal" | "low" | "moderate" | "high" | "severe";

export type HazardType =
  | "fall_protection"
  | "ppe_violation"
  | "electrical"
  | "struck_by"
  | "caught_in"
  | "fire"
  | "chemical"
  | "crane_lift"
  | "housekeeping"
  | "confined_space"
  | "scaffolding"
  | "excavation"
  | "equipment"
  | "other";

/** Normalized to the image: all values in [0, 1]. */
export interface BoundingBox {
  left: number;
  top: number;
  width: number;
  height: number;
}

export interface Hazard {
  readonly id: string;
  readonly type: HazardType;
  readonly severity: Severity;
  readonly description: string;
  readonly confidence: number;
  readonly boundingBox: BoundingBox | null;
  readonly oshaCode: string | null;
  readonly recommendations: readonly string[];
}

export type PpeItemStatus = "present" | "missing" | "unknown";

export type PpeKind = "hardHat" | "safetyVest" | "safetyGlasses" | "gloves" | "fallProtection";

export interface PpeItem {
  readonly status: PpeItemStatus;
  readonly confidence: number;
  readonly required: boolean;
}

export interface PpeStatus {
  readonly items: Readonly<Record<PpeKind, PpeItem>>;
  /** Fraction of required items that were observed as present. */
  readonly overallCompliance: number;
}

export interface SafetyAnalysis {
  readonly id: string;
  readonly workType: WorkType;
  readonly analysisType: AnalysisType;
  readonly hazards: readonly Hazard[];
  readonly ppeStatus: PpeStatus | null;
  readonly recommendations: readonly string[];
  readonly overallRiskLevel: RiskLevel;
  /** 0..1 */
  readonly confidence: number;
  readonly processingTimeMs: number;
  /** ISO-8601 */
  readonly analyzedAt: string;
}

export interface AnalysisRequest {
  readonly id: string;
  readonly image: Buffer;
  readonly workType: WorkType;
  readonly createdAt: number;
}

// ─── Device Capability ──────────────────────────────────────────────────────────

export enum PerformanceTier {
  LOW = "low",
  MEDIUM = "medium",
  HIGH = "high",
}

export type DeviceClass = "phone" | "tablet" | "other";

/** Ordered from coolest to hottest; see THERMAL_RANK in capability-assessor.ts. */
export type ThermalState = "nominal" | "light" | "moderate" | "severe" | "critical";

export type MemoryPressure = "low" | "moderate" | "high" | "critical";

export enum Backend {
  CPU = "cpu",
  GPU = "gpu",
  NPU = "npu",
  /** Let the runtime pick its own delegate. */
  AUTO = "auto",
}

export interface DeviceCapability {
  readonly deviceClass: DeviceClass;
  readonly availableMemoryMb: number;
  readonly totalMemoryMb: number;
  readonly cpuCores: number;
  readonly hasGpu: boolean;
  readonly hasNpu: boolean;
  readonly platformVersion: number;
  readonly score: number;
  readonly tier: PerformanceTier;
  /** "default" when probing failed and the conservative fallback was used. */
  readonly source: "probe" | "default";
}

export interface ScreenSize {
  widthDp: number;
  heightDp: number;
}

/**
 * Host hardware readings. Every method may reject; the assessor degrades to
 * conservative values rather than surfacing the failure.
 */
export interface PlatformProbe {
  availableMemoryMb(): Promise<number>;
  totalMemoryMb(): Promise<number>;
  cpuCoreCount(): Promise<number>;
  hasGpu(): Promise<boolean>;
  hasNpu(): Promise<boolean>;
  platformVersion(): Promise<number>;
  screenSize(): Promise<ScreenSize | null>;
  productName(): Promise<string>;
  /** null when the host exposes no temperature sensor. */
  temperatureCelsius(): Promise<number | null>;
  /** Current / maximum CPU frequency in [0, 1], or null when unknown. */
  cpuFrequencyScaling(): Promise<number | null>;
}

// ─── Strategies ─────────────────────────────────────────────────────────────────

/** One raw box from an object detector. */
export interface Detection {
  label: string;
  score: number;
  box: BoundingBox;
}

export interface DetectionParameters {
  confidenceThreshold: number;
  iouThreshold: number;
}

export interface StrategyCondition {
  /** Set when the strategy is running on a thermally forced downgrade. */
  throttling: ThermalThrottlingError | null;
}

export interface AnalyzerStrategy {
  readonly name: string;
  readonly analysisType: AnalysisType;
  readonly kind: StrategyKind;
  /** Higher runs earlier. */
  readonly priority: number;
  readonly capabilities: ReadonlySet<AnalysisCapability>;
  isAvailable(): boolean;
  configure(credential?: string): Promise<void>;
  /** Must stop work and reject once `signal` aborts. */
  analyze(image: Buffer, workType: WorkType, signal: AbortSignal): Promise<SafetyAnalysis>;
  currentCondition?(): Promise<StrategyCondition>;
  updateDetectionParameters?(params: DetectionParameters): void;
  release?(): Promise<void>;
}

// ─── Connectivity ───────────────────────────────────────────────────────────────

export interface ConnectivityMonitor {
  readonly isConnected: boolean;
}

// ─── Orchestrator Configuration ─────────────────────────────────────────────────

export interface StrategyTimeouts {
  /** Per-tier budget for on-device strategies; faster tiers get less. */
  onDevice: Record<PerformanceTier, number>;
  cloud: number;
  degraded: number;
}

export interface ResultCacheConfig {
  enabled: boolean;
  ttlMs: number;
  maxEntries: number;
}

export interface OrchestratorConfig {
  targetFps: number;
  /** Requests whose rate-limiter slot is further away than this are refused. */
  maxRateLimitWaitMs: number;
  timeouts: StrategyTimeouts;
  /** Multiplier applied to a thermally throttled strategy's timeout. */
  thermalTimeoutPenalty: number;
  /** Multiplier applied to the confidence of degraded-fallback results. */
  degradedConfidenceFactor: number;
  cache: ResultCacheConfig;
  successRateFloor: number;
  rollingWindowSize: number;
  /** Minimum attempts in the rolling window before the floor is judged. */
  minSamplesForFloor: number;
  disabledStrategies: readonly AnalysisType[];
  /** 0-100 per strategy; absent means fully rolled out. */
  rolloutPercentage: Partial<Record<AnalysisType, number>>;
  coalesceInFlight: boolean;
}

// ─── Stats & Health ─────────────────────────────────────────────────────────────

export interface StrategyStats {
  readonly analysisType: AnalysisType;
  readonly successes: number;
  readonly failures: number;
  readonly totalLatencyMs: number;
  readonly successRate: number;
  readonly averageLatencyMs: number;
  /** null until the strategy has been attempted at least once. */
  readonly rollingSuccessRate: number | null;
}

export interface OrchestratorStats {
  readonly strategies: readonly StrategyStats[];
  readonly totalRequests: number;
  readonly cacheHits: number;
  readonly exhaustedRequests: number;
  readonly overallSuccessRate: number;
  readonly preferredStrategy: AnalysisType | null;
}

export interface StrategyHealth {
  readonly name: string;
  readonly analysisType: AnalysisType;
  readonly enabled: boolean;
  readonly available: boolean;
  readonly probeLatencyMs: number;
  readonly averageLatencyMs: number | null;
  readonly rollingSuccessRate: number | null;
}

export interface HealthCheckResult {
  readonly strategies: readonly StrategyHealth[];
  /** null when no connectivity monitor is wired in. */
  readonly networkConnected: boolean | null;
  readonly overallHealthy: boolean;
  readonly strategiesBelowFloor: readonly AnalysisType[];
  readonly checkedAt: string;
}

// ─── Misc ───────────────────────────────────────────────────────────────────────

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}
