/**
 * Degraded fallback: a lightweight object detector whose raw boxes are
 * thresholded, de-duplicated with class-wise non-maximum suppression and mapped
 * to hazards and PPE compliance. Works offline.
 */

import { UnavailableError, ValidationError } from "./errors.js";
import { mapDetectionsToAnalysis } from "./hazard-mapper.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { AnalysisCapability, AnalysisType } from "./types.js";
import type {
  AnalyzerStrategy,
  BoundingBox,
  Detection,
  DetectionParameters,
  SafetyAnalysis,
  WorkType,
} from "./types.js";

export interface ObjectDetector {
  detect(image: Buffer, signal: AbortSignal): Promise<Detection[]>;
  /** Optional readiness hint; detectors without it are treated as ready. */
  isReady?(): boolean;
  release?(): Promise<void>;
}

export const DEFAULT_DETECTION_PARAMETERS: DetectionParameters = {
  confidenceThreshold: 0.5,
  iouThreshold: 0.45,
};

export function validateDetectionParameters(params: DetectionParameters): void {
  const { confidenceThreshold, iouThreshold } = params;
  if (!(confidenceThreshold >= 0 && confidenceThreshold <= 1)) {
    throw new ValidationError(`confidenceThreshold must be between 0 and 1, got ${confidenceThreshold}`);
  }
  if (!(iouThreshold >= 0 && iouThreshold <= 1)) {
    throw new ValidationError(`iouThreshold must be between 0 and 1, got ${iouThreshold}`);
  }
}

// ─── Box Geometry ───────────────────────────────────────────────────────────────

export function intersectionOverUnion(a: BoundingBox, b: BoundingBox): number {
  const x1 = Math.max(a.left, b.left);
  const y1 = Math.max(a.top, b.top);
  const x2 = Math.min(a.left + a.width, b.left + b.width);
  const y2 = Math.min(a.top + a.height, b.top + b.height);
  const intersection = Math.max(0, x2 - x1) * Math.max(0, y2 - y1);
  const union = a.width * a.height + b.width * b.height - intersection;
  return union <= 0 ? 0 : intersection / union;
}

/**
 * Greedy per-label suppression: keep the highest-scoring box, drop any box of
 * the same label overlapping it by more than `iouThreshold`, repeat.
 * Output is ordered by descending score.
 */
export function nonMaxSuppression(detections: readonly Detection[], iouThreshold: number): Detection[] {
  const sorted = [...detections].sort((a, b) => b.score - a.score);
  const kept: Detection[] = [];
  for (const candidate of sorted) {
    const overlaps = kept.some(
      (k) => k.label === candidate.label && intersectionOverUnion(k.box, candidate.box) > iouThreshold,
    );
    if (!overlaps) kept.push(candidate);
  }
  return kept;
}

// ─── Strategy ───────────────────────────────────────────────────────────────────

export interface DetectorFallbackOptions {
  detector: ObjectDetector;
  parameters?: DetectionParameters;
  logger?: Logger;
  now?: () => Date;
}

export class DetectorFallbackStrategy implements AnalyzerStrategy {
  readonly name = "Local detector fallback";
  readonly analysisType = AnalysisType.LOCAL_DETECTOR_FALLBACK;
  readonly kind = "degraded";
  readonly priority = 50;
  readonly capabilities: ReadonlySet<AnalysisCapability> = new Set([
    AnalysisCapability.PPE_DETECTION,
    AnalysisCapability.HAZARD_IDENTIFICATION,
    AnalysisCapability.OFFLINE_ANALYSIS,
    AnalysisCapability.REAL_TIME_PROCESSING,
  ]);

  private readonly detector: ObjectDetector;
  private parameters: DetectionParameters;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private configured = false;

  constructor(options: DetectorFallbackOptions) {
    this.detector = options.detector;
    const parameters = options.parameters ?? DEFAULT_DETECTION_PARAMETERS;
    validateDetectionParameters(parameters);
    this.parameters = { ...parameters };
    this.logger = options.logger ?? createConsoleLogger("DetectorFallback");
    this.now = options.now ?? (() => new Date());
  }

  get detectionParameters(): DetectionParameters {
    return { ...this.parameters };
  }

  isAvailable(): boolean {
    return this.configured && (this.detector.isReady?.() ?? true);
  }

  async configure(): Promise<void> {
    this.configured = true;
  }

  updateDetectionParameters(params: DetectionParameters): void {
    validateDetectionParameters(params);
    this.parameters = { ...params };
    this.logger.info(
      `Detection parameters updated: confidence ${params.confidenceThreshold}, IoU ${params.iouThreshold}`,
    );
  }

  async analyze(image: Buffer, workType: WorkType, signal: AbortSignal): Promise<SafetyAnalysis> {
    if (!this.isAvailable()) throw new UnavailableError(this.name, "detector not ready");
    const { confidenceThreshold, iouThreshold } = this.parameters;
    const raw = await this.detector.detect(image, signal);
    const confident = raw.filter((d) => d.score >= confidenceThreshold);
    const kept = nonMaxSuppression(confident, iouThreshold);
    this.logger.debug(`Detector kept ${kept.length} of ${raw.length} boxes`);
    return mapDetectionsToAnalysis(kept, workType, this.now);
  }

  async release(): Promise<void> {
    this.configured = false;
    await this.detector.release?.();
  }
}
