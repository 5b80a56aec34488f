/**
 * On-device multimodal strategy.
 *
 * Wraps an InferenceEngine (the local model runtime) and keeps it on the best
 * backend the device allows. configure() brings the engine up once; a failure
 * there is permanent for this instance. Before every analysis thermal state and
 * memory pressure are re-read and the engine is moved if the selection changed.
 * A backend that ran out of memory is never selected again.
 */

import type { BackendSelection, BackendSelector } from "./backend-selector.js";
import type { CapabilityAssessor } from "./capability-assessor.js";
import {
  ConfigurationError,
  describeError,
  OutOfMemoryError,
  ThermalThrottlingError,
  toAnalysisError,
  UnavailableError,
} from "./errors.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { AnalysisCapability, AnalysisType, Backend, PerformanceTier } from "./types.js";
import type { AnalyzerStrategy, SafetyAnalysis, StrategyCondition, WorkType } from "./types.js";

export interface InferenceEngine {
  readonly supportedBackends: ReadonlySet<Backend>;
  initialize(backend: Backend): Promise<void>;
  run(image: Buffer, workType: WorkType, signal: AbortSignal): Promise<SafetyAnalysis>;
  release(): Promise<void>;
}

export interface OnDeviceStrategyOptions {
  engine: InferenceEngine;
  assessor: CapabilityAssessor;
  selector: BackendSelector;
  /** Run the multimodal model on LOW-tier devices anyway. */
  allowLowTier?: boolean;
  logger?: Logger;
}

export class OnDeviceVisionStrategy implements AnalyzerStrategy {
  readonly name = "On-device multimodal vision";
  readonly analysisType = AnalysisType.ON_DEVICE_MULTIMODAL;
  readonly kind = "on-device";
  readonly priority = 150;
  readonly capabilities: ReadonlySet<AnalysisCapability> = new Set([
    AnalysisCapability.MULTIMODAL_VISION,
    AnalysisCapability.PPE_DETECTION,
    AnalysisCapability.HAZARD_IDENTIFICATION,
    AnalysisCapability.OSHA_COMPLIANCE,
    AnalysisCapability.OFFLINE_ANALYSIS,
    AnalysisCapability.HARDWARE_ACCELERATION,
  ]);

  private readonly engine: InferenceEngine;
  private readonly assessor: CapabilityAssessor;
  private readonly selector: BackendSelector;
  private readonly allowLowTier: boolean;
  private readonly logger: Logger;

  private activeBackend: Backend | null = null;
  private failure: ConfigurationError | null = null;
  private switching: Promise<void> | null = null;
  private readonly outOfMemory = new Set<Backend>();

  constructor(options: OnDeviceStrategyOptions) {
    this.engine = options.engine;
    this.assessor = options.assessor;
    this.selector = options.selector;
    this.allowLowTier = options.allowLowTier ?? false;
    this.logger = options.logger ?? createConsoleLogger("OnDeviceVision");
  }

  get backend(): Backend | null {
    return this.activeBackend;
  }

  isAvailable(): boolean {
    return this.activeBackend !== null && this.failure === null;
  }

  async configure(): Promise<void> {
    if (this.failure) throw this.failure;
    if (this.activeBackend !== null) return;

    const capability = await this.assessor.assess();
    if (capability.tier === PerformanceTier.LOW && !this.allowLowTier) {
      throw this.fail(new ConfigurationError("Device tier LOW is not eligible for the multimodal model"));
    }

    const selection = await this.currentSelection();
    try {
      this.activeBackend = await this.initialize(selection);
      this.logger.info(`Engine ready on ${this.activeBackend} (${selection.reason})`);
    } catch (err) {
      throw this.fail(
        err instanceof ConfigurationError
          ? err
          : new ConfigurationError(`Engine setup failed: ${describeError(err)}`, { cause: err }),
      );
    }
  }

  async currentCondition(): Promise<StrategyCondition> {
    const selection = await this.currentSelection();
    return { throttling: selection.throttling };
  }

  async analyze(image: Buffer, workType: WorkType, signal: AbortSignal): Promise<SafetyAnalysis> {
    if (!this.isAvailable()) {
      throw new UnavailableError(this.name, this.failure ? this.failure.message : "not configured");
    }

    const selection = await this.currentSelection();
    if (selection.backend !== this.activeBackend) {
      await this.switchBackend(selection);
    }

    try {
      return await this.engine.run(image, workType, signal);
    } catch (err) {
      if (err instanceof OutOfMemoryError || err instanceof ThermalThrottlingError) throw err;
      throw toAnalysisError(err);
    }
  }

  async release(): Promise<void> {
    this.activeBackend = null;
    await this.engine.release();
  }

  private async currentSelection(): Promise<BackendSelection> {
    const [capability, thermal, pressure] = await Promise.all([
      this.assessor.assess(),
      this.assessor.currentThermalState(),
      this.assessor.currentMemoryPressure(),
    ]);
    const selection = this.selector.selectBackend(capability, thermal, pressure, this.engine.supportedBackends);
    if (!this.outOfMemory.has(selection.backend)) return selection;

    const eligible = selection.eligible.filter((backend) => !this.outOfMemory.has(backend));
    const [backend = Backend.CPU] = eligible;
    return { ...selection, backend, eligible, reason: `${selection.backend} ran out of memory earlier` };
  }

  private async initialize(selection: BackendSelection): Promise<Backend> {
    const backend = await this.selector.initializeWithFallback(this.engine, selection);
    // initializeWithFallback only moves off the selection after an out-of-memory failure
    if (backend !== selection.backend) this.outOfMemory.add(selection.backend);
    return backend;
  }

  /** Concurrent analyses share one re-initialization. */
  private switchBackend(selection: BackendSelection): Promise<void> {
    if (!this.switching) {
      const from = this.activeBackend;
      this.switching = this.initialize(selection)
        .then(
          (backend) => {
            this.activeBackend = backend;
            this.logger.info(`Engine moved from ${from} to ${backend} (${selection.reason})`);
          },
          (err: unknown) => {
            const failure =
              err instanceof ConfigurationError
                ? err
                : new ConfigurationError(`Engine re-initialization failed: ${describeError(err)}`, { cause: err });
            throw this.fail(failure);
          },
        )
        .finally(() => {
          this.switching = null;
        });
    }
    return this.switching;
  }

  private fail(error: ConfigurationError): ConfigurationError {
    this.failure = error;
    this.activeBackend = null;
    this.logger.error(`On-device strategy disabled: ${error.message}`);
    return error;
  }
}
