/**
 * Backend selection for on-device inference.
 *
 * Preference is GPU, then NPU, then CPU. GPU needs the platform flag, at least
 * 2048MB free and memory pressure below "high"; NPU needs only its flag. A
 * thermal state at or above the severe threshold forces CPU and reports a
 * ThermalThrottlingError so the coordinator can shorten the timeout budget.
 */

import { ConfigurationError, describeError, OutOfMemoryError, ThermalThrottlingError } from "./errors.js";
import { isThermalAtLeast, MEMORY_PRESSURE_RANK } from "./capability-assessor.js";
import type { Logger } from "./logger.js";
import { createConsoleLogger } from "./logger.js";
import { Backend } from "./types.js";
import type { DeviceCapability, MemoryPressure, ThermalState } from "./types.js";

export const BACKEND_PREFERENCE: readonly Backend[] = [Backend.GPU, Backend.NPU, Backend.CPU];
export const GPU_MIN_AVAILABLE_MEMORY_MB = 2048;

export interface BackendSelection {
  readonly backend: Backend;
  /** Eligible backends in preference order; always ends with CPU. */
  readonly eligible: readonly Backend[];
  readonly reason: string;
  readonly throttling: ThermalThrottlingError | null;
}

/** The part of an inference runtime the selector needs to bring a backend up. */
export interface BackendInitializer {
  initialize(backend: Backend): Promise<void>;
}

export interface BackendSelectorOptions {
  /** Thermal state at which CPU is forced. Default "severe". */
  severeThermalState?: ThermalState;
  /** Pinned backend; ignored when not eligible or when thermal forcing applies. */
  override?: Backend | null;
  logger?: Logger;
}

export class BackendSelector {
  private readonly severeThermalState: ThermalState;
  private readonly override: Backend | null;
  private readonly logger: Logger;

  constructor(options: BackendSelectorOptions = {}) {
    this.severeThermalState = options.severeThermalState ?? "severe";
    this.override = options.override ?? null;
    this.logger = options.logger ?? createConsoleLogger("BackendSelector");
  }

  eligibleBackends(
    capability: DeviceCapability,
    memoryPressure: MemoryPressure,
    supported?: ReadonlySet<Backend>,
  ): Backend[] {
    return BACKEND_PREFERENCE.filter((backend) => {
      if (supported && backend !== Backend.CPU && !supported.has(backend)) return false;
      switch (backend) {
        case Backend.GPU:
          return (
            capability.hasGpu &&
            capability.availableMemoryMb >= GPU_MIN_AVAILABLE_MEMORY_MB &&
            MEMORY_PRESSURE_RANK[memoryPressure] < MEMORY_PRESSURE_RANK.high
          );
        case Backend.NPU:
          return capability.hasNpu;
        default:
          return true;
      }
    });
  }

  selectBackend(
    capability: DeviceCapability,
    thermalState: ThermalState,
    memoryPressure: MemoryPressure,
    supported?: ReadonlySet<Backend>,
  ): BackendSelection {
    const eligible = this.eligibleBackends(capability, memoryPressure, supported);

    if (isThermalAtLeast(thermalState, this.severeThermalState)) {
      return {
        backend: Backend.CPU,
        eligible,
        reason: `thermal state ${thermalState} forces CPU`,
        throttling: new ThermalThrottlingError(thermalState),
      };
    }

    if (this.override !== null) {
      if (this.override === Backend.AUTO || eligible.includes(this.override)) {
        return { backend: this.override, eligible, reason: "override", throttling: null };
      }
      this.logger.warn(`Backend override ${this.override} is not eligible on this device; ignoring`);
    }

    const [preferred = Backend.CPU] = eligible;
    return { backend: preferred, eligible, reason: "preference", throttling: null };
  }

  /** Next eligible backend after `current`, or null when `current` is already the last resort. */
  nextLowerBackend(current: Backend, eligible: readonly Backend[]): Backend | null {
    if (current === Backend.AUTO) return Backend.CPU;
    const index = eligible.indexOf(current);
    if (index === -1) return current === Backend.CPU ? null : Backend.CPU;
    return eligible[index + 1] ?? null;
  }

  /**
   * Initialize `engine` on the selected backend. An out-of-memory failure is
   * retried exactly once on the next lower eligible backend; anything else, or
   * a second failure, is a ConfigurationError.
   */
  async initializeWithFallback(engine: BackendInitializer, selection: BackendSelection): Promise<Backend> {
    try {
      await engine.initialize(selection.backend);
      return selection.backend;
    } catch (err) {
      if (!(err instanceof OutOfMemoryError)) {
        throw new ConfigurationError(
          `Backend ${selection.backend} failed to initialize: ${describeError(err)}`,
          { cause: err },
        );
      }
      const fallback = this.nextLowerBackend(selection.backend, selection.eligible);
      if (fallback === null) {
        throw new ConfigurationError(`Backend ${selection.backend} ran out of memory with no fallback`, {
          cause: err,
        });
      }
      this.logger.warn(`Backend ${selection.backend} ran out of memory; retrying on ${fallback}`);
      try {
        await engine.initialize(fallback);
        return fallback;
      } catch (retryErr) {
        throw new ConfigurationError(
          `Fallback backend ${fallback} failed to initialize: ${describeError(retryErr)}`,
          { cause: retryErr },
        );
      }
    }
  }
}
