// Builds the strategy ladder from the process configuration.
// A strategy is only constructed when its backing service is configured.

import type { AppConfig } from "./config.js";
import { CACHE_SIZE_BY_TIER } from "./config.js";
import { BackendSelector } from "./backend-selector.js";
import type { CapabilityAssessor } from "./capability-assessor.js";
import { CloudVisionStrategy } from "./cloud-strategy.js";
import type { OpenAIClientFactory } from "./cloud-strategy.js";
import { DetectorFallbackStrategy } from "./detector-fallback-strategy.js";
import { LocalDetectorClient, LocalRuntimeEngine } from "./local-runtime-client.js";
import type { FetchFn } from "./local-runtime-client.js";
import { OnDeviceVisionStrategy } from "./on-device-strategy.js";
import { Backend } from "./types.js";
import type { AnalyzerStrategy, ConnectivityMonitor, DeviceCapability } from "./types.js";

/** The sidecar runtime can host every backend; the selector narrows by device. */
const RUNTIME_BACKENDS: ReadonlySet<Backend> = new Set([Backend.GPU, Backend.NPU, Backend.CPU]);

export interface StrategyDeps {
  assessor: CapabilityAssessor;
  connectivity: ConnectivityMonitor;
  openAIClientFactory: OpenAIClientFactory;
  fetchFn?: FetchFn;
}

export function buildStrategies(config: AppConfig, deps: StrategyDeps): AnalyzerStrategy[] {
  const strategies: AnalyzerStrategy[] = [];

  if (config.localRuntimeUrl) {
    strategies.push(
      new OnDeviceVisionStrategy({
        engine: new LocalRuntimeEngine({
          baseUrl: config.localRuntimeUrl,
          supportedBackends: RUNTIME_BACKENDS,
          fetchFn: deps.fetchFn,
        }),
        assessor: deps.assessor,
        selector: new BackendSelector({ override: config.backendOverride }),
        allowLowTier: config.allowLowTierOnDevice,
      }),
    );
  }

  if (config.openai.apiKey) {
    strategies.push(
      new CloudVisionStrategy({
        clientFactory: deps.openAIClientFactory,
        connectivity: deps.connectivity,
        apiKey: config.openai.apiKey,
        model: config.openai.model,
      }),
    );
  }

  if (config.localDetectorUrl) {
    strategies.push(
      new DetectorFallbackStrategy({
        detector: new LocalDetectorClient({ baseUrl: config.localDetectorUrl, fetchFn: deps.fetchFn }),
      }),
    );
  }

  return strategies;
}

/** Cache bound for this device: the tier default unless the operator pinned one. */
export function cacheSizeFor(config: AppConfig, capability: DeviceCapability): number {
  return config.cacheMaxEntriesPinned ? config.orchestrator.cache.maxEntries : CACHE_SIZE_BY_TIER[capability.tier];
}
