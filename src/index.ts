// Site Safety Dispatcher - Entry point
// Probes the device, wires the strategy ladder and starts the server.

import "dotenv/config";
import OpenAI from "openai";
import { AnalysisCoordinator } from "./analysis-coordinator.js";
import { buildStrategies, cacheSizeFor } from "./bootstrap.js";
import { CapabilityAssessor } from "./capability-assessor.js";
import type { OpenAIVisionClient } from "./cloud-strategy.js";
import { loadAppConfig } from "./config.js";
import { DnsConnectivityMonitor } from "./connectivity.js";
import { describeError } from "./errors.js";
import { createNodePlatformProbe } from "./platform-probe.js";
import { createAppServer } from "./server.js";

export const APP_NAME = "Site Safety Dispatcher";
export const APP_VERSION = "0.1.0";

const MEMORY_CHECK_INTERVAL_MS = 60_000;

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

async function main(): Promise<void> {
  const config = loadAppConfig();
  logInit("Configuration loaded");

  // ─── Device ─────────────────────────────────────────────────────────────────

  logInit("Assessing device capability...");
  const assessor = new CapabilityAssessor(createNodePlatformProbe(config.probe));
  const capability = await assessor.assess();
  logInit(`Device: ${capability.deviceClass}, tier ${capability.tier}, score ${capability.score}`);

  const connectivity = new DnsConnectivityMonitor({ host: config.connectivityHost });
  await connectivity.start();

  // ─── Strategies ─────────────────────────────────────────────────────────────

  const strategies = buildStrategies(config, {
    assessor,
    connectivity,
    openAIClientFactory: (apiKey) => new OpenAI({ apiKey }) as unknown as OpenAIVisionClient,
  });
  if (strategies.length === 0) {
    logFatal("No analysis strategy configured. Set OPENAI_API_KEY, LOCAL_RUNTIME_URL or LOCAL_DETECTOR_URL.");
    process.exit(1);
  }

  const maxEntries = cacheSizeFor(config, capability);
  const coordinator = new AnalysisCoordinator({
    strategies,
    assessor,
    connectivity,
    config: { ...config.orchestrator, cache: { ...config.orchestrator.cache, maxEntries } },
  });
  logInit(`Result cache holds up to ${maxEntries} analyses`);

  for (const result of await coordinator.configure()) {
    logInit(`${result.name}: ${result.ok ? "ready" : `not configured (${result.error})`}`);
  }

  const memoryTimer = setInterval(() => {
    void assessor.currentMemoryPressure().then((level) => coordinator.handleMemoryPressure(level));
  }, MEMORY_CHECK_INTERVAL_MS);
  memoryTimer.unref();

  // ─── Start server ───────────────────────────────────────────────────────────

  const server = createAppServer({ coordinator });
  await server.listen(config.port);
  logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
  logInit(`Ladder: ${strategies.map((s) => s.name).join(" → ")}`);

  const shutdown = (signal: string) => {
    logInit(`${signal} received, shutting down`);
    clearInterval(memoryTimer);
    connectivity.stop();
    Promise.all([server.close(), coordinator.dispose()])
      .then(() => process.exit(0))
      .catch((err: unknown) => {
        logFatal(`Shutdown failed: ${describeError(err)}`);
        process.exit(1);
      });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

main().catch((err: unknown) => {
  logFatal(describeError(err));
  process.exit(1);
});
