// Node host probe for the capability assessor.
//
// Memory and cores come from node:os. Thermal and CPU frequency readings come
// from Linux sysfs when present and read as null elsewhere. GPU/NPU flags,
// platform version, screen and product name can be pinned through overrides
// (the entry point fills them from DEVICE_* env vars).

import * as os from "node:os";
import { readFile } from "node:fs/promises";
import type { PlatformProbe, ScreenSize } from "./types.js";

export interface ProbeOverrides {
  hasGpu?: boolean;
  hasNpu?: boolean;
  platformVersion?: number;
  /** null pins "no screen". */
  screen?: ScreenSize | null;
  productName?: string;
  thermalZonePath?: string;
  cpuFreqDir?: string;
}

/** The slice of node:os the probe reads; injectable for tests. */
export interface HostInfo {
  freemem(): number;
  totalmem(): number;
  availableParallelism(): number;
  release(): string;
  type(): string;
  arch(): string;
}

/** Read a small text file; null when it does not exist or is not readable. */
export type ReadTextFn = (path: string) => Promise<string | null>;

export const DEFAULT_THERMAL_ZONE_PATH = "/sys/class/thermal/thermal_zone0/temp";
export const DEFAULT_CPU_FREQ_DIR = "/sys/devices/system/cpu/cpu0/cpufreq";

const BYTES_PER_MB = 1024 * 1024;
const DEFAULT_CPU_COUNT = 4;

export async function readSysfsText(path: string): Promise<string | null> {
  try {
    return (await readFile(path, "utf8")).trim();
  } catch (err) {
    if (err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "EACCES")) {
      return null;
    }
    throw err;
  }
}

function parseReading(text: string | null): number | null {
  if (text === null) return null;
  const value = Number(text);
  return Number.isFinite(value) ? value : null;
}

export function createNodePlatformProbe(
  overrides: ProbeOverrides = {},
  host: HostInfo = os,
  readText: ReadTextFn = readSysfsText,
): PlatformProbe {
  const thermalZonePath = overrides.thermalZonePath ?? DEFAULT_THERMAL_ZONE_PATH;
  const cpuFreqDir = overrides.cpuFreqDir ?? DEFAULT_CPU_FREQ_DIR;

  return {
    availableMemoryMb: async () => Math.floor(host.freemem() / BYTES_PER_MB),
    totalMemoryMb: async () => Math.floor(host.totalmem() / BYTES_PER_MB),
    cpuCoreCount: async () => {
      const count = host.availableParallelism();
      return Number.isFinite(count) && count > 0 ? Math.floor(count) : DEFAULT_CPU_COUNT;
    },
    hasGpu: async () => overrides.hasGpu ?? false,
    hasNpu: async () => overrides.hasNpu ?? false,
    platformVersion: async () => {
      if (overrides.platformVersion !== undefined) return overrides.platformVersion;
      const major = Number.parseInt(host.release(), 10);
      return Number.isNaN(major) ? 0 : major;
    },
    screenSize: async () => (overrides.screen === undefined ? null : overrides.screen),
    productName: async () => overrides.productName ?? `${host.type()} ${host.arch()}`,
    temperatureCelsius: async () => {
      // sysfs reports millidegrees
      const milli = parseReading(await readText(thermalZonePath));
      return milli === null ? null : milli / 1000;
    },
    cpuFrequencyScaling: async () => {
      const current = parseReading(await readText(`${cpuFreqDir}/scaling_cur_freq`));
      const max = parseReading(await readText(`${cpuFreqDir}/cpuinfo_max_freq`));
      if (current === null || max === null || max <= 0) return null;
      return Math.min(1, current / max);
    },
  };
}
