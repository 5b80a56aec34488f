import { describe, it, expect, vi } from "vitest";
import { createNodePlatformProbe, DEFAULT_CPU_FREQ_DIR, DEFAULT_THERMAL_ZONE_PATH } from "./platform-probe.js";
import type { HostInfo, ReadTextFn } from "./platform-probe.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

const MB = 1024 * 1024;

function makeHost(overrides: Partial<HostInfo> = {}): HostInfo {
  return {
    freemem: () => 3072 * MB,
    totalmem: () => 8192 * MB,
    availableParallelism: () => 8,
    release: () => "6.8.0-41-generic",
    type: () => "Linux",
    arch: () => "arm64",
    ...overrides,
  };
}

function makeSysfs(files: Record<string, string>): ReadTextFn {
  return vi.fn(async (path: string) => files[path] ?? null);
}

// ─── Tests ──────────────────────────────────────────────────────────────────────

describe("createNodePlatformProbe", () => {
  it("should report memory in whole megabytes and the host core count", async () => {
    const probe = createNodePlatformProbe({}, makeHost(), makeSysfs({}));
    expect(await probe.availableMemoryMb()).toBe(3072);
    expect(await probe.totalMemoryMb()).toBe(8192);
    expect(await probe.cpuCoreCount()).toBe(8);
  });

  it("should fall back to 4 cores when the host reports none", async () => {
    const probe = createNodePlatformProbe({}, makeHost({ availableParallelism: () => 0 }), makeSysfs({}));
    expect(await probe.cpuCoreCount()).toBe(4);
  });

  it("should derive the platform version from the kernel release unless pinned", async () => {
    expect(await createNodePlatformProbe({}, makeHost(), makeSysfs({})).platformVersion()).toBe(6);
    expect(
      await createNodePlatformProbe({ platformVersion: 34 }, makeHost(), makeSysfs({})).platformVersion(),
    ).toBe(34);
  });

  it("should default accelerator flags to false and honour overrides", async () => {
    const plain = createNodePlatformProbe({}, makeHost(), makeSysfs({}));
    expect(await plain.hasGpu()).toBe(false);
    expect(await plain.hasNpu()).toBe(false);

    const pinned = createNodePlatformProbe({ hasGpu: true, hasNpu: true }, makeHost(), makeSysfs({}));
    expect(await pinned.hasGpu()).toBe(true);
    expect(await pinned.hasNpu()).toBe(true);
  });

  it("should report no screen and a host-derived product name by default", async () => {
    const probe = createNodePlatformProbe({}, makeHost(), makeSysfs({}));
    expect(await probe.screenSize()).toBeNull();
    expect(await probe.productName()).toBe("Linux arm64");
  });

  it("should convert the thermal zone reading from millidegrees", async () => {
    const probe = createNodePlatformProbe({}, makeHost(), makeSysfs({ [DEFAULT_THERMAL_ZONE_PATH]: "47500" }));
    expect(await probe.temperatureCelsius()).toBe(47.5);
  });

  it("should return null readings when sysfs files are missing or garbled", async () => {
    const probe = createNodePlatformProbe(
      {},
      makeHost(),
      makeSysfs({ [DEFAULT_THERMAL_ZONE_PATH]: "not-a-number" }),
    );
    expect(await probe.temperatureCelsius()).toBeNull();
    expect(await probe.cpuFrequencyScaling()).toBeNull();
  });

  it("should compute frequency scaling as current over max", async () => {
    const probe = createNodePlatformProbe(
      {},
      makeHost(),
      makeSysfs({
        [`${DEFAULT_CPU_FREQ_DIR}/scaling_cur_freq`]: "1200000",
        [`${DEFAULT_CPU_FREQ_DIR}/cpuinfo_max_freq`]: "2400000",
      }),
    );
    expect(await probe.cpuFrequencyScaling()).toBe(0.5);
  });
});
