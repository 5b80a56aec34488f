import { describe, it, expect } from "vitest";
import { computeFingerprint, ResultCache } from "./result-cache.js";
import { AnalysisType, WorkType } from "./types.js";
import type { SafetyAnalysis } from "./types.js";

// ─── Helpers ────────────────────────────────────────────────────────────────────

function makeAnalysis(id: string): SafetyAnalysis {
  return {
    id,
    workType: WorkType.ROOFING,
    analysisType: AnalysisType.CLOUD_VISION,
    hazards: [],
    ppeStatus: null,
    recommendations: [],
    overallRiskLevel: "minimal",
    confidence: 0.9,
    processingTimeMs: 120,
    analyzedAt: "2026-01-01T00:00:00.000Z",
  };
}

function makeCache(maxEntries = 3, ttlMs = 60_000) {
  const clock = { now: 1_000 };
  const cache = new ResultCache({ ttlMs, maxEntries, now: () => clock.now });
  return { cache, clock };
}

// ─── computeFingerprint ─────────────────────────────────────────────────────────

describe("computeFingerprint", () => {
  const image = Buffer.from("photo-bytes");

  it("should prefix the sha-256 digest with the work type", () => {
    expect(computeFingerprint(Buffer.from(""), WorkType.ROOFING)).toBe(
      "roofing:e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855",
    );
  });

  it("should collide for identical bytes under one work type", () => {
    expect(computeFingerprint(image, WorkType.WELDING)).toBe(computeFingerprint(Buffer.from("photo-bytes"), WorkType.WELDING));
  });

  it("should never collide across work types", () => {
    expect(computeFingerprint(image, WorkType.WELDING)).not.toBe(computeFingerprint(image, WorkType.ELECTRICAL));
  });
});

// ─── ResultCache ────────────────────────────────────────────────────────────────

describe("ResultCache", () => {
  it("should return the identical stored analysis", () => {
    const { cache } = makeCache();
    const analysis = makeAnalysis("a");
    cache.put("fp-a", analysis);
    expect(cache.get("fp-a")).toBe(analysis);
    expect(cache.get("fp-missing")).toBeUndefined();
  });

  it("should expire entries older than the TTL", () => {
    const { cache, clock } = makeCache(3, 30_000);
    cache.put("fp-a", makeAnalysis("a"));
    clock.now += 30_000;
    expect(cache.get("fp-a")).toBeDefined();
    clock.now += 1;
    expect(cache.get("fp-a")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("should evict the least recently inserted entry when full", () => {
    const { cache } = makeCache(2);
    cache.put("fp-a", makeAnalysis("a"));
    cache.put("fp-b", makeAnalysis("b"));
    cache.put("fp-c", makeAnalysis("c"));
    expect(cache.size).toBe(2);
    expect(cache.get("fp-a")).toBeUndefined();
    expect(cache.get("fp-b")?.id).toBe("b");
    expect(cache.get("fp-c")?.id).toBe("c");
  });

  it("should treat a re-put as the newest insertion with last-write-wins", () => {
    const { cache } = makeCache(2);
    cache.put("fp-a", makeAnalysis("a1"));
    cache.put("fp-b", makeAnalysis("b"));
    cache.put("fp-a", makeAnalysis("a2"));
    cache.put("fp-c", makeAnalysis("c"));
    expect(cache.get("fp-b")).toBeUndefined();
    expect(cache.get("fp-a")?.id).toBe("a2");
  });

  it("should evict only expired entries", () => {
    const { cache, clock } = makeCache(5, 30_000);
    cache.put("fp-old", makeAnalysis("old"));
    clock.now += 20_000;
    cache.put("fp-new", makeAnalysis("new"));
    clock.now += 15_000;
    expect(cache.evictExpired()).toBe(1);
    expect(cache.get("fp-new")?.id).toBe("new");
  });

  describe("trim", () => {
    function filled() {
      const made = makeCache(10, 30_000);
      made.cache.put("fp-1", makeAnalysis("1"));
      made.clock.now += 31_000;
      for (const id of ["2", "3", "4", "5", "6"]) made.cache.put(`fp-${id}`, makeAnalysis(id));
      return made;
    }

    it("should do nothing under low pressure", () => {
      const { cache } = filled();
      expect(cache.trim("low")).toBe(0);
      expect(cache.size).toBe(6);
    });

    it("should drop expired entries under moderate pressure", () => {
      const { cache } = filled();
      expect(cache.trim("moderate")).toBe(1);
      expect(cache.size).toBe(5);
    });

    it("should also drop the oldest half under high pressure", () => {
      const { cache } = filled();
      // 1 expired, then floor(5 / 2) = 2 oldest
      expect(cache.trim("high")).toBe(3);
      expect(cache.get("fp-2")).toBeUndefined();
      expect(cache.get("fp-3")).toBeUndefined();
      expect(cache.get("fp-4")?.id).toBe("4");
      expect(cache.size).toBe(3);
    });

    it("should empty the cache under critical pressure", () => {
      const { cache } = filled();
      expect(cache.trim("critical")).toBe(6);
      expect(cache.size).toBe(0);
    });
  });
});
