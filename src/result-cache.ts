/**
 * Fingerprint-keyed cache of finished analyses.
 *
 * Entries live in a Map, whose iteration order is insertion order, so the
 * oldest entry is always the first key. Re-putting a fingerprint moves it to
 * the back. Expiry is checked lazily on get() and in bulk by evictExpired().
 */

import { createHash } from "crypto";
import type { MemoryPressure, SafetyAnalysis, WorkType } from "./types.js";

/** `<workType>:<sha256 hex of the image bytes>` */
export function computeFingerprint(image: Uint8Array, workType: WorkType): string {
  const digest = createHash("sha256").update(image).digest("hex");
  return `${workType}:${digest}`;
}

interface CacheEntry {
  analysis: SafetyAnalysis;
  insertedAt: number;
}

export interface ResultCacheOptions {
  ttlMs: number;
  maxEntries: number;
  now?: () => number;
}

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxEntries: number;
  private readonly now: () => number;

  constructor(options: ResultCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxEntries = options.maxEntries;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(fingerprint: string): SafetyAnalysis | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry) return undefined;
    if (this.isExpired(entry, this.now())) {
      this.entries.delete(fingerprint);
      return undefined;
    }
    return entry.analysis;
  }

  /** Last write wins for a repeated fingerprint. */
  put(fingerprint: string, analysis: SafetyAnalysis): void {
    this.entries.delete(fingerprint);
    this.entries.set(fingerprint, { analysis, insertedAt: this.now() });
    while (this.entries.size > this.maxEntries) {
      this.dropOldest();
    }
  }

  evictExpired(): number {
    const now = this.now();
    let removed = 0;
    for (const [fingerprint, entry] of this.entries) {
      if (this.isExpired(entry, now)) {
        this.entries.delete(fingerprint);
        removed++;
      }
    }
    return removed;
  }

  /**
   * Shed entries in response to memory pressure: moderate drops expired
   * entries, high also drops the oldest half, critical empties the cache.
   * Returns the number of entries removed.
   */
  trim(pressure: MemoryPressure): number {
    switch (pressure) {
      case "low":
        return 0;
      case "moderate":
        return this.evictExpired();
      case "high": {
        let removed = this.evictExpired();
        const target = Math.floor(this.entries.size / 2);
        for (let i = 0; i < target; i++) {
          this.dropOldest();
          removed++;
        }
        return removed;
      }
      case "critical": {
        const removed = this.entries.size;
        this.clear();
        return removed;
      }
    }
  }

  clear(): void {
    this.entries.clear();
  }

  private isExpired(entry: CacheEntry, now: number): boolean {
    return now - entry.insertedAt > this.ttlMs;
  }

  private dropOldest(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) this.entries.delete(oldest.value);
  }
}
