import type { Intent } from "../../shared/contracts";
import { normalizeUtterance } from "./intent-parser";

const clone = <T>(value: T): T => JSON.parse(JSON.stringify(value)) as T;

interface CacheEntry {
  value: Intent;
  expiresAt: number;
}

export interface ResultCacheOptions {
  maxEntries: number;
  ttlMinutes: number;
  now?: () => number;
}

export const cacheKeyFor = (text: string, lastIntentName: string | null | undefined): string =>
  `${normalizeUtterance(text)}|${lastIntentName ?? ""}`;

/**
 * LRU cache of fallback intents with a fixed time-to-live.
 * Map insertion order doubles as recency order: oldest first.
 */
export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: ResultCacheOptions) {
    this.maxEntries = Math.max(1, Math.floor(options.maxEntries));
    this.ttlMs = Math.max(0, options.ttlMinutes) * 60_000;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  get(key: string): Intent | null {
    const entry = this.entries.get(key);
    if (!entry) {
      return null;
    }

    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return clone(entry.value);
  }

  set(key: string, value: Intent): void {
    this.entries.delete(key);
    this.entries.set(key, {
      value: clone(value),
      expiresAt: this.now() + this.ttlMs
    });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) {
        break;
      }
      this.entries.delete(oldest.value);
    }
  }
}
