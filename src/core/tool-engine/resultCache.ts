/**
 * Bounded TTL cache for tool results.
 *
 * Eviction is FIFO by insertion: a Map iterates in insertion order, so the
 * oldest entry is always the first key. Expiry is checked lazily on `get`.
 */

import { sha256Hex, stableStringify } from "../utils/stableStringify";
import type { ArgumentValue, ToolArguments } from "../types";

export interface CacheEntry {
  key: string;
  value: ArgumentValue;
  expiresAt: number;
  insertedAt: number;
}

export interface ResultCacheOptions {
  maxSize: number;
  defaultTtlMs: number;
  now?: () => number;
  onEvict?: (key: string) => void;
}

export interface CacheStats {
  size: number;
  maxSize: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
}

/**
 * Cache key for one tool call: the tool name followed by a digest of the
 * version and canonicalized arguments. Objects are key-sorted at every depth.
 */
export function cacheKey(toolName: string, version: string, args: ToolArguments): string {
  return `${toolName}:${sha256Hex(stableStringify({ version, args }))}`;
}

export class ResultCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly maxSize: number;
  private readonly defaultTtlMs: number;
  private readonly now: () => number;
  private readonly onEvict?: (key: string) => void;

  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(options: ResultCacheOptions) {
    if (!Number.isInteger(options.maxSize) || options.maxSize < 1) {
      throw new RangeError(`Cache maxSize must be a positive integer, got ${options.maxSize}`);
    }
    this.maxSize = options.maxSize;
    this.defaultTtlMs = options.defaultTtlMs;
    this.now = options.now ?? Date.now;
    this.onEvict = options.onEvict;
  }

  get(key: string): ArgumentValue | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      return undefined;
    }
    this.hits++;
    return structuredClone(entry.value);
  }

  /**
   * Insert or overwrite. An overwrite counts as a fresh insertion for FIFO
   * purposes. A non-positive TTL stores nothing and drops any existing entry.
   * The value is copied in, and every hit gets its own copy out.
   */
  put(key: string, value: ArgumentValue, ttlMs: number = this.defaultTtlMs): void {
    this.entries.delete(key);
    if (!(ttlMs > 0)) return;

    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.evictions++;
      this.onEvict?.(oldest.value);
    }

    const insertedAt = this.now();
    this.entries.set(key, { key, value: structuredClone(value), insertedAt, expiresAt: insertedAt + ttlMs });
  }

  invalidate(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Drop every entry belonging to one tool. Returns the number removed.
   */
  invalidateTool(toolName: string): number {
    const prefix = `${toolName}:`;
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(prefix)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  stats(): CacheStats {
    return {
      size: this.entries.size,
      maxSize: this.maxSize,
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }
}
