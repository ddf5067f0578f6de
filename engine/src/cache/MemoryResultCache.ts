/**
 * In-memory ResultCache with LRU eviction and per-entry TTL.
 *
 * Map insertion order doubles as recency order: a hit re-inserts the entry
 * at the end, and eviction removes from the front. Entries are stored and
 * handed out as copies, so callers never share an output with the cache.
 */

import type { ToolOutput } from '../types/core-types.js';
import { copyRecord } from './DataCopy.js';
import type { CacheEntry, ResultCache } from './ResultCache.js';

export interface MemoryResultCacheConfig {
  /** Entry limit before least-recently-used eviction (default: 500) */
  maxEntries?: number;
  /** Time-to-live in milliseconds (default: 1 hour) */
  ttlMs?: number;
  /** Clock; injectable for tests */
  now?: () => number;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  entries: number;
}

export class MemoryResultCache implements ResultCache {
  private readonly entries: Map<string, CacheEntry> = new Map();
  private readonly maxEntries: number;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private stats = { hits: 0, misses: 0, evictions: 0 };

  constructor(config: MemoryResultCacheConfig = {}) {
    this.maxEntries = Math.max(1, config.maxEntries ?? 500);
    this.ttlMs = config.ttlMs ?? 3_600_000;
    this.now = config.now ?? Date.now;
  }

  private static key(toolId: string, fingerprint: string): string {
    return `${toolId}\u0000${fingerprint}`;
  }

  async get(toolId: string, fingerprint: string): Promise<ToolOutput | undefined> {
    const key = MemoryResultCache.key(toolId, fingerprint);
    const entry = this.entries.get(key);

    if (!entry) {
      this.stats.misses++;
      return undefined;
    }

    if (this.now() - entry.createdAt >= this.ttlMs) {
      this.entries.delete(key);
      this.stats.misses++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.stats.hits++;
    return copyRecord(entry.output);
  }

  async put(toolId: string, fingerprint: string, output: ToolOutput): Promise<void> {
    const key = MemoryResultCache.key(toolId, fingerprint);
    this.entries.delete(key);
    this.entries.set(key, { output: copyRecord(output), createdAt: this.now() });

    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
      this.stats.evictions++;
    }
  }

  has(toolId: string, fingerprint: string): boolean {
    const entry = this.entries.get(MemoryResultCache.key(toolId, fingerprint));
    return entry !== undefined && this.now() - entry.createdAt < this.ttlMs;
  }

  delete(toolId: string, fingerprint: string): boolean {
    return this.entries.delete(MemoryResultCache.key(toolId, fingerprint));
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }

  getStats(): CacheStats {
    return { ...this.stats, entries: this.entries.size };
  }
}
