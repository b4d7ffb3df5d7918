/**
 * In-memory deduplication store
 *
 * Bounded LRU map with per-entry TTL. Single-process only: it gives
 * idempotency across batches of one engine instance, not across replicas.
 */

import type { IDedupStore, MappingResult } from '@rdg-mapper/core';

interface StoredResult {
  result: MappingResult;
  expiresAt: number;
}

export interface MemoryDedupStoreOptions {
  /** Maximum retained keys before the least recently used is evicted (default: 100000) */
  maxEntries?: number;
  /** Millisecond clock (default: Date.now) */
  clock?: () => number;
}

export interface DedupStoreStats {
  size: number;
  hits: number;
  misses: number;
  evictions: number;
  expirations: number;
}

export class MemoryDedupStore implements IDedupStore {
  private readonly entries = new Map<string, StoredResult>();
  private readonly maxEntries: number;
  private readonly clock: () => number;
  private readonly stats = { hits: 0, misses: 0, evictions: 0, expirations: 0 };

  constructor(options: MemoryDedupStoreOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 100_000);
    this.clock = options.clock ?? Date.now;
  }

  async get(key: string): Promise<MappingResult | undefined> {
    const stored = this.lookup(key);
    if (!stored) {
      this.stats.misses++;
      return undefined;
    }
    this.stats.hits++;
    return stored.result;
  }

  async putIfAbsent(key: string, result: MappingResult, ttlMs: number): Promise<MappingResult> {
    const existing = this.lookup(key);
    if (existing) return existing.result;

    if (this.entries.size >= this.maxEntries) {
      this.evictLeastRecentlyUsed();
    }
    this.entries.set(key, { result, expiresAt: this.clock() + ttlMs });
    return result;
  }

  /** Drop expired entries; returns how many were removed */
  prune(): number {
    const now = this.clock();
    let pruned = 0;
    for (const [key, stored] of this.entries) {
      if (now >= stored.expiresAt) {
        this.entries.delete(key);
        this.stats.expirations++;
        pruned++;
      }
    }
    return pruned;
  }

  clear(): void {
    this.entries.clear();
  }

  getStats(): DedupStoreStats {
    return { size: this.entries.size, ...this.stats };
  }

  /** Live entry for `key`, refreshed as most recently used */
  private lookup(key: string): StoredResult | undefined {
    const stored = this.entries.get(key);
    if (!stored) return undefined;

    if (this.clock() >= stored.expiresAt) {
      this.entries.delete(key);
      this.stats.expirations++;
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, stored);
    return stored;
  }

  private evictLeastRecentlyUsed(): void {
    const oldest = this.entries.keys().next();
    if (!oldest.done) {
      this.entries.delete(oldest.value);
      this.stats.evictions++;
    }
  }
}
