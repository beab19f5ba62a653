import type { ValidationVerdict } from '@aph/types';

export interface CacheEntry {
  readonly verdict: ValidationVerdict;
  readonly expiresAt: number;
}

export interface VerdictCacheOptions {
  readonly ttlMs?: number;
  readonly maxSize?: number;
  readonly now?: () => number;
}

export interface CacheStats {
  readonly size: number;
  readonly hits: number;
  readonly misses: number;
  /** hits / (hits + misses), 0 before the first lookup */
  readonly hitRate: number;
}

export const DEFAULT_CACHE_TTL_MS = 300_000;
export const DEFAULT_CACHE_MAX_SIZE = 1000;

/**
 * TTL cache of validation verdicts keyed by VM identity.
 * Map insertion order doubles as recency order for LRU eviction.
 */
export class VerdictCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;
  private hits = 0;
  private misses = 0;

  constructor(options: VerdictCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.maxSize = Math.max(1, options.maxSize ?? DEFAULT_CACHE_MAX_SIZE);
    this.now = options.now ?? Date.now;
  }

  get(vmIdentity: string): ValidationVerdict | undefined {
    const entry = this.entries.get(vmIdentity);
    if (!entry) {
      this.misses++;
      return undefined;
    }
    if (entry.expiresAt <= this.now()) {
      this.entries.delete(vmIdentity);
      this.misses++;
      return undefined;
    }

    this.entries.delete(vmIdentity);
    this.entries.set(vmIdentity, entry);
    this.hits++;
    return entry.verdict;
  }

  put(vmIdentity: string, verdict: ValidationVerdict, ttlMs: number = this.ttlMs): void {
    this.entries.delete(vmIdentity);
    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    this.entries.set(vmIdentity, { verdict, expiresAt: this.now() + ttlMs });
  }

  delete(vmIdentity: string): boolean {
    return this.entries.delete(vmIdentity);
  }

  clear(): void {
    this.entries.clear();
  }

  /** Drop expired entries; returns how many were removed. */
  sweep(): number {
    const now = this.now();
    let removed = 0;
    for (const [vmIdentity, entry] of this.entries) {
      if (entry.expiresAt <= now) {
        this.entries.delete(vmIdentity);
        removed++;
      }
    }
    return removed;
  }

  startSweep(intervalMs: number): void {
    this.stopSweep();
    this.sweepTimer = setInterval(() => this.sweep(), intervalMs);
    this.sweepTimer.unref();
  }

  stopSweep(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups === 0 ? 0 : this.hits / lookups,
    };
  }
}
