import type { Validators } from "@feedsieve/shared";

/** How long cached validators are preferred over the persisted ones. */
export const DEFAULT_VALIDATOR_TTL_MS = 24 * 60 * 60 * 1000;

interface CacheEntry extends Validators {
  timestamp: number;
}

/**
 * Last validators seen per feed. Entries older than the TTL are ignored so
 * the fetcher falls back to what storage holds.
 */
export class ValidatorCache {
  private readonly entries = new Map<string, CacheEntry>();
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: { ttlMs?: number; now?: () => number } = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_VALIDATOR_TTL_MS;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.entries.size;
  }

  /** Fresh validators for the feed, or null. */
  get(feedId: string): Validators | null {
    const entry = this.entries.get(feedId);
    if (!entry) return null;
    if (this.now() - entry.timestamp >= this.ttlMs) {
      this.entries.delete(feedId);
      return null;
    }
    return { lastModified: entry.lastModified, etag: entry.etag };
  }

  set(feedId: string, validators: Validators): void {
    this.entries.set(feedId, {
      lastModified: validators.lastModified,
      etag: validators.etag,
      timestamp: this.now(),
    });
  }

  delete(feedId: string): void {
    this.entries.delete(feedId);
  }

  clear(): void {
    this.entries.clear();
  }
}
