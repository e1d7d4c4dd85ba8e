import { logger } from '../../utils/logger.js';

interface CacheEntry {
  fetchedAt: number;
  value: unknown;
}

/**
 * Build a cache key from an endpoint and its query parameters.
 * Parameters are sorted by name so that equivalent queries share an entry.
 */
export function buildCacheKey(endpoint: string, params?: Record<string, string>): string {
  const keys = Object.keys(params ?? {}).sort();
  if (!params || keys.length === 0) {
    return endpoint;
  }
  return `${endpoint}?${keys.map(key => `${key}=${params[key]}`).join('&')}`;
}

/**
 * In-memory registry response cache with a fixed time-to-live.
 *
 * Entries are never mutated after they are written; expiry is checked on read
 * and there is no other eviction.
 */
export class ResponseCache {
  private readonly entries = new Map<string, CacheEntry>();

  constructor(
    private readonly ttlMs: number,
    private readonly now: () => number = Date.now
  ) {}

  get(key: string): unknown | undefined {
    const entry = this.entries.get(key);
    if (!entry) {
      return undefined;
    }

    if (this.now() - entry.fetchedAt >= this.ttlMs) {
      logger.debug(`Response cache expired for ${key}`);
      return undefined;
    }

    logger.debug(`Response cache hit for ${key}`);
    return entry.value;
  }

  set(key: string, value: unknown): void {
    this.entries.set(key, { fetchedAt: this.now(), value });
  }

  /**
   * Return the cached value for `key`, or run `load` and cache its result.
   * A failed load leaves any previous entry in place.
   */
  async getOrLoad(key: string, load: () => Promise<unknown>): Promise<unknown> {
    const cached = this.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const value = await load();
    this.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
    logger.debug('Response cache cleared');
  }

  get size(): number {
    return this.entries.size;
  }
}
