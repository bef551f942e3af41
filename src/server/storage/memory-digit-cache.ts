import type { CacheStats, ObservableDigitCache } from "./digit-cache";
import { createLogger, type Logger } from "../utils/logger";

export const DEFAULT_MEMORY_CACHE_SIZE = 1_024;

/**
 *  Process-local LRU of digit blocks, good for a single instance or tests.
 *  Map insertion order doubles as recency: a hit re-inserts the key at the back.
 */
export class MemoryDigitCache implements ObservableDigitCache {
  readonly name = "memory";

  private readonly map = new Map<string, string>();
  private readonly max: number;
  private readonly logger: Logger;
  private hits = 0;
  private misses = 0;
  private evictions = 0;

  constructor(max: number = DEFAULT_MEMORY_CACHE_SIZE, logger: Logger = createLogger("memory-cache")) {
    if (!Number.isInteger(max) || max < 1) {
      throw new RangeError(`memory cache size must be a positive integer, got ${max}`);
    }
    this.max = max;
    this.logger = logger;
    this.logger.debug({ maxSize: max }, "LRU cache initialized");
  }

  async getValue(key: string): Promise<string> {
    const value = this.map.get(key);
    if (value === undefined) {
      this.misses++;
      this.logger.trace({ key, misses: this.misses }, "Cache miss");
      return "";
    }
    this.hits++;
    this.map.delete(key); // bump to back
    this.map.set(key, value);
    this.logger.trace({ key, hits: this.hits }, "Cache hit");
    return value;
  }

  async setValue(key: string, value: string): Promise<void> {
    if (this.map.has(key)) this.map.delete(key);
    this.map.set(key, value);

    if (this.map.size > this.max) {
      const oldest = this.map.keys().next();
      if (!oldest.done) {
        this.map.delete(oldest.value);
        this.evictions++;
        this.logger.debug({
          evictedKey: oldest.value,
          totalEvictions: this.evictions,
          cacheSize: this.map.size,
        }, "Cache eviction");
      }
    }
  }

  getStats(): CacheStats {
    const total = this.hits + this.misses;
    return {
      hits: this.hits,
      misses: this.misses,
      evictions: this.evictions,
      hitRate: total > 0 ? (this.hits / total * 100).toFixed(2) + "%" : "0%",
      size: this.map.size,
    };
  }
}
