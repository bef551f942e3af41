/**
 *  Storage seam for computed digit blocks.
 *
 *  key    – lower-case hex encoding of the block offset (see `blockKey`)
 *  value  – the 9-character digit block
 *
 *  getValue(key)        – cached block, or "" on a miss (a miss is NOT an error)
 *  setValue(key, value) – persist a block; rejects only when the store failed
 *
 *  Implementations own their timeout semantics and should stop waiting once
 *  `signal` aborts.
 */
export interface DigitCache {
  readonly name: string;
  getValue(key: string, signal?: AbortSignal): Promise<string>;
  setValue(key: string, value: string, signal?: AbortSignal): Promise<void>;
}

export interface CacheStats {
  hits: number;
  misses: number;
  evictions: number;
  hitRate: string;
  size: number;
}

/** Caches that can report their own hit/miss counters. */
export interface ObservableDigitCache extends DigitCache {
  getStats(): CacheStats;
}

export const hasStats = (cache: DigitCache): cache is ObservableDigitCache =>
  "getStats" in cache && typeof cache.getStats === "function";

/** Cache key for a block offset. Hex is the only encoding read or written. */
export const blockKey = (blockOffset: bigint): string => blockOffset.toString(16);

/** Always misses and silently drops writes; the default when nothing is configured. */
export class NoopDigitCache implements DigitCache {
  readonly name = "none";

  async getValue(): Promise<string> {
    return "";
  }

  async setValue(): Promise<void> {}
}
