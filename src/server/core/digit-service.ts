import { CacheError, IndexOutOfRangeError, InvalidIndexError, type CacheOperation } from "./errors";
import { BLOCK_SIZE, SpigotCalculator } from "./spigot";
import { NoopDigitCache, blockKey, type DigitCache } from "../storage/digit-cache";
import { createLogger, logPerformance, type Logger } from "../utils/logger";

/** Largest index accepted: the signed 64-bit maximum. */
export const MAX_DIGIT_INDEX = 0x7fff_ffff_ffff_ffffn;

const BLOCK = BigInt(BLOCK_SIZE);
const VALID_BLOCK = /^\d{9}$/;

export interface DigitResult {
  index: bigint;
  digit: number;
  cacheHit: boolean;
}

export interface DigitServiceOptions {
  calculator?: SpigotCalculator;
  cache?: DigitCache;
  logger?: Logger;
}

export interface GetDigitOptions {
  /** Checked before, and handed to, every cache call. */
  signal?: AbortSignal;
}

/**
 * Validate and normalize a digit index. Numbers must be safe integers
 * (InvalidIndexError otherwise); the value must fit a non-negative signed
 * 64-bit integer (IndexOutOfRangeError otherwise).
 */
export function toDigitIndex(index: bigint | number): bigint {
  if (typeof index === "number" && !Number.isSafeInteger(index)) {
    throw new InvalidIndexError(String(index), `index ${index} is not a safe integer, send it as a decimal string`);
  }
  const value = BigInt(index);
  if (value < 0n || value > MAX_DIGIT_INDEX) throw new IndexOutOfRangeError(value.toString());
  return value;
}

/** The 9-aligned offset of the block holding `index`. */
export const blockOffsetOf = (index: bigint): bigint => (index / BLOCK) * BLOCK;

/**
 * Maps a digit index onto its 9-digit block, serving the block from the
 * injected cache or computing and storing it on a miss.
 *
 * Concurrent requests for the same block may both miss and both compute;
 * the result is identical so the duplicate write is harmless. A coalescing
 * layer belongs in front of this class.
 */
export class DigitService {
  readonly calculator: SpigotCalculator;
  readonly cache: DigitCache;
  private readonly logger: Logger;

  constructor(options: DigitServiceOptions = {}) {
    this.logger = options.logger ?? createLogger("digit-service");
    this.calculator = options.calculator ?? new SpigotCalculator();
    this.cache = options.cache ?? new NoopDigitCache();
  }

  async getDigit(index: bigint | number, options: GetDigitOptions = {}): Promise<DigitResult> {
    const { signal } = options;
    const digitIndex = toDigitIndex(index);
    const blockOffset = blockOffsetOf(digitIndex);
    const key = blockKey(blockOffset);
    const log = this.logger.child({ index: digitIndex.toString(), key });
    log.debug("getDigit: enter");

    signal?.throwIfAborted();
    let block = await this.cacheCall("get", key, signal, () => this.cache.getValue(key, signal));
    const cacheHit = block !== "";

    if (cacheHit) {
      if (!VALID_BLOCK.test(block)) {
        throw new CacheError("get", key, `cached value "${block}" is not a ${BLOCK_SIZE}-digit block`);
      }
    } else {
      const startTime = Date.now();
      block = this.calculator.compute(blockOffset);
      logPerformance(log, "calculate-block", startTime, { blockOffset: blockOffset.toString() });

      signal?.throwIfAborted();
      const computed = block;
      await this.cacheCall("set", key, signal, () => this.cache.setValue(key, computed, signal));
    }

    const digit = Number(block[Number(digitIndex % BLOCK)]);
    log.debug({ digit, cacheHit }, "getDigit: exit");
    return { index: digitIndex, digit, cacheHit };
  }

  private async cacheCall<T>(
    operation: CacheOperation,
    key: string,
    signal: AbortSignal | undefined,
    call: () => Promise<T>,
  ): Promise<T> {
    try {
      return await call();
    } catch (error) {
      // cancellation is the caller's doing, not a cache failure
      if (signal?.aborted && error === signal.reason) throw error;
      const message = error instanceof Error ? error.message : String(error);
      throw new CacheError(operation, key, message, { cause: error });
    }
  }
}
