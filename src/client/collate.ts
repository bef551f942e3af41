import * as prand from "pure-rand";
import { createLogger, logError, type Logger } from "../server/utils/logger";

/** Returns the digit at `index` as served by `endpoint`. */
export type DigitFetcher = (endpoint: string, index: number) => Promise<number>;

export interface CollateOptions {
  count: number;
  endpoints: string[];
  fetchDigit: DigitFetcher;
  /** Seed for the request order; defaults to the clock. */
  seed?: number;
  logger?: Logger;
}

/** Fisher-Yates shuffle of `[0, count)`. */
export function shuffledIndices(count: number, seed: number): number[] {
  const indices = Array.from({ length: count }, (_, i) => i);
  let rng = prand.xoroshiro128plus(seed);
  for (let i = count - 1; i > 0; i--) {
    const [j, nextRng] = prand.uniformIntDistribution(0, i, rng);
    rng = nextRng;
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }
  return indices;
}

/**
 * Request the first `count` fractional digits in random order, spreading the
 * requests round-robin over `endpoints`. Failed indices read as "-".
 */
export async function collateDigits(options: CollateOptions): Promise<string> {
  const { count, endpoints, fetchDigit } = options;
  const logger = options.logger ?? createLogger("client");
  if (endpoints.length === 0) throw new RangeError("at least one endpoint is required");

  const digits: string[] = new Array<string>(count).fill("-");
  const order = shuffledIndices(count, options.seed ?? Date.now());

  await Promise.all(order.map(async (index, i) => {
    const endpoint = endpoints[i % endpoints.length];
    try {
      const digit = await fetchDigit(endpoint, index);
      digits[index] = String(digit);
    } catch (error) {
      logError(logger, error, { endpoint, index });
    }
  }));

  return digits.join("");
}
