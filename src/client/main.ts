/**
 * Command-line client
 * - Requests the first PI_DIGIT_COUNT fractional digits of pi, in random
 *   order, from every endpoint given as an argument or in PI_ENDPOINTS
 * - Each request travels over Socket.IO → event: "digit"
 * - Prints the collated result, "-" marking digits that failed
 */

import { collateDigits } from "./collate";
import { SocketDigitFetcher } from "./socket-fetcher";
import { createLogger, logError, logPerformance } from "../server/utils/logger";

const logger = createLogger("client");

const DEFAULT_DIGIT_COUNT = 100;
const DEFAULT_MAX_TIMEOUT_MS = 10_000;

const positive = (raw: string | undefined, fallback: number, name: string): number => {
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got "${raw}"`);
  }
  return value;
};

const endpoints = process.argv.slice(2).length > 0
  ? process.argv.slice(2)
  : (process.env.PI_ENDPOINTS ?? "").split(",").map(e => e.trim()).filter(Boolean);

let fetcher: SocketDigitFetcher | undefined;

try {
  if (endpoints.length === 0) {
    throw new RangeError("usage: pi-client <endpoint> [endpoint...] (or set PI_ENDPOINTS)");
  }
  const count = positive(process.env.PI_DIGIT_COUNT, DEFAULT_DIGIT_COUNT, "PI_DIGIT_COUNT");
  const maxTimeoutMs = positive(process.env.PI_MAX_TIMEOUT_MS, DEFAULT_MAX_TIMEOUT_MS, "PI_MAX_TIMEOUT_MS");

  logger.info({ count, endpoints, maxTimeoutMs }, "Requesting digits");
  const startTime = Date.now();

  fetcher = new SocketDigitFetcher(maxTimeoutMs);
  const digits = await collateDigits({ count, endpoints, fetchDigit: fetcher.fetchDigit, logger });

  logPerformance(logger, "collate", startTime, { count });
  process.stdout.write(`Result is: 3.${digits}\n`);
} catch (error) {
  logError(logger, error, { context: "client" });
  process.exitCode = 1;
} finally {
  fetcher?.close();
}
