import { hostname } from "node:os";
import type { DigitService } from "../core/digit-service";
import { DigitError, IndexOutOfRangeError, InvalidIndexError } from "../core/errors";
import type { DigitMetadata, DigitReply, ErrorReply } from "./protocol";

const DECIMAL = /^\d+$/;

/** Parse an index from a path segment or socket payload. */
export function parseIndex(raw: unknown): bigint | number {
  if (typeof raw === "number") return raw;
  if (typeof raw === "string" && DECIMAL.test(raw)) return BigInt(raw);
  throw new InvalidIndexError(String(raw));
}

export function buildMetadata(tags: string[] = [], annotations: Record<string, string> = {}): DigitMetadata {
  let identity: string;
  try {
    identity = hostname();
  } catch {
    identity = "unknown";
  }
  return { identity, tags: [...tags], annotations: { ...annotations } };
}

/** HTTP status matching a failure from `getDigit`. */
export function statusFor(error: unknown): number {
  if (error instanceof InvalidIndexError || error instanceof IndexOutOfRangeError) return 400;
  return 500;
}

export function errorReply(error: unknown): ErrorReply {
  if (error instanceof DigitError) return { error: error.message };
  return { error: "internal error" };
}

export async function serveDigit(
  service: DigitService,
  metadata: DigitMetadata,
  raw: unknown,
  signal?: AbortSignal,
): Promise<DigitReply> {
  const result = await service.getDigit(parseIndex(raw), { signal });
  return { index: result.index.toString(), digit: result.digit, metadata };
}
