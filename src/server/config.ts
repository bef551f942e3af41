import type { PrimeSourceName } from "./core/prime-source";
import { DEFAULT_MEMORY_CACHE_SIZE } from "./storage/memory-digit-cache";

export type CacheKind = "none" | "memory" | "firestore";

export interface ServerConfig {
  httpPort: number;
  cache: CacheKind;
  memoryCacheSize: number;
  firestoreCollection: string;
  cacheTimeoutMs: number;
  primeSource: PrimeSourceName;
  millerRabinRounds: number;
  tags: string[];
  annotations: Record<string, string>;
}

export class ConfigError extends Error {
  constructor(readonly variable: string, message: string) {
    super(`${variable}: ${message}`);
    this.name = "ConfigError";
  }
}

type Env = Record<string, string | undefined>;

const CACHE_KINDS: readonly CacheKind[] = ["none", "memory", "firestore"];
const PRIME_SOURCES: readonly PrimeSourceName[] = ["probabilistic", "trial"];

function integer(env: Env, name: string, fallback: number, min: number): number {
  const raw = env[name]?.trim();
  if (!raw) return fallback;
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < min) {
    throw new ConfigError(name, `expected an integer >= ${min}, got "${raw}"`);
  }
  return value;
}

function oneOf<T extends string>(env: Env, name: string, allowed: readonly T[], fallback: T): T {
  const raw = env[name]?.trim().toLowerCase();
  if (!raw) return fallback;
  const match = allowed.find(candidate => candidate === raw);
  if (match === undefined) {
    throw new ConfigError(name, `expected one of ${allowed.join(", ")}, got "${raw}"`);
  }
  return match;
}

const list = (raw: string | undefined): string[] =>
  (raw ?? "").split(",").map(item => item.trim()).filter(item => item.length > 0);

function annotations(env: Env): Record<string, string> {
  const result: Record<string, string> = {};
  for (const pair of list(env.ANNOTATIONS)) {
    const eq = pair.indexOf("=");
    if (eq <= 0) throw new ConfigError("ANNOTATIONS", `expected key=value, got "${pair}"`);
    result[pair.slice(0, eq).trim()] = pair.slice(eq + 1).trim();
  }
  return result;
}

/** Runtime config, ENV-driven. Throws ConfigError on the first bad value. */
export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    httpPort: integer(env, "HTTP_PORT", 8080, 0),
    cache: oneOf(env, "DIGIT_CACHE", CACHE_KINDS, "none"),
    memoryCacheSize: integer(env, "MEMORY_CACHE_SIZE", DEFAULT_MEMORY_CACHE_SIZE, 1),
    firestoreCollection: env.FIRESTORE_COLLECTION?.trim() || "digits",
    cacheTimeoutMs: integer(env, "CACHE_TIMEOUT_MS", 5_000, 1),
    primeSource: oneOf(env, "PRIME_SOURCE", PRIME_SOURCES, "probabilistic"),
    millerRabinRounds: integer(env, "MILLER_RABIN_ROUNDS", 0, 0),
    tags: list(env.TAGS),
    annotations: annotations(env),
  };
}
