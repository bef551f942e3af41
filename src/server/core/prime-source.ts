import * as prand from "pure-rand";
import { invariant } from "./errors";

/**
 * Produces the smallest prime strictly greater than `n` (2 for any `n < 2`).
 * Implementations must agree on every safe-integer input.
 */
export interface PrimeSource {
  readonly name: PrimeSourceName;
  nextPrime(n: number): number;
}

export type PrimeSourceName = "trial" | "probabilistic";

const firstCandidate = (n: number): number => (n % 2 === 0 ? n + 1 : n + 2);

function assertSafe(n: number): void {
  invariant(Number.isSafeInteger(n), `nextPrime input must be a safe integer, got ${n}`);
}

/* ────────────────────────────────────────────────────────────── */
/*  Trial division                                                */
/* ────────────────────────────────────────────────────────────── */

/** Exact test of an odd candidate against every odd divisor up to its square root. */
export function isPrimeByTrialDivision(n: number): boolean {
  if (n % 2 === 0) return false;
  let root = Math.floor(Math.sqrt(n));
  // sqrt can be one off for large n
  while (root * root > n) root--;
  while ((root + 1) * (root + 1) <= n) root++;
  for (let i = 3; i <= root; i += 2) {
    if (n % i === 0) return false;
  }
  return n > 1;
}

export class TrialDivisionPrimeSource implements PrimeSource {
  readonly name = "trial";

  nextPrime(n: number): number {
    assertSafe(n);
    if (n < 2) return 2;
    let next = firstCandidate(n);
    while (!isPrimeByTrialDivision(next)) next += 2;
    return next;
  }
}

/* ────────────────────────────────────────────────────────────── */
/*  Baillie-PSW (+ optional Miller-Rabin rounds)                  */
/* ────────────────────────────────────────────────────────────── */

const SMALL_PRIMES = [3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n, 41n, 43n, 47n, 53n];

const mod = (a: bigint, m: bigint): bigint => ((a % m) + m) % m;

function powModBig(base: bigint, exponent: bigint, m: bigint): bigint {
  let r = 1n;
  let b = mod(base, m);
  let e = exponent;
  while (e > 0n) {
    if (e & 1n) r = (r * b) % m;
    e >>= 1n;
    b = (b * b) % m;
  }
  return r;
}

/** Strong probable-prime test of odd `n > 3` to the given base. */
function isStrongProbablePrime(n: bigint, base: bigint): boolean {
  let d = n - 1n;
  let s = 0;
  while ((d & 1n) === 0n) {
    d >>= 1n;
    s++;
  }
  let x = powModBig(base, d, n);
  if (x === 1n || x === n - 1n) return true;
  for (let r = 1; r < s; r++) {
    x = (x * x) % n;
    if (x === n - 1n) return true;
  }
  return false;
}

/** Jacobi symbol (a/n) for odd positive n. */
export function jacobi(a: bigint, n: bigint): -1 | 0 | 1 {
  let x = mod(a, n);
  let y = n;
  let result: -1 | 1 = 1;
  while (x !== 0n) {
    while ((x & 1n) === 0n) {
      x >>= 1n;
      const r = y % 8n;
      if (r === 3n || r === 5n) result = result === 1 ? -1 : 1;
    }
    [x, y] = [y, x];
    if (x % 4n === 3n && y % 4n === 3n) result = result === 1 ? -1 : 1;
    x %= y;
  }
  return y === 1n ? result : 0;
}

function isPerfectSquare(n: bigint): boolean {
  if (n < 0n) return false;
  if (n < 2n) return true;
  let x = n;
  let y = (x + 1n) >> 1n;
  while (y < x) {
    x = y;
    y = (x + n / x) >> 1n;
  }
  return x * x === n;
}

/** Strong Lucas probable-prime test with Selfridge's parameters (P = 1). */
function isStrongLucasProbablePrime(n: bigint): boolean {
  if (isPerfectSquare(n)) return false;

  // first D in 5, -7, 9, -11, ... with (D/n) = -1
  let D = 5n;
  for (;;) {
    const j = jacobi(D, n);
    if (j === -1) break;
    if (j === 0 && mod(D, n) !== 0n) return false;
    D = D > 0n ? -(D + 2n) : -(D - 2n);
  }
  const P = 1n;
  const Q = (1n - D) / 4n;

  let d = n + 1n;
  let s = 0;
  while ((d & 1n) === 0n) {
    d >>= 1n;
    s++;
  }

  const half = (x: bigint): bigint => {
    const even = x & 1n ? x + n : x;
    return (even >> 1n) % n;
  };

  // U_1, V_1, Q^1
  let U = 1n;
  let V = P;
  let Qk = mod(Q, n);
  const bits = d.toString(2);
  for (let i = 1; i < bits.length; i++) {
    U = (U * V) % n;
    V = mod(V * V - 2n * Qk, n);
    Qk = (Qk * Qk) % n;
    if (bits[i] === "1") {
      const nextU = half(mod(P * U + V, n));
      const nextV = half(mod(D * U + P * V, n));
      U = nextU;
      V = nextV;
      Qk = mod(Qk * Q, n);
    }
  }

  if (U === 0n || V === 0n) return true;
  for (let r = 1; r < s; r++) {
    V = mod(V * V - 2n * Qk, n);
    if (V === 0n) return true;
    Qk = (Qk * Qk) % n;
  }
  return false;
}

/**
 * Baillie-PSW, optionally preceded by `rounds` Miller-Rabin tests to bases
 * drawn from a generator seeded with `n` itself, so the verdict for a given
 * `n` never changes between calls.
 */
export function isProbablePrime(n: bigint, rounds = 0): boolean {
  if (n < 2n) return false;
  if (n === 2n) return true;
  if ((n & 1n) === 0n) return false;
  for (const p of SMALL_PRIMES) {
    if (n === p) return true;
    if (n % p === 0n) return false;
  }

  if (rounds > 0) {
    let rng = prand.xoroshiro128plus(Number(n & 0xffff_ffffn));
    for (let i = 0; i < rounds; i++) {
      const [base, nextRng] = prand.uniformBigIntDistribution(2n, n - 2n, rng);
      rng = nextRng;
      if (!isStrongProbablePrime(n, base)) return false;
    }
  }

  return isStrongProbablePrime(n, 2n) && isStrongLucasProbablePrime(n);
}

export class ProbabilisticPrimeSource implements PrimeSource {
  readonly name = "probabilistic";

  constructor(private readonly rounds = 0) {
    invariant(Number.isInteger(rounds) && rounds >= 0, `Miller-Rabin rounds must be a non-negative integer, got ${rounds}`);
  }

  nextPrime(n: number): number {
    assertSafe(n);
    if (n < 2) return 2;
    let next = BigInt(firstCandidate(n));
    while (!isProbablePrime(next, this.rounds)) next += 2n;
    return Number(next);
  }
}

export function createPrimeSource(name: PrimeSourceName, rounds = 0): PrimeSource {
  return name === "trial" ? new TrialDivisionPrimeSource() : new ProbabilisticPrimeSource(rounds);
}
