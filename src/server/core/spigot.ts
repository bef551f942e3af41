import { AssertionFailure, invariant } from "./errors";
import { invMod, mulMod, powMod } from "./modular-arithmetic";
import { ProbabilisticPrimeSource, type PrimeSource } from "./prime-source";
import { createLogger, type Logger } from "../utils/logger";

/** Number of consecutive fractional digits produced by one calculation. */
export const BLOCK_SIZE = 9;

/** Digits beyond the requested window that absorb floating-point error. */
const GUARD_DIGITS = 21;

export interface SpigotOptions {
  primeSource?: PrimeSource;
  logger?: Logger;
}

/**
 * Bailey-Borwein-Plouffe style digit extraction, after Fabrice Bellard's
 * base-10 variant (https://bellard.org/pi/pi.c). `compute(n)` returns the
 * fractional digits of pi at zero-based positions n..n+8 without touching
 * any earlier digit:
 *
 *   compute(0) → "141592653"
 *   compute(1) → "415926535"
 *
 * Work grows roughly with n² / log n. The running sum is a double that takes
 * one rounded addition per prime below 2N, about 2^-53 each. Blocks are checked
 * against a reference expansion up to offset 3003. The worst-case error reaches
 * the ninth digit (1e-9) near 10^7 primes, which puts the first possible wrong
 * last digit at offsets in the low tens of millions. A block whose true value
 * sits within that error of a digit boundary can round either way. Offsets
 * past about 1.35e15 are refused outright: the moduli leave the safe-integer range.
 */
export class SpigotCalculator {
  readonly primeSource: PrimeSource;
  private readonly logger: Logger;

  constructor(options: SpigotOptions = {}) {
    this.primeSource = options.primeSource ?? new ProbabilisticPrimeSource();
    this.logger = options.logger ?? createLogger("spigot");
  }

  compute(offset: bigint | number): string {
    const n = BigInt(offset);
    invariant(n >= 0n, `spigot offset must be non-negative, got ${n}`);
    const startTime = Date.now();
    this.logger.debug({ offset: n.toString(), primeSource: this.primeSource.name }, "compute: enter");

    const N = Math.floor((Number(n) + GUARD_DIGITS) * Math.LN10 / Math.LN2);
    const twoN = 2 * N;
    invariant(Number.isSafeInteger(twoN), `offset ${n} needs moduli beyond exact integer range`);

    let sum = 0;
    for (let a = 3; a <= twoN; a = this.primeSource.nextPrime(a)) {
      // largest power of a not exceeding 2N
      let vmax = 1;
      let av = a;
      while (av * a <= twoN) {
        av *= a;
        vmax++;
      }
      invariant(Number.isSafeInteger(av) && av > 0, `modulus ${av} for prime ${a} is invalid`);

      let s = 0;
      let num = 1;
      let den = 1;
      let v = 0;
      let kq = 1;
      let kq2 = 1;

      for (let k = 1; k <= N; k++) {
        let t = k;
        if (kq >= a) {
          do {
            t = Math.floor(t / a);
            v--;
          } while (t % a === 0);
          kq = 0;
        }
        kq++;
        num = mulMod(num, t, av);

        t = 2 * k - 1;
        if (kq2 >= a) {
          if (kq2 === a) {
            do {
              t = Math.floor(t / a);
              v++;
            } while (t % a === 0);
          }
          kq2 -= a;
        }
        den = mulMod(den, t, av);
        kq2 += 2;

        if (v > 0) {
          t = invMod(den, av);
          t = mulMod(t, num, av);
          t = mulMod(t, k, av);
          for (let i = v; i < vmax; i++) t = mulMod(t, a, av);
          s += t;
          if (s >= av) s -= av;
        }
      }

      s = mulMod(s, powMod(10, n, av), av);
      sum = (sum + s / av) % 1;
    }

    const digits = Math.floor(sum * 1e9).toString().padStart(BLOCK_SIZE, "0");
    if (!/^\d{9}$/.test(digits)) {
      throw new AssertionFailure(`spigot produced "${digits}" for offset ${n}`);
    }

    this.logger.debug({
      offset: n.toString(),
      result: digits,
      duration: Date.now() - startTime,
    }, "compute: exit");
    return digits;
  }
}
