/**
 * @file Tests for the prime sources
 * @module __tests__/core/prime-source
 *
 * Both strategies must be interchangeable inside the spigot, so the bulk of
 * this suite checks that they agree; the rest pins Baillie-PSW against strong
 * base-2 pseudoprimes that fool Miller-Rabin alone.
 */
import { describe, it, expect } from "vitest";
import {
  ProbabilisticPrimeSource,
  TrialDivisionPrimeSource,
  createPrimeSource,
  isPrimeByTrialDivision,
  isProbablePrime,
  jacobi,
} from "../../server/core/prime-source";
import { AssertionFailure } from "../../server/core/errors";

const sources = [new TrialDivisionPrimeSource(), new ProbabilisticPrimeSource()];

describe.each(sources)("$name nextPrime", (source) => {
  it("returns 2 for anything below 2", () => {
    expect(source.nextPrime(-5)).toBe(2);
    expect(source.nextPrime(0)).toBe(2);
    expect(source.nextPrime(1)).toBe(2);
  });

  it("returns the next prime strictly above n", () => {
    expect(source.nextPrime(2)).toBe(3);
    expect(source.nextPrime(3)).toBe(5);
    expect(source.nextPrime(13)).toBe(17);
    expect(source.nextPrime(24)).toBe(29);
    expect(source.nextPrime(7919)).toBe(7927);
  });

  it("rejects inputs that are not safe integers", () => {
    expect(() => source.nextPrime(1.5)).toThrow(AssertionFailure);
    expect(() => source.nextPrime(2 ** 53)).toThrow(AssertionFailure);
  });
});

describe("prime source equivalence", () => {
  it("agrees on every n in 0..100,000", () => {
    const trial = new TrialDivisionPrimeSource();
    const probabilistic = new ProbabilisticPrimeSource();
    const mismatches: number[] = [];
    for (let n = 0; n <= 100_000; n++) {
      if (trial.nextPrime(n) !== probabilistic.nextPrime(n)) mismatches.push(n);
    }
    expect(mismatches).toEqual([]);
  }, 120_000);

  it("agrees with extra Miller-Rabin rounds", () => {
    const trial = new TrialDivisionPrimeSource();
    const withRounds = new ProbabilisticPrimeSource(4);
    for (let n = 0; n <= 5_000; n++) {
      expect(withRounds.nextPrime(n)).toBe(trial.nextPrime(n));
    }
  });
});

describe("isPrimeByTrialDivision", () => {
  it("rejects even numbers immediately, 2 included", () => {
    expect(isPrimeByTrialDivision(2)).toBe(false);
    expect(isPrimeByTrialDivision(1_000_000)).toBe(false);
  });

  it("classifies odd numbers", () => {
    expect(isPrimeByTrialDivision(1)).toBe(false);
    expect(isPrimeByTrialDivision(3)).toBe(true);
    expect(isPrimeByTrialDivision(9)).toBe(false);
    expect(isPrimeByTrialDivision(2_147_483_647)).toBe(true);
  });
});

describe("isProbablePrime", () => {
  it("accepts primes, large ones included", () => {
    for (const p of [2n, 3n, 5n, 53n, 59n, 97n, 7919n, 4_294_967_291n, 2_147_483_647n, 2n ** 61n - 1n]) {
      expect(isProbablePrime(p)).toBe(true);
    }
  });

  it("rejects small and even numbers", () => {
    for (const n of [-7n, 0n, 1n, 4n, 100n]) {
      expect(isProbablePrime(n)).toBe(false);
    }
  });

  it("rejects Carmichael numbers and squares of primes", () => {
    expect(isProbablePrime(561n)).toBe(false);
    expect(isProbablePrime(3481n)).toBe(false); // 59²
  });

  /** Each of these passes a strong base-2 test; only the Lucas half catches them. */
  it("rejects strong base-2 pseudoprimes", () => {
    expect(isProbablePrime(1_373_653n)).toBe(false);
    expect(isProbablePrime(25_326_001n)).toBe(false);
    expect(isProbablePrime(3_215_031_751n)).toBe(false);
  });

  it("gives the same verdict with extra Miller-Rabin rounds", () => {
    expect(isProbablePrime(2_147_483_647n, 5)).toBe(true);
    expect(isProbablePrime(3_215_031_751n, 3)).toBe(false);
    expect(isProbablePrime(10_877n, 2)).toBe(false);
  });
});

describe("jacobi", () => {
  it("computes known symbols", () => {
    expect(jacobi(5n, 21n)).toBe(1);
    expect(jacobi(2n, 7n)).toBe(1);
    expect(jacobi(3n, 9n)).toBe(0);
    expect(jacobi(-1n, 7n)).toBe(-1);
  });
});

describe("createPrimeSource", () => {
  it("builds the requested strategy", () => {
    expect(createPrimeSource("trial")).toBeInstanceOf(TrialDivisionPrimeSource);
    expect(createPrimeSource("probabilistic", 2)).toBeInstanceOf(ProbabilisticPrimeSource);
  });

  it("rejects a negative round count", () => {
    expect(() => new ProbabilisticPrimeSource(-1)).toThrow(AssertionFailure);
  });
});
