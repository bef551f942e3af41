/**
 * @file Tests for the BBP spigot
 * @module __tests__/core/spigot
 */
import { describe, it, expect } from "vitest";
import { BLOCK_SIZE, SpigotCalculator } from "../../server/core/spigot";
import { TrialDivisionPrimeSource } from "../../server/core/prime-source";
import { AssertionFailure } from "../../server/core/errors";
import { PI_DIGITS } from "../fixtures";

describe("SpigotCalculator", () => {
  const calculator = new SpigotCalculator();

  it("computes the first two blocks", () => {
    expect(calculator.compute(0)).toBe("141592653");
    expect(calculator.compute(9n)).toBe("589793238");
  });

  it("starts at any offset, not just block boundaries", () => {
    expect(calculator.compute(1)).toBe("415926535");
  });

  it("matches every block of the first 99 digits", () => {
    for (let offset = 0; offset + BLOCK_SIZE <= PI_DIGITS.length; offset += BLOCK_SIZE) {
      expect(calculator.compute(offset)).toBe(PI_DIGITS.slice(offset, offset + BLOCK_SIZE));
    }
  });

  it("continues past the fixture", () => {
    expect(calculator.compute(99)).toBe("982148086");
  });

  // reference blocks from an arbitrary-precision Machin expansion
  it("stays exact thousands of digits in", () => {
    expect(calculator.compute(1800)).toBe("827967976");
    expect(calculator.compute(2997)).toBe("961567945");
  }, 60_000);

  it("is deterministic", () => {
    expect(calculator.compute(45)).toBe(calculator.compute(45));
    expect(calculator.compute(45)).toBe("375105820");
  });

  it("gives the same block with either prime source", () => {
    const trial = new SpigotCalculator({ primeSource: new TrialDivisionPrimeSource() });
    expect(trial.compute(90)).toBe(calculator.compute(90));
    expect(trial.compute(90)).toBe("342117067");
  });

  it("rejects a negative offset", () => {
    expect(() => calculator.compute(-9)).toThrow(AssertionFailure);
  });

  /** 2N would be ~1.5e19, past the exact double range, so no modulus is trustworthy. */
  it("refuses offsets whose moduli leave the exact integer range", () => {
    expect(() => calculator.compute(2n ** 62n)).toThrow("exact integer range");
  });
});
