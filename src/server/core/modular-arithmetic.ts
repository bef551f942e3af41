import { invariant } from "./errors";

/**
 * Integer helpers for the spigot. Every value is a non-negative safe integer
 * (< 2^53); only products may leave that range, and `mulMod` handles those
 * through bigint.
 */

/** `(a * b) mod m`, exact for any pair of safe integers in `[0, m)`. */
export function mulMod(a: number, b: number, m: number): number {
  const product = a * b;
  if (product <= Number.MAX_SAFE_INTEGER) return product % m;
  return Number((BigInt(a) * BigInt(b)) % BigInt(m));
}

/** `(base ^ exponent) mod modulus` by square-and-multiply. */
export function powMod(base: number, exponent: number | bigint, modulus: number): number {
  invariant(Number.isSafeInteger(modulus) && modulus > 0, `powMod modulus must be a positive integer, got ${modulus}`);
  let e = BigInt(exponent);
  invariant(e >= 0n, `powMod exponent must be non-negative, got ${e}`);

  let a = ((base % modulus) + modulus) % modulus;
  let r = 1 % modulus;
  while (e > 0n) {
    if (e & 1n) r = mulMod(r, a, modulus);
    e >>= 1n;
    if (e > 0n) a = mulMod(a, a, modulus);
  }
  return r;
}

/**
 * Multiplicative inverse of `x` mod `y` via the extended Euclidean algorithm,
 * normalized into `[0, y)`. Throws AssertionFailure unless `gcd(x, y) = 1`.
 */
export function invMod(x: number, y: number): number {
  invariant(Number.isSafeInteger(y) && y > 0, `invMod modulus must be a positive integer, got ${y}`);
  let u = ((x % y) + y) % y;
  invariant(u !== 0 || y === 1, `invMod(${x}, ${y}): ${x} has no inverse, it is a multiple of the modulus`);
  if (y === 1) return 0;

  let v = y;
  let c = 1;
  let a = 0;
  do {
    const q = Math.floor(v / u);
    let t = c;
    c = a - q * c;
    a = t;
    t = u;
    u = v - q * u;
    v = t;
  } while (u !== 0);

  // v now holds gcd(x, y)
  invariant(v === 1, `invMod(${x}, ${y}): operands share the factor ${v}`);
  a %= y;
  return a < 0 ? a + y : a;
}
