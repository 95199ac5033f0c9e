/**
 * Deterministic WAD fixed-point arithmetic on bigint.
 *
 * expWad / lnWad evaluate at 36 internal digits (range reduction by ln 2, then a Taylor
 * series for exp and an atanh series for ln) and truncate to WAD, so both are exact to
 * within 1 wei over the ranges the cost function uses. Results never depend on floating
 * point, which keeps the proposer and the verifier bit-for-bit reproducible.
 */

import { invalidInput, numericOverflow } from "./errors.js";

export const WAD = 10n ** 18n;

/** Internal precision for exp/ln: 1e36. */
const ONE = 10n ** 36n;
/** ln(2) * 1e36, truncated. */
const LN2 = 693147180559945309417232121458176568n;

export const MAX_INT256 = 2n ** 255n - 1n;
export const MIN_INT256 = -(2n ** 255n);

/** exp(135) * 1e18 still fits in 256 bits; anything larger overflows. */
export const MAX_EXP_ARG = 135n * WAD;
/** exp(-42) < 1e-18, which floors to 0 wei. */
export const MIN_EXP_ARG = -42n * WAD;

export function assertInt256(value: bigint, label: string): bigint {
  if (value > MAX_INT256 || value < MIN_INT256) {
    throw numericOverflow(`${label} exceeds the signed 256-bit range`);
  }
  return value;
}

export function mulWad(a: bigint, b: bigint): bigint {
  return (a * b) / WAD;
}

/** a * b / WAD rounded up. Both operands must be non-negative. */
export function mulWadUp(a: bigint, b: bigint): bigint {
  const product = a * b;
  return product === 0n ? 0n : (product - 1n) / WAD + 1n;
}

export function divWad(a: bigint, b: bigint): bigint {
  if (b === 0n) throw invalidInput("divWad: division by zero");
  return (a * WAD) / b;
}

export function absWad(a: bigint): bigint {
  return a < 0n ? -a : a;
}

export function maxOf(values: readonly bigint[]): bigint {
  if (values.length === 0) throw invalidInput("maxOf: empty vector");
  return values.reduce((a, b) => (a >= b ? a : b));
}

/** exp(x) for x in WAD, truncated to WAD. */
export function expWad(x: bigint): bigint {
  if (x > MAX_EXP_ARG) throw numericOverflow(`expWad: argument ${x} above ${MAX_EXP_ARG}`);
  if (x < MIN_EXP_ARG) return 0n;

  const scaled = x * WAD;
  let k = scaled / LN2;
  let r = scaled - k * LN2;
  if (r > LN2 / 2n) {
    k += 1n;
    r -= LN2;
  } else if (r < -LN2 / 2n) {
    k -= 1n;
    r += LN2;
  }

  // |r| <= ln(2)/2, so the series converges in about 30 terms at 1e36.
  let term = ONE;
  let sum = ONE;
  for (let n = 1n; term !== 0n; n++) {
    term = (term * r) / (n * ONE);
    sum += term;
  }

  const result = k >= 0n ? sum << k : sum >> -k;
  return result / WAD;
}

/** ln(x) for x > 0 in WAD, truncated toward zero. */
export function lnWad(x: bigint): bigint {
  if (x <= 0n) throw invalidInput(`lnWad: argument must be positive, got ${x}`);

  let y = x * WAD;
  let k = 0n;
  while (y >= 2n * ONE) {
    y >>= 1n;
    k += 1n;
  }
  while (y < ONE) {
    y <<= 1n;
    k -= 1n;
  }

  // y in [1, 2): ln(y) = 2 * atanh(z), z = (y - 1) / (y + 1) in [0, 1/3).
  const z = ((y - ONE) * ONE) / (y + ONE);
  const z2 = (z * z) / ONE;
  let power = z;
  let sum = z;
  for (let n = 3n; power !== 0n; n += 2n) {
    power = (power * z2) / ONE;
    sum += power / n;
  }

  return (k * LN2 + 2n * sum) / WAD;
}
