/**
 * Fixed-point LMSR cost function over bucket quantities.
 *   Cost:  C(q) = b * ln( sum_i exp(q_i / b) )
 *   Price: p_i  = exp(q_i / b) / sum_j exp(q_j / b)
 * Exponent arguments are shifted by max(q) (log-sum-exp), so every exponential is in (0, 1].
 */

import {
  WAD,
  absWad,
  assertInt256,
  expWad,
  lnWad,
  maxOf,
  mulWad,
  mulWadUp,
} from "./fixed-point.js";
import { invalidInput } from "./errors.js";

/** Per-term slack on each shifted exponential: 1 wei from exp, 1 wei from the truncated argument. */
const TERM_SLACK = 4n;
/** Slack on lnWad output. */
const LN_SLACK = 2n;

export interface CostBounds {
  lower: bigint;
  upper: bigint;
}

interface ExponentialTerms {
  max: bigint;
  terms: bigint[];
  sum: bigint;
}

function exponentialTerms(q: readonly bigint[], b: bigint): ExponentialTerms {
  if (b <= 0n) throw invalidInput("LMSR: b must be positive");
  if (q.length === 0) throw invalidInput("LMSR: q must have at least one bucket");
  q.forEach((qi, i) => assertInt256(qi, `q[${i}]`));
  const max = maxOf(q);
  const terms = q.map((qi) => expWad(((qi - max) * WAD) / b));
  const sum = terms.reduce((a, e) => a + e, 0n);
  return { max, terms, sum };
}

/** C(q) in WAD. */
export function costOf(q: readonly bigint[], b: bigint): bigint {
  const { max, sum } = exponentialTerms(q, b);
  return assertInt256(max + mulWad(b, lnWad(sum)), "cost");
}

/**
 * Interval guaranteed to contain the exact C(q). The bucket holding max(q) contributes
 * exp(0) = 1 exactly, so the lower sum is never below 1.
 */
export function costBounds(q: readonly bigint[], b: bigint): CostBounds {
  const { max, terms } = exponentialTerms(q, b);
  let low = 0n;
  let high = 0n;
  for (const e of terms) {
    low += e > TERM_SLACK ? e - TERM_SLACK : 0n;
    high += e + TERM_SLACK;
  }
  if (low < WAD) low = WAD;
  const lower = max + mulWad(b, lnWad(low) - LN_SLACK) - 1n;
  const upper = max + mulWadUp(b, lnWad(high) + LN_SLACK) + 1n;
  return {
    lower: assertInt256(lower, "cost lower bound"),
    upper: assertInt256(upper, "cost upper bound"),
  };
}

/** Risk-neutral probability per bucket, floored to WAD (sum is within N wei below 1). */
export function probabilitiesOf(q: readonly bigint[], b: bigint): bigint[] {
  const { terms, sum } = exponentialTerms(q, b);
  return terms.map((e) => (e * WAD) / sum);
}

/** C(0) = b * ln(N): the subsidy level, equal to the worst-case loss bound. */
export function utilityLevelOf(numBuckets: number, b: bigint): bigint {
  return costOf(new Array<bigint>(numBuckets).fill(0n), b);
}

/**
 * Loss in the worst outcome: max_i q_i minus premiums collected since C(0).
 * C(q) >= max(q), so this never exceeds U.
 */
export function worstCaseLossOf(q: readonly bigint[], cost: bigint, utilityLevel: bigint): bigint {
  return maxOf(q) - (cost - utilityLevel);
}

export interface SolvencyLimits {
  maxBucketExposure: bigint;
  maxWorstCaseLoss: bigint;
}

/** Null when (q, cost) is within limits, otherwise a description of the first breach. */
export function solvencyBreach(
  q: readonly bigint[],
  cost: bigint,
  utilityLevel: bigint,
  limits: SolvencyLimits
): string | null {
  const over = q.findIndex((qi) => absWad(qi) > limits.maxBucketExposure);
  if (over !== -1) {
    return `Bucket ${over} exposure ${q[over]} exceeds ${limits.maxBucketExposure}`;
  }
  const loss = worstCaseLossOf(q, cost, utilityLevel);
  if (loss > limits.maxWorstCaseLoss) {
    return `Worst-case loss ${loss} exceeds ${limits.maxWorstCaseLoss} (max exposure ${maxOf(q)})`;
  }
  return null;
}
