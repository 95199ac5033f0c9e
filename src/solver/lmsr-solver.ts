/**
 * Off-path LMSR solver. Evaluates the cost function in arbitrary precision (decimal.js) and
 * packages the result as a proposal for verifyAndSetCost. Nothing here is trusted by the
 * engine: the proposal is re-checked against fixed-point bounds on submission.
 *
 *   Cost:  C(q) = b * ln( sum_i exp(q_i / b) )
 *   Price: p_i  = exp(q_i / b) / sum_j exp(q_j / b)
 */

import { Decimal } from "decimal.js";
import { applyDelta, buildTradeDelta } from "../engine/trade-delta.js";
import type { ClumStateSnapshot, CostProposal, TradeIntent } from "../types/clum.js";

const PRECISION = 64;
const WAD_DIGITS = 18;

const D = Decimal.clone({ precision: PRECISION, rounding: Decimal.ROUND_HALF_EVEN });
type D = Decimal;

function fromWad(v: bigint): D {
  return new D(v.toString()).div(new D(10).pow(WAD_DIGITS));
}

function toWad(v: D): bigint {
  return BigInt(v.times(new D(10).pow(WAD_DIGITS)).toFixed(0, Decimal.ROUND_HALF_EVEN));
}

/**
 * Log-sum-exp for numerical stability: ln(sum_i exp(x_i)) = x_max + ln(sum_i exp(x_i - x_max)).
 */
function logSumExp(values: D[]): D {
  const max = values.reduce((a, b) => (a.gte(b) ? a : b));
  let sum = new D(0);
  for (const v of values) {
    sum = sum.plus(v.minus(max).exp());
  }
  return max.plus(sum.ln());
}

function scaled(q: readonly bigint[], b: bigint): D[] {
  if (b <= 0n) throw new Error("LMSR: b must be positive");
  if (q.length === 0) throw new Error("LMSR: q must have at least one bucket");
  const bD = fromWad(b);
  return q.map((qi) => fromWad(qi).div(bD));
}

/** C(q) rounded to the nearest wei. */
export function solveCost(q: readonly bigint[], b: bigint): bigint {
  return toWad(fromWad(b).times(logSumExp(scaled(q, b))));
}

/** Marginal prices rounded to the nearest wei; they sum to 1 within N wei. */
export function impliedProbabilities(q: readonly bigint[], b: bigint): bigint[] {
  const x = scaled(q, b);
  const max = x.reduce((a, c) => (a.gte(c) ? a : c));
  const shifted = x.map((xi) => xi.minus(max).exp());
  const sum = shifted.reduce((a, c) => a.plus(c), new D(0));
  return shifted.map((e) => toWad(e.div(sum)));
}

/** b * ln(n). */
export function worstCaseLoss(b: bigint, numBuckets: number): bigint {
  if (numBuckets <= 0) throw new Error("LMSR: numBuckets must be positive");
  return toWad(fromWad(b).times(new D(numBuckets).ln()));
}

/**
 * Settle a batch of trades on top of a committed state: quantities use the engine's own
 * delta rule so they match exactly, the cost comes from the high-precision evaluation.
 */
export function buildCostProposal(
  state: ClumStateSnapshot,
  midpoints: readonly bigint[],
  trades: readonly TradeIntent[]
): CostProposal {
  let newQuantities = [...state.quantities];
  for (const trade of trades) {
    newQuantities = applyDelta(newQuantities, buildTradeDelta(midpoints, trade));
  }
  return {
    proposedCost: solveCost(newQuantities, state.liquidity),
    newQuantities,
    trades: [...trades],
  };
}
