/**
 * Trusted check of an externally computed cost. Pure: takes the committed state and a
 * proposal, returns the candidate state or the first failing check. Nothing is mutated.
 */

import { WAD, absWad, assertInt256 } from "./fixed-point.js";
import { costBounds, probabilitiesOf } from "./cost-function.js";
import { applyDelta, buildTradeDelta } from "./trade-delta.js";
import { invalidInput, isClumError } from "./errors.js";
import type { VerificationCheck } from "./errors.js";
import type { ClumStateSnapshot, CostProposal } from "../types/clum.js";

export interface VerificationParams {
  /** epsilon around the fixed-point cost bound, WAD. */
  costTolerance: bigint;
  /** Allowed |sum(p) - 1|, WAD. */
  simplexTolerance: bigint;
  maxBatchTrades: number;
}

export type VerificationResult =
  | { ok: true; quantities: bigint[]; cachedCost: bigint }
  | { ok: false; check: VerificationCheck; message: string };

function fail(check: VerificationCheck, message: string): VerificationResult {
  return { ok: false, check, message };
}

export function verifyCostProposal(
  state: ClumStateSnapshot,
  midpoints: readonly bigint[],
  proposal: CostProposal,
  params: VerificationParams
): VerificationResult {
  const n = state.quantities.length;
  if (midpoints.length !== n) throw invalidInput("Midpoints do not match the quantity vector");
  assertInt256(proposal.proposedCost, "proposedCost");
  proposal.newQuantities.forEach((qi, i) => assertInt256(qi, `newQuantities[${i}]`));

  // delta
  if (proposal.trades.length > params.maxBatchTrades) {
    return fail("delta", `Batch of ${proposal.trades.length} trades exceeds ${params.maxBatchTrades}`);
  }
  if (proposal.newQuantities.length !== n) {
    return fail("delta", `Expected ${n} quantities, got ${proposal.newQuantities.length}`);
  }
  let expected = [...state.quantities];
  try {
    for (const trade of proposal.trades) {
      expected = applyDelta(expected, buildTradeDelta(midpoints, trade));
    }
  } catch (err) {
    if (!isClumError(err)) throw err;
    return fail("delta", `Declared trades do not apply: ${err.message}`);
  }
  const mismatch = expected.findIndex((qi, i) => qi !== proposal.newQuantities[i]);
  if (mismatch !== -1) {
    return fail("delta", `Quantity ${mismatch} does not match the declared trades`);
  }

  // monotonicity
  const trades = proposal.trades;
  if (trades.length > 0 && trades.every((t) => t.side === "BUY") && proposal.proposedCost <= state.cachedCost) {
    return fail("monotonicity", "Buy batch must increase the cost");
  }
  if (trades.length > 0 && trades.every((t) => t.side === "SELL") && proposal.proposedCost >= state.cachedCost) {
    return fail("monotonicity", "Sell batch must decrease the cost");
  }

  // bound
  const { lower, upper } = costBounds(proposal.newQuantities, state.liquidity);
  if (proposal.proposedCost < lower - params.costTolerance || proposal.proposedCost > upper + params.costTolerance) {
    return fail("bound", `Proposed cost ${proposal.proposedCost} outside [${lower}, ${upper}]`);
  }

  // simplex
  const total = probabilitiesOf(proposal.newQuantities, state.liquidity).reduce((a, p) => a + p, 0n);
  if (absWad(total - WAD) > params.simplexTolerance) {
    return fail("simplex", `Probabilities sum to ${total}`);
  }

  return { ok: true, quantities: [...proposal.newQuantities], cachedCost: proposal.proposedCost };
}
