import { describe, it, expect } from "vitest";
import { WAD } from "./fixed-point.js";
import { utilityLevelOf } from "./cost-function.js";
import { verifyCostProposal, type VerificationParams } from "./cost-verifier.js";
import { CLUM_ERROR_REASONS } from "./errors.js";
import { buildCostProposal } from "../solver/lmsr-solver.js";
import type { ClumStateSnapshot, TradeIntent } from "../types/clum.js";
import { catchClumError, makeRegistry, wad } from "../../test/helpers/clum.js";

const MIDPOINTS = makeRegistry().getMidpoints();
const PARAMS: VerificationParams = { costTolerance: 10n ** 9n, simplexTolerance: 10n ** 6n, maxBatchTrades: 4 };

function flatState(): ClumStateSnapshot {
  const utilityLevel = utilityLevelOf(7, wad(1000));
  return {
    quantities: new Array<bigint>(7).fill(0n),
    cachedCost: utilityLevel,
    utilityLevel,
    liquidity: wad(1000),
  };
}

const BUY_PUT: TradeIntent = { type: "PUT", strike: wad(2000), size: WAD, side: "BUY" };
const SELL_CALL: TradeIntent = { type: "CALL", strike: wad(2100), size: WAD, side: "SELL" };

describe("verifyCostProposal", () => {
  it("returns the candidate state for a valid proposal", () => {
    const state = flatState();
    const proposal = buildCostProposal(state, MIDPOINTS, [BUY_PUT]);
    const result = verifyCostProposal(state, MIDPOINTS, proposal, PARAMS);
    expect(result).toEqual({ ok: true, quantities: proposal.newQuantities, cachedCost: proposal.proposedCost });
    expect(state.quantities).toEqual(new Array<bigint>(7).fill(0n));
  });

  it("fails the delta check on a short quantity vector", () => {
    const state = flatState();
    const proposal = buildCostProposal(state, MIDPOINTS, [BUY_PUT]);
    const result = verifyCostProposal(state, MIDPOINTS, { ...proposal, newQuantities: [0n] }, PARAMS);
    expect(result).toEqual({ ok: false, check: "delta", message: "Expected 7 quantities, got 1" });
  });

  it("fails the delta check when the batch is too large", () => {
    const state = flatState();
    const proposal = buildCostProposal(state, MIDPOINTS, [BUY_PUT, BUY_PUT, BUY_PUT, BUY_PUT, BUY_PUT]);
    const result = verifyCostProposal(state, MIDPOINTS, proposal, PARAMS);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.check).toBe("delta");
  });

  it("reports malformed or overflowing declared trades as delta failures", () => {
    const state = flatState();
    const proposal = buildCostProposal(state, MIDPOINTS, [BUY_PUT]);
    const negativeStrike = verifyCostProposal(
      state,
      MIDPOINTS,
      { ...proposal, trades: [{ ...BUY_PUT, strike: -1n }] },
      PARAMS
    );
    expect(negativeStrike).toEqual({
      ok: false,
      check: "delta",
      message: "Declared trades do not apply: Strike must be non-negative",
    });

    const huge = verifyCostProposal(state, MIDPOINTS, { ...proposal, trades: [{ ...BUY_PUT, size: 2n ** 255n }] }, PARAMS);
    expect(huge.ok).toBe(false);
    if (!huge.ok) expect(huge.check).toBe("delta");
  });

  it("places no sign requirement on mixed batches", () => {
    const state = flatState();
    const proposal = buildCostProposal(state, MIDPOINTS, [BUY_PUT, SELL_CALL]);
    expect(verifyCostProposal(state, MIDPOINTS, proposal, PARAMS).ok).toBe(true);

    const lowered = { ...proposal, proposedCost: proposal.proposedCost - 10n ** 15n };
    const result = verifyCostProposal(state, MIDPOINTS, lowered, PARAMS);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.check).toBe("bound");
  });

  it("runs the monotonicity check before the bound check", () => {
    const state = flatState();
    const proposal = buildCostProposal(state, MIDPOINTS, [SELL_CALL]);
    const result = verifyCostProposal(state, MIDPOINTS, { ...proposal, proposedCost: wad(5000) }, PARAMS);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.check).toBe("monotonicity");
  });

  it("throws on midpoints that do not fit the state", () => {
    const state = flatState();
    const proposal = buildCostProposal(state, MIDPOINTS, [BUY_PUT]);
    const err = catchClumError(() => verifyCostProposal(state, MIDPOINTS.slice(1), proposal, PARAMS));
    expect(err.reason).toBe(CLUM_ERROR_REASONS.INVALID_INPUT);
  });
});
