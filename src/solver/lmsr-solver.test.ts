import { describe, it, expect } from "vitest";
import { buildCostProposal, impliedProbabilities, solveCost, worstCaseLoss } from "./lmsr-solver.js";
import { costBounds, utilityLevelOf } from "../engine/cost-function.js";
import { makeRegistry, wad } from "../../test/helpers/clum.js";

const B = wad(1000);
const ZEROS = new Array<bigint>(7).fill(0n);

describe("lmsr solver", () => {
  it("evaluates b * ln(7) to the nearest wei", () => {
    expect(solveCost(ZEROS, B)).toBe(1945910149055313305105n);
    expect(worstCaseLoss(B, 7)).toBe(1945910149055313305105n);
  });

  it("prices a flat book uniformly", () => {
    expect(impliedProbabilities(ZEROS, B)).toEqual(new Array<bigint>(7).fill(142857142857142857n));
  });

  it("lands inside the engine's fixed-point bounds", () => {
    const q = [0n, -wad(300), wad(50), 0n, wad(100), wad(200), wad(1125)];
    const { lower, upper } = costBounds(q, B);
    const cost = solveCost(q, B);
    expect(cost).toBeGreaterThanOrEqual(lower);
    expect(cost).toBeLessThanOrEqual(upper);
  });

  it("builds proposals with the engine's delta rule", () => {
    const utilityLevel = utilityLevelOf(7, B);
    const state = { quantities: ZEROS, cachedCost: utilityLevel, utilityLevel, liquidity: B };
    const proposal = buildCostProposal(state, makeRegistry().getMidpoints(), [
      { type: "CALL", strike: wad(2000), size: wad(2), side: "BUY" },
    ]);
    expect(proposal.newQuantities).toEqual([0n, 0n, 0n, 0n, wad(200), wad(400), wad(2250)]);
    expect(proposal.trades).toHaveLength(1);
    expect(proposal.proposedCost).toBeGreaterThan(utilityLevel);
  });

  it("rejects a non-positive liquidity", () => {
    expect(() => solveCost(ZEROS, 0n)).toThrow(/b must be positive/);
  });
});
