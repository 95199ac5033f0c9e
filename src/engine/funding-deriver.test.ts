import { describe, it, expect } from "vitest";
import { WAD } from "./fixed-point.js";
import { FundingDeriver, type FundingParams } from "./funding-deriver.js";
import { CLUM_ERROR_REASONS } from "./errors.js";
import { POSITION_MANAGER, catchClumError, makeEngine, makeRegistry, stubSpot, wad } from "../../test/helpers/clum.js";

const PARAMS: FundingParams = {
  premiumFactor: WAD,
  fundingPeriodSeconds: 86_400n,
  maxFundingRatePerSecond: 10_000n,
};

// Uniform 1/7 over payoffs summing to 1425 at strike 2000, either side.
const ATM_MARK = 203571428571428571225n;

function setup(params: Partial<FundingParams> = {}, spotPrice = wad(2000)) {
  const spot = stubSpot(spotPrice);
  const registry = makeRegistry(spot);
  const engine = makeEngine({}, registry);
  return { spot, engine, deriver: new FundingDeriver(engine, registry, { ...PARAMS, ...params }) };
}

describe("FundingDeriver", () => {
  it("marks options at their expected payoff under the implied distribution", () => {
    const { deriver } = setup();
    expect(deriver.getMarkPrice("CALL", wad(2000))).toBe(ATM_MARK);
    expect(deriver.getMarkPrice("PUT", wad(2000))).toBe(ATM_MARK);
    expect(deriver.getMarkPrice("CALL", wad(5000))).toBe(0n);
  });

  it("takes intrinsic value from spot", () => {
    const { deriver } = setup({}, wad(2100));
    expect(deriver.getIntrinsicValue("CALL", wad(2000))).toBe(wad(100));
    expect(deriver.getIntrinsicValue("PUT", wad(2000))).toBe(0n);
    expect(deriver.getTimeValue("CALL", wad(2000))).toBe(ATM_MARK - wad(100));
  });

  it("charges time value over the period in USDC units per second", () => {
    const { deriver } = setup();
    // 203.571... / 86400 = 0.002356... USDC per second per unit.
    expect(deriver.getFundingPerSecond("CALL", wad(2000), WAD)).toBe(2356n);
    expect(deriver.getFundingPerSecond("CALL", wad(2000), 2n * WAD)).toBe(4712n);
  });

  it("caps the per-unit rate", () => {
    const { deriver } = setup({ maxFundingRatePerSecond: 1n });
    expect(deriver.getFundingPerSecond("PUT", wad(2000), WAD)).toBe(1n);
  });

  it("keeps sub-unit per-unit rates for large positions", () => {
    const { deriver } = setup({ premiumFactor: WAD / 10_000n });
    // 0.000235615079365 USDC per second per unit, times 1000 units.
    expect(deriver.getFundingPerSecond("CALL", wad(2000), WAD)).toBe(0n);
    expect(deriver.getFundingPerSecond("CALL", wad(2000), wad(1000))).toBe(235n);
  });

  it("scales the rate cap with position size", () => {
    const { deriver } = setup({ maxFundingRatePerSecond: 1n });
    expect(deriver.getFundingPerSecond("CALL", wad(2000), wad(1000))).toBe(1000n);
  });

  it("charges nothing without positive time value", () => {
    const { deriver } = setup();
    expect(deriver.getFundingPerSecond("CALL", wad(5000), WAD)).toBe(0n);
  });

  it("follows the distribution as trades land", () => {
    const { engine, deriver } = setup();
    engine.executeBuy(POSITION_MANAGER, "CALL", wad(2000), WAD);
    expect(deriver.getMarkPrice("CALL", wad(2000))).toBeGreaterThan(ATM_MARK);
  });

  it("rejects bad sizes and parameters", () => {
    const { deriver } = setup();
    expect(catchClumError(() => deriver.getFundingPerSecond("CALL", wad(2000), 0n)).reason).toBe(
      CLUM_ERROR_REASONS.INVALID_INPUT
    );
    expect(catchClumError(() => setup({ fundingPeriodSeconds: 0n })).reason).toBe(CLUM_ERROR_REASONS.INVALID_INPUT);
  });

  it("reports oracle freshness from the registry", () => {
    const { spot, deriver } = setup();
    expect(deriver.isOracleFresh()).toBe(true);
    spot.fresh = false;
    expect(deriver.isOracleFresh()).toBe(false);
  });
});
