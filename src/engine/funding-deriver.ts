/**
 * Funding Deriver: projects the engine's implied distribution onto per-strike mark prices
 * and a per-second funding charge. Holds no state of its own.
 *
 *   mark      = sum_i p_i * payoff(mid_i, K)
 *   intrinsic = payoff(spot, K)
 *   funding/s = clamp((mark - intrinsic) * premiumFactor / period, 0, maxRate) * size
 * Size is applied in WAD; the result is truncated to USDC units once, at the end.
 */

import { WAD } from "./fixed-point.js";
import { invalidInput } from "./errors.js";
import { assertOptionType, expectedPayoff, optionPayoff } from "./trade-delta.js";
import type { BucketRegistry } from "./bucket-registry.js";
import type { ClumEngine } from "./clum-engine.js";
import type { OptionType } from "../types/clum.js";

/** WAD (18 decimals) to USDC (6 decimals). */
const WAD_PER_USDC = 10n ** 12n;

export interface FundingParams {
  /** Scales time value into funding, WAD (1.0 = full time value per period). */
  premiumFactor: bigint;
  fundingPeriodSeconds: bigint;
  /** Per unit size, USDC raw units per second. */
  maxFundingRatePerSecond: bigint;
}

export class FundingDeriver {
  private readonly engine: ClumEngine;
  private readonly registry: BucketRegistry;
  private readonly params: FundingParams;

  constructor(engine: ClumEngine, registry: BucketRegistry, params: FundingParams) {
    if (params.premiumFactor < 0n) throw invalidInput("premiumFactor must be non-negative");
    if (params.fundingPeriodSeconds <= 0n) throw invalidInput("fundingPeriodSeconds must be positive");
    if (params.maxFundingRatePerSecond < 0n) throw invalidInput("maxFundingRatePerSecond must be non-negative");
    this.engine = engine;
    this.registry = registry;
    this.params = params;
  }

  getParams(): FundingParams {
    return { ...this.params };
  }

  getMarkPrice(type: OptionType, strike: bigint): bigint {
    assertOptionType(type);
    if (strike < 0n) throw invalidInput("Strike must be non-negative");
    const { midpoints, probabilities } = this.engine.getImpliedDistribution();
    return expectedPayoff(midpoints, probabilities, type, strike);
  }

  getIntrinsicValue(type: OptionType, strike: bigint): bigint {
    assertOptionType(type);
    if (strike < 0n) throw invalidInput("Strike must be non-negative");
    return optionPayoff(type, this.registry.getSpotPrice(), strike);
  }

  /** mark - intrinsic; can be negative when the distribution lags spot. */
  getTimeValue(type: OptionType, strike: bigint): bigint {
    return this.getMarkPrice(type, strike) - this.getIntrinsicValue(type, strike);
  }

  /** USDC raw units per second for a position of `size` (WAD). */
  getFundingPerSecond(type: OptionType, strike: bigint, size: bigint): bigint {
    if (size <= 0n) throw invalidInput("Position size must be positive");
    const timeValue = this.getTimeValue(type, strike);
    if (timeValue <= 0n) return 0n;
    const rateWad = (timeValue * this.params.premiumFactor) / WAD / this.params.fundingPeriodSeconds;
    // Scale by size before dropping to USDC precision.
    const funding = (rateWad * size) / WAD / WAD_PER_USDC;
    const cap = (this.params.maxFundingRatePerSecond * size) / WAD;
    return funding > cap ? cap : funding;
  }

  isOracleFresh(): boolean {
    return this.registry.isOracleFresh();
  }
}
