/**
 * Static no-arbitrage checks across strikes: butterfly convexity of call prices and
 * put-call parity at zero rates.
 */

import { WAD, divWad, mulWad } from "./fixed-point.js";
import { probabilitiesOf } from "./cost-function.js";
import { invalidInput } from "./errors.js";
import { applyDelta, buildTradeDelta, expectedPayoff } from "./trade-delta.js";
import type { BucketRegistry } from "./bucket-registry.js";
import type { ClumEngine } from "./clum-engine.js";
import type { TradeIntent } from "../types/clum.js";

/** Each ladder price and the chord are floored separately. */
const LADDER_SLACK = 4n;

export interface StrikePrice {
  strike: bigint;
  price: bigint;
}

export interface ArbitrageBounds {
  callBids: bigint[];
  callAsks: bigint[];
  putBids: bigint[];
  putAsks: bigint[];
}

/** For k1 < k2 < k3: c2 <= lambda * c1 + (1 - lambda) * c3 with lambda = (k3 - k2) / (k3 - k1). */
export function checkConvexity(low: StrikePrice, mid: StrikePrice, high: StrikePrice, slack = 0n): boolean {
  if (!(low.strike < mid.strike && mid.strike < high.strike)) {
    throw invalidInput("Strikes must be strictly increasing");
  }
  const lambda = divWad(high.strike - mid.strike, high.strike - low.strike);
  const interpolated = mulWad(lambda, low.price) + mulWad(WAD - lambda, high.price);
  return mid.price <= interpolated + slack;
}

/**
 * Tighten quoted prices on a sorted strike ladder: call asks are capped by the chord of their
 * neighbours, put bids are raised to what parity with the call implies.
 */
export function computeArbitrageBounds(
  strikes: readonly bigint[],
  callPrices: readonly bigint[],
  putPrices: readonly bigint[],
  spot: bigint
): ArbitrageBounds {
  const n = strikes.length;
  if (callPrices.length !== n || putPrices.length !== n) {
    throw invalidInput("Strike and price ladders must have equal length");
  }
  for (let j = 1; j < n; j++) {
    if (strikes[j] <= strikes[j - 1]) throw invalidInput("Strikes must be strictly increasing");
  }

  const callAsks = [...callPrices];
  for (let j = 1; j < n - 1; j++) {
    const lambda = divWad(strikes[j + 1] - strikes[j], strikes[j + 1] - strikes[j - 1]);
    const interpolated = mulWad(lambda, callPrices[j - 1]) + mulWad(WAD - lambda, callPrices[j + 1]);
    if (callAsks[j] > interpolated) callAsks[j] = interpolated;
  }

  const putBids = [...putPrices];
  strikes.forEach((strike, j) => {
    const parity = spot > strike ? spot - strike : 0n;
    const impliedPut = callPrices[j] > parity ? callPrices[j] - parity : 0n;
    if (putBids[j] < impliedPut) putBids[j] = impliedPut;
  });

  return { callBids: [...callPrices], callAsks, putBids, putAsks: [...putPrices] };
}

export class ArbitrageGuard {
  constructor(
    private readonly engine: ClumEngine,
    private readonly registry: BucketRegistry
  ) {}

  /**
   * Price calls at strike - width, strike and strike + width as if the trade had executed;
   * the trade passes when that ladder stays convex and non-increasing.
   */
  validateTrade(intent: TradeIntent): boolean {
    const midpoints = this.registry.getMidpoints();
    const after = applyDelta(this.engine.snapshot().quantities, buildTradeDelta(midpoints, intent));
    const probabilities = probabilitiesOf(after, this.engine.getLiquidity());

    const width = this.registry.getBucketWidth();
    const lowStrike = intent.strike > width ? intent.strike - width : 0n;
    const highStrike = intent.strike + width;
    if (lowStrike === intent.strike) return true;

    const ladder = [lowStrike, intent.strike, highStrike].map((strike) => ({
      strike,
      price: expectedPayoff(midpoints, probabilities, "CALL", strike),
    }));
    const [low, mid, high] = ladder;
    if (low.price < mid.price || mid.price < high.price) return false;
    return checkConvexity(low, mid, high, LADDER_SLACK);
  }
}
