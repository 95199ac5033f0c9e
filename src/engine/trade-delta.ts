import { WAD, assertInt256 } from "./fixed-point.js";
import { invalidInput } from "./errors.js";
import type { OptionType, TradeIntent } from "../types/clum.js";

export function assertOptionType(type: string): asserts type is OptionType {
  if (type !== "CALL" && type !== "PUT") {
    throw invalidInput(`Unknown option type: ${type}`);
  }
}

export function assertTradeIntent(intent: TradeIntent): void {
  assertOptionType(intent.type);
  if (intent.side !== "BUY" && intent.side !== "SELL") {
    throw invalidInput(`Unknown trade side: ${String(intent.side)}`);
  }
  if (intent.size <= 0n) throw invalidInput("Trade size must be positive");
  if (intent.strike < 0n) throw invalidInput("Strike must be non-negative");
}

/** CALL pays max(price - strike, 0), PUT pays max(strike - price, 0). */
export function optionPayoff(type: OptionType, price: bigint, strike: bigint): bigint {
  if (type === "CALL") return price > strike ? price - strike : 0n;
  return strike > price ? strike - price : 0n;
}

/**
 * Quantity change per bucket for one option leg: kappa_i = payoff(midpoint_i) * size,
 * added for a BUY and subtracted for a SELL.
 */
export function buildTradeDelta(midpoints: readonly bigint[], intent: TradeIntent): bigint[] {
  assertTradeIntent(intent);
  return midpoints.map((mid, i) => {
    const payoff = optionPayoff(intent.type, mid, intent.strike);
    if (payoff === 0n) return 0n;
    const kappa = assertInt256((payoff * intent.size) / WAD, `delta[${i}]`);
    return intent.side === "BUY" ? kappa : -kappa;
  });
}

export function applyDelta(q: readonly bigint[], delta: readonly bigint[]): bigint[] {
  if (q.length !== delta.length) throw invalidInput("LMSR: length mismatch");
  return q.map((qi, i) => assertInt256(qi + delta[i], `q[${i}]`));
}

export function isZeroDelta(delta: readonly bigint[]): boolean {
  return delta.every((d) => d === 0n);
}

/** Expected payoff of one unit under a bucket distribution: sum_i p_i * payoff(mid_i). */
export function expectedPayoff(
  midpoints: readonly bigint[],
  probabilities: readonly bigint[],
  type: OptionType,
  strike: bigint
): bigint {
  if (midpoints.length !== probabilities.length) throw invalidInput("LMSR: length mismatch");
  let total = 0n;
  midpoints.forEach((mid, i) => {
    total += probabilities[i] * optionPayoff(type, mid, strike);
  });
  return total / WAD;
}
