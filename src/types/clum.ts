/**
 * CLUM (cost-function market maker over price buckets) types.
 * Every price, quantity, cost and probability is a WAD fixed-point bigint (18 decimals);
 * funding amounts are USDC fixed-point bigints (6 decimals).
 */

export type OptionType = "CALL" | "PUT";

export type TradeSide = "BUY" | "SELL";

/** Half-open price interval [lower, upper). `upper` is null for the upper tail bucket. */
export interface BucketBounds {
  lower: bigint;
  upper: bigint | null;
}

/** Geometry of one grid: center, width and number of regular (non-tail) buckets. */
export interface BucketGrid {
  centerPrice: bigint;
  bucketWidth: bigint;
  numRegular: number;
  /** Lower bound of the first regular bucket. */
  lowerEdge: bigint;
  /** Upper bound of the last regular bucket. */
  upperEdge: bigint;
}

/** Latest underlying price. Freshness is the source's concern, not the pricing core's. */
export interface SpotPriceSource {
  getSpotPrice(): bigint;
  isOracleFresh(): boolean;
}

/** A trade the engine can price: one option leg of a given size. */
export interface TradeIntent {
  type: OptionType;
  strike: bigint;
  size: bigint;
  side: TradeSide;
}

export interface TradeRecord extends TradeIntent {
  /** Premium paid by the trader for BUY, revenue paid out for SELL. */
  cost: bigint;
  /** Cached cost after the trade committed. */
  cachedCost: bigint;
  executedAt: number;
}

export interface TradeQuote extends TradeIntent {
  cost: bigint;
  /** Quantity change per bucket the trade would apply. */
  delta: bigint[];
}

/** Read-only copy of the engine's committed pricing state. */
export interface ClumStateSnapshot {
  quantities: bigint[];
  cachedCost: bigint;
  utilityLevel: bigint;
  liquidity: bigint;
}

/** Untrusted submission from the off-path solver. */
export interface CostProposal {
  proposedCost: bigint;
  newQuantities: bigint[];
  /** Declared trades this submission settles (empty = re-verify current quantities). */
  trades: TradeIntent[];
}

export interface ImpliedDistribution {
  midpoints: bigint[];
  probabilities: bigint[];
}

export const CLUM_EVENT_NAMES = {
  GRID_RECENTERED: "GRID_RECENTERED",
  TRADE_EXECUTED: "TRADE_EXECUTED",
  COST_UPDATED: "COST_UPDATED",
} as const;

export type ClumEventName = (typeof CLUM_EVENT_NAMES)[keyof typeof CLUM_EVENT_NAMES];

export interface GridRecenteredPayload {
  oldCenter: bigint;
  newCenter: bigint;
}

export interface CostUpdatedPayload {
  oldCost: bigint;
  newCost: bigint;
}

export type ClumEventPayloadMap = {
  [CLUM_EVENT_NAMES.GRID_RECENTERED]: GridRecenteredPayload;
  [CLUM_EVENT_NAMES.TRADE_EXECUTED]: TradeRecord;
  [CLUM_EVENT_NAMES.COST_UPDATED]: CostUpdatedPayload;
};

export type ClumEvent = {
  [K in ClumEventName]: { type: K; payload: ClumEventPayloadMap[K] };
}[ClumEventName];

export type ClumEventListener = (event: ClumEvent) => void;
