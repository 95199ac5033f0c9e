import { formatUsdc, formatWad } from "./wad.js";
import { gridBounds, gridMidpoint, gridBucketCount } from "../engine/bucket-registry.js";
import { CLUM_EVENT_NAMES } from "../types/clum.js";
import type {
  BucketGrid,
  ClumEvent,
  ClumStateSnapshot,
  ImpliedDistribution,
  TradeQuote,
  TradeRecord,
} from "../types/clum.js";
import type { ClumWsMessage, TradeExecutedWsPayload } from "../types/websocket-events.js";
import type { FundingParams } from "../engine/funding-deriver.js";

export function serializeGrid(grid: BucketGrid, spotPrice: bigint, needsRebalance: boolean) {
  return {
    centerPrice: formatWad(grid.centerPrice),
    bucketWidth: formatWad(grid.bucketWidth),
    numBuckets: gridBucketCount(grid),
    spotPrice: formatWad(spotPrice),
    needsRebalance,
    buckets: Array.from({ length: gridBucketCount(grid) }, (_, index) => {
      const { lower, upper } = gridBounds(grid, index);
      return {
        index,
        lower: formatWad(lower),
        upper: upper === null ? null : formatWad(upper),
        midpoint: formatWad(gridMidpoint(grid, index)),
      };
    }),
  };
}

export function serializeSnapshot(state: ClumStateSnapshot) {
  return {
    quantities: state.quantities.map(formatWad),
    cachedCost: formatWad(state.cachedCost),
    utilityLevel: formatWad(state.utilityLevel),
    liquidity: formatWad(state.liquidity),
  };
}

export function serializeDistribution(dist: ImpliedDistribution) {
  return {
    midpoints: dist.midpoints.map(formatWad),
    probabilities: dist.probabilities.map(formatWad),
  };
}

export function serializeQuote(quote: TradeQuote) {
  return {
    type: quote.type,
    strike: formatWad(quote.strike),
    size: formatWad(quote.size),
    side: quote.side,
    cost: formatWad(quote.cost),
    delta: quote.delta.map(formatWad),
  };
}

export function serializeTradeRecord(record: TradeRecord): TradeExecutedWsPayload {
  return {
    type: record.type,
    strike: formatWad(record.strike),
    size: formatWad(record.size),
    side: record.side,
    cost: formatWad(record.cost),
    cachedCost: formatWad(record.cachedCost),
    executedAt: new Date(record.executedAt).toISOString(),
  };
}

export function serializeFundingParams(params: FundingParams) {
  return {
    premiumFactor: formatWad(params.premiumFactor),
    fundingPeriodSeconds: params.fundingPeriodSeconds.toString(),
    maxFundingRatePerSecond: formatUsdc(params.maxFundingRatePerSecond),
  };
}

export function serializeClumEvent(event: ClumEvent): ClumWsMessage {
  switch (event.type) {
    case CLUM_EVENT_NAMES.GRID_RECENTERED:
      return {
        type: event.type,
        payload: {
          oldCenter: formatWad(event.payload.oldCenter),
          newCenter: formatWad(event.payload.newCenter),
        },
      };
    case CLUM_EVENT_NAMES.TRADE_EXECUTED:
      return { type: event.type, payload: serializeTradeRecord(event.payload) };
    case CLUM_EVENT_NAMES.COST_UPDATED:
      return {
        type: event.type,
        payload: {
          oldCost: formatWad(event.payload.oldCost),
          newCost: formatWad(event.payload.newCost),
        },
      };
  }
}
