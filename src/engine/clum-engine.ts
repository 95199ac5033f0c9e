/**
 * CLUM engine: owns the quantity vector and cached cost over the registry's buckets.
 *
 * Three commit points mutate state: executeTrade, verifyAndSetCost and recenter. Each one
 * builds the complete candidate (grid, q, cost) first and only then assigns, so a thrown
 * error always leaves the engine as it was.
 */

import { costBounds, costOf, probabilitiesOf, solvencyBreach, utilityLevelOf } from "./cost-function.js";
import { applyDelta, assertTradeIntent, buildTradeDelta, isZeroDelta } from "./trade-delta.js";
import { buildGrid, gridMidpoints, remapQuantities } from "./bucket-registry.js";
import type { BucketRegistry } from "./bucket-registry.js";
import { verifyCostProposal } from "./cost-verifier.js";
import { CLUM_ERROR_REASONS, ClumError, invalidInput } from "./errors.js";
import {
  CLUM_EVENT_NAMES,
  type BucketGrid,
  type ClumEvent,
  type ClumEventListener,
  type ClumStateSnapshot,
  type CostProposal,
  type GridRecenteredPayload,
  type ImpliedDistribution,
  type OptionType,
  type TradeIntent,
  type TradeQuote,
  type TradeRecord,
  type TradeSide,
} from "../types/clum.js";

export interface ClumEngineParams {
  /** LMSR liquidity depth b, WAD. */
  liquidity: bigint;
  /** Identity allowed to execute trades, submit costs and recenter. */
  positionManager: string;
  /** Cap on |q_i| for every bucket, WAD. */
  maxBucketExposure: bigint;
  /**
   * Cap on max_i q_i - (C(q) - U), WAD. Defaults to U, the LMSR loss bound, which no state
   * can exceed: set it below U for the check to bind.
   */
  maxWorstCaseLoss?: bigint;
  costTolerance: bigint;
  simplexTolerance: bigint;
  maxBatchTrades: number;
  /** Recenter on spot before a trade when the registry reports drift. */
  autoRecenter: boolean;
}

interface PricedTrade {
  grid: BucketGrid;
  recentered: GridRecenteredPayload | null;
  delta: bigint[];
  quantities: bigint[];
  cost: bigint;
}

export class ClumEngine {
  private readonly registry: BucketRegistry;
  private readonly params: ClumEngineParams;
  private readonly utilityLevel: bigint;
  private readonly maxWorstCaseLoss: bigint;
  private readonly listeners = new Set<ClumEventListener>();
  private quantities: bigint[];
  private cachedCost: bigint;

  constructor(registry: BucketRegistry, params: ClumEngineParams) {
    if (params.liquidity <= 0n) throw invalidInput("Liquidity b must be positive");
    if (!params.positionManager) throw invalidInput("Position manager identity is required");
    if (params.maxBucketExposure <= 0n) throw invalidInput("maxBucketExposure must be positive");
    if (!Number.isInteger(params.maxBatchTrades) || params.maxBatchTrades < 1) {
      throw invalidInput("maxBatchTrades must be a positive integer");
    }
    if (params.costTolerance < 0n || params.simplexTolerance < 0n) {
      throw invalidInput("Tolerances must be non-negative");
    }
    this.registry = registry;
    this.params = params;
    this.utilityLevel = utilityLevelOf(registry.numBuckets, params.liquidity);
    this.maxWorstCaseLoss = params.maxWorstCaseLoss ?? this.utilityLevel;
    this.quantities = new Array<bigint>(registry.numBuckets).fill(0n);
    this.cachedCost = this.utilityLevel;
  }

  getNumBuckets(): number {
    return this.quantities.length;
  }

  getQuantity(index: number): bigint {
    if (!Number.isInteger(index) || index < 0 || index >= this.quantities.length) {
      throw invalidInput(`Bucket index out of range: ${index}`);
    }
    return this.quantities[index];
  }

  getCachedCost(): bigint {
    return this.cachedCost;
  }

  getUtilityLevel(): bigint {
    return this.utilityLevel;
  }

  getLiquidity(): bigint {
    return this.params.liquidity;
  }

  getPositionManager(): string {
    return this.params.positionManager;
  }

  snapshot(): ClumStateSnapshot {
    return {
      quantities: [...this.quantities],
      cachedCost: this.cachedCost,
      utilityLevel: this.utilityLevel,
      liquidity: this.params.liquidity,
    };
  }

  getRiskNeutralPrices(): bigint[] {
    return probabilitiesOf(this.quantities, this.params.liquidity);
  }

  getImpliedDistribution(): ImpliedDistribution {
    return { midpoints: this.registry.getMidpoints(), probabilities: this.getRiskNeutralPrices() };
  }

  quoteBuy(type: OptionType, strike: bigint, size: bigint): TradeQuote {
    return this.quote({ type, strike, size, side: "BUY" });
  }

  quoteSell(type: OptionType, strike: bigint, size: bigint): TradeQuote {
    return this.quote({ type, strike, size, side: "SELL" });
  }

  quote(intent: TradeIntent): TradeQuote {
    const priced = this.priceTrade(this.registry.getGrid(), this.quantities, intent);
    return { ...intent, cost: priced.cost, delta: priced.delta };
  }

  executeBuy(caller: string, type: OptionType, strike: bigint, size: bigint): TradeRecord {
    return this.executeTrade(caller, { type, strike, size, side: "BUY" });
  }

  executeSell(caller: string, type: OptionType, strike: bigint, size: bigint): TradeRecord {
    return this.executeTrade(caller, { type, strike, size, side: "SELL" });
  }

  executeTrade(caller: string, intent: TradeIntent): TradeRecord {
    this.assertPositionManager(caller);
    assertTradeIntent(intent);

    let grid = this.registry.getGrid();
    let base = this.quantities;
    let recentered: GridRecenteredPayload | null = null;
    if (this.params.autoRecenter && this.registry.needsRebalance()) {
      const next = buildGrid(this.registry.getSpotPrice(), grid.bucketWidth, grid.numRegular);
      base = remapQuantities(grid, base, next);
      recentered = { oldCenter: grid.centerPrice, newCenter: next.centerPrice };
      grid = next;
    }

    const priced = { ...this.priceTrade(grid, base, intent), recentered };
    const newCost = costOf(priced.quantities, this.params.liquidity);
    this.assertSolvent(priced.quantities, newCost);

    this.commit(priced, newCost);
    const record: TradeRecord = {
      ...intent,
      cost: priced.cost,
      cachedCost: newCost,
      executedAt: Date.now(),
    };
    if (recentered) this.emit({ type: CLUM_EVENT_NAMES.GRID_RECENTERED, payload: recentered });
    this.emit({ type: CLUM_EVENT_NAMES.TRADE_EXECUTED, payload: record });
    return record;
  }

  /**
   * Re-anchor the grid on newCenter: exposure is remapped by midpoint and the cached cost
   * recomputed, all in one commit.
   */
  recenter(caller: string, newCenter: bigint): GridRecenteredPayload {
    this.assertPositionManager(caller);
    return this.applyRecenter(newCenter);
  }

  /** Recenter on spot when the registry reports drift. Returns null when nothing moved. */
  rebalance(): GridRecenteredPayload | null {
    if (!this.registry.needsRebalance()) return null;
    return this.applyRecenter(this.registry.getSpotPrice());
  }

  verifyAndSetCost(caller: string, proposal: CostProposal): ClumStateSnapshot {
    this.assertPositionManager(caller);
    const result = verifyCostProposal(this.snapshot(), this.registry.getMidpoints(), proposal, {
      costTolerance: this.params.costTolerance,
      simplexTolerance: this.params.simplexTolerance,
      maxBatchTrades: this.params.maxBatchTrades,
    });
    if (!result.ok) {
      throw new ClumError(CLUM_ERROR_REASONS.VERIFICATION_FAILED, result.message, result.check);
    }
    this.assertSolvent(result.quantities, result.cachedCost);
    const oldCost = this.cachedCost;
    this.quantities = result.quantities;
    this.cachedCost = result.cachedCost;
    this.emit({ type: CLUM_EVENT_NAMES.COST_UPDATED, payload: { oldCost, newCost: result.cachedCost } });
    return this.snapshot();
  }

  /** Returns an unsubscribe function. */
  subscribe(listener: ClumEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private applyRecenter(newCenter: bigint): GridRecenteredPayload {
    const grid = this.registry.getGrid();
    const next = buildGrid(newCenter, grid.bucketWidth, grid.numRegular);
    const quantities = remapQuantities(grid, this.quantities, next);
    const newCost = costOf(quantities, this.params.liquidity);

    const oldCost = this.cachedCost;
    const payload = this.registry.recenter(newCenter);
    this.quantities = quantities;
    this.cachedCost = newCost;
    this.emit({ type: CLUM_EVENT_NAMES.GRID_RECENTERED, payload });
    this.emit({ type: CLUM_EVENT_NAMES.COST_UPDATED, payload: { oldCost, newCost } });
    return payload;
  }

  /**
   * Quote against (grid, q) rounding in the pool's favour: a buy pays upper(C(q+k)) - lower(C(q)),
   * a sell receives lower(C(q)) - upper(C(q-k)), floored at zero.
   */
  private priceTrade(grid: BucketGrid, q: readonly bigint[], intent: TradeIntent): Omit<PricedTrade, "recentered"> {
    const delta = buildTradeDelta(gridMidpoints(grid), intent);
    const quantities = applyDelta(q, delta);
    if (isZeroDelta(delta)) return { grid, delta, quantities, cost: 0n };

    const b = this.params.liquidity;
    const before = costBounds(q, b);
    const after = costBounds(quantities, b);
    const cost = sideCost(intent.side, before.lower, before.upper, after.lower, after.upper);
    return { grid, delta, quantities, cost };
  }

  private assertSolvent(quantities: readonly bigint[], cost: bigint): void {
    const breach = solvencyBreach(quantities, cost, this.utilityLevel, {
      maxBucketExposure: this.params.maxBucketExposure,
      maxWorstCaseLoss: this.maxWorstCaseLoss,
    });
    if (breach !== null) throw new ClumError(CLUM_ERROR_REASONS.SOLVENCY_VIOLATION, breach);
  }

  private commit(priced: PricedTrade, newCost: bigint): void {
    if (priced.recentered) this.registry.recenter(priced.grid.centerPrice);
    this.quantities = priced.quantities;
    this.cachedCost = newCost;
  }

  private assertPositionManager(caller: string): void {
    if (caller !== this.params.positionManager) {
      throw new ClumError(CLUM_ERROR_REASONS.UNAUTHORIZED_CALLER, `Caller ${caller} is not the position manager`);
    }
  }

  private emit(event: ClumEvent): void {
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.error("[clum-engine] listener failed:", event.type, err);
      }
    }
  }
}

function sideCost(
  side: TradeSide,
  beforeLower: bigint,
  beforeUpper: bigint,
  afterLower: bigint,
  afterUpper: bigint
): bigint {
  if (side === "BUY") return afterUpper - beforeLower;
  const revenue = beforeLower - afterUpper;
  return revenue > 0n ? revenue : 0n;
}
