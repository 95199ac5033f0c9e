/**
 * Bucket Registry: discretized price axis keyed to a spot-price source.
 *
 * Layout for N = numRegular + 2 buckets:
 *   0          lower tail    [0, lowerEdge)
 *   1..N-2     regular       [lowerEdge + (i-1)*width, lowerEdge + i*width)
 *   N-1        upper tail    [upperEdge, +inf)
 * Tail midpoints: lowerEdge / 2 below, and the same half-width mirrored above upperEdge.
 */

import { WAD } from "./fixed-point.js";
import { CLUM_ERROR_REASONS, ClumError, invalidInput } from "./errors.js";
import type { BucketBounds, BucketGrid, GridRecenteredPayload, SpotPriceSource } from "../types/clum.js";

/** Largest representable price (2^128 - 1 wei). */
export const MAX_PRICE_WAD = 2n ** 128n - 1n;

function invalidGeometry(message: string): ClumError {
  return new ClumError(CLUM_ERROR_REASONS.INVALID_GEOMETRY, message);
}

export function buildGrid(centerPrice: bigint, bucketWidth: bigint, numRegular: number): BucketGrid {
  if (!Number.isInteger(numRegular) || numRegular < 1) {
    throw invalidGeometry("numRegular must be a positive integer");
  }
  if (bucketWidth <= 0n) throw invalidGeometry("Bucket width must be positive");
  if (centerPrice <= 0n) throw invalidGeometry("Center price must be positive");
  const span = bucketWidth * BigInt(numRegular);
  const lowerEdge = centerPrice - span / 2n;
  if (lowerEdge <= 0n) {
    throw invalidGeometry(`Grid around ${centerPrice} would extend below zero`);
  }
  const upperEdge = lowerEdge + span;
  if (upperEdge + lowerEdge / 2n > MAX_PRICE_WAD) {
    throw invalidGeometry(`Grid around ${centerPrice} exceeds the price range`);
  }
  return { centerPrice, bucketWidth, numRegular, lowerEdge, upperEdge };
}

export function gridBucketCount(grid: BucketGrid): number {
  return grid.numRegular + 2;
}

function assertBucketIndex(grid: BucketGrid, index: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= gridBucketCount(grid)) {
    throw invalidInput(`Bucket index out of range: ${index}`);
  }
}

export function gridBounds(grid: BucketGrid, index: number): BucketBounds {
  assertBucketIndex(grid, index);
  if (index === 0) return { lower: 0n, upper: grid.lowerEdge };
  if (index === grid.numRegular + 1) return { lower: grid.upperEdge, upper: null };
  const lower = grid.lowerEdge + BigInt(index - 1) * grid.bucketWidth;
  return { lower, upper: lower + grid.bucketWidth };
}

export function gridMidpoint(grid: BucketGrid, index: number): bigint {
  assertBucketIndex(grid, index);
  if (index === 0) return grid.lowerEdge / 2n;
  if (index === grid.numRegular + 1) return grid.upperEdge + grid.lowerEdge / 2n;
  return grid.lowerEdge + BigInt(index - 1) * grid.bucketWidth + grid.bucketWidth / 2n;
}

export function gridMidpoints(grid: BucketGrid): bigint[] {
  return Array.from({ length: gridBucketCount(grid) }, (_, i) => gridMidpoint(grid, i));
}

export function gridIndexOf(grid: BucketGrid, price: bigint): number {
  if (price < 0n) throw invalidInput(`Price must be non-negative, got ${price}`);
  if (price < grid.lowerEdge) return 0;
  if (price >= grid.upperEdge) return grid.numRegular + 1;
  return 1 + Number((price - grid.lowerEdge) / grid.bucketWidth);
}

/**
 * Move exposure from oldGrid to newGrid: each old bucket's quantity goes to the new bucket
 * containing the old midpoint. Pure and total; the signed sum is preserved exactly.
 */
export function remapQuantities(
  oldGrid: BucketGrid,
  oldQ: readonly bigint[],
  newGrid: BucketGrid
): bigint[] {
  if (oldQ.length !== gridBucketCount(oldGrid)) {
    throw invalidInput("Quantity vector does not match the grid");
  }
  const newQ = new Array<bigint>(gridBucketCount(newGrid)).fill(0n);
  oldQ.forEach((qi, i) => {
    if (qi === 0n) return;
    const target = gridIndexOf(newGrid, gridMidpoint(oldGrid, i));
    newQ[target] += qi;
  });
  return newQ;
}

export interface BucketRegistryParams {
  centerPrice: bigint;
  bucketWidth: bigint;
  numRegular: number;
  /** Fractional drift from center (WAD, 0.1 = 10%) beyond which the grid is stale. */
  rebalanceThreshold: bigint;
}

export class BucketRegistry {
  private grid: BucketGrid;
  private readonly rebalanceThreshold: bigint;
  private readonly spot: SpotPriceSource;

  constructor(spot: SpotPriceSource, params: BucketRegistryParams) {
    if (params.rebalanceThreshold <= 0n) {
      throw invalidGeometry("Rebalance threshold must be positive");
    }
    this.spot = spot;
    this.rebalanceThreshold = params.rebalanceThreshold;
    this.grid = buildGrid(params.centerPrice, params.bucketWidth, params.numRegular);
  }

  get numBuckets(): number {
    return gridBucketCount(this.grid);
  }

  getGrid(): BucketGrid {
    return { ...this.grid };
  }

  getCenterPrice(): bigint {
    return this.grid.centerPrice;
  }

  getBucketWidth(): bigint {
    return this.grid.bucketWidth;
  }

  getRebalanceThreshold(): bigint {
    return this.rebalanceThreshold;
  }

  getBucketBounds(index: number): BucketBounds {
    return gridBounds(this.grid, index);
  }

  getBucketMidpoint(index: number): bigint {
    return gridMidpoint(this.grid, index);
  }

  getMidpoints(): bigint[] {
    return gridMidpoints(this.grid);
  }

  getBucketIndex(price: bigint): number {
    return gridIndexOf(this.grid, price);
  }

  getSpotPrice(): bigint {
    return this.spot.getSpotPrice();
  }

  isOracleFresh(): boolean {
    return this.spot.isOracleFresh();
  }

  /** True when spot has drifted more than rebalanceThreshold (as a fraction) from center. */
  needsRebalance(): boolean {
    const spot = this.spot.getSpotPrice();
    const center = this.grid.centerPrice;
    const drift = spot > center ? spot - center : center - spot;
    return drift * WAD > this.rebalanceThreshold * center;
  }

  /**
   * Re-anchor the grid on newCenter, width and count unchanged. Quantities are not touched
   * here: go through ClumEngine.recenter so exposure is remapped in the same commit.
   */
  recenter(newCenter: bigint): GridRecenteredPayload {
    const next = buildGrid(newCenter, this.grid.bucketWidth, this.grid.numRegular);
    const oldCenter = this.grid.centerPrice;
    this.grid = next;
    return { oldCenter, newCenter };
  }
}
