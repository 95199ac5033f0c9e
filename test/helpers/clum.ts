import { WAD } from "../../src/engine/fixed-point.js";
import { BucketRegistry } from "../../src/engine/bucket-registry.js";
import { ClumEngine, type ClumEngineParams } from "../../src/engine/clum-engine.js";
import { isClumError, type ClumError } from "../../src/engine/errors.js";
import type { SpotPriceSource } from "../../src/types/clum.js";

export const POSITION_MANAGER = "position-manager";

export const wad = (n: number | bigint): bigint => BigInt(n) * WAD;

export interface StubSpot extends SpotPriceSource {
  price: bigint;
  fresh: boolean;
}

export function stubSpot(price: bigint = wad(2000)): StubSpot {
  return {
    price,
    fresh: true,
    getSpotPrice() {
      return this.price;
    },
    isOracleFresh() {
      return this.fresh;
    },
  };
}

/** 5 regular buckets of width 100 around 2000 (7 buckets with tails), threshold 10%. */
export function makeRegistry(spot: SpotPriceSource = stubSpot()): BucketRegistry {
  return new BucketRegistry(spot, {
    centerPrice: wad(2000),
    bucketWidth: wad(100),
    numRegular: 5,
    rebalanceThreshold: WAD / 10n,
  });
}

export function makeEngine(
  overrides: Partial<ClumEngineParams> = {},
  registry: BucketRegistry = makeRegistry()
): ClumEngine {
  return new ClumEngine(registry, {
    liquidity: wad(1000),
    positionManager: POSITION_MANAGER,
    maxBucketExposure: wad(100_000),
    costTolerance: 10n ** 9n,
    simplexTolerance: 10n ** 6n,
    maxBatchTrades: 8,
    autoRecenter: false,
    ...overrides,
  });
}

/** Runs fn and returns the ClumError it throws; fails on any other outcome. */
export function catchClumError(fn: () => unknown): ClumError {
  try {
    fn();
  } catch (err) {
    if (isClumError(err)) return err;
    throw err;
  }
  throw new Error("Expected a ClumError to be thrown");
}
