import { ArbitrageGuard, BucketRegistry, ClumEngine, FundingDeriver } from "../engine/index.js";
import { ManualSpotPriceSource } from "./spot-price.service.js";
import type { ClumParams } from "../schemas/params.schema.js";

/** Everything a server instance needs, wired spot -> registry -> engine -> funding. */
export interface ClumContext {
  params: ClumParams;
  spot: ManualSpotPriceSource;
  registry: BucketRegistry;
  engine: ClumEngine;
  funding: FundingDeriver;
  guard: ArbitrageGuard;
}

export function createClumContext(
  params: ClumParams,
  spot: ManualSpotPriceSource = new ManualSpotPriceSource(params.initialSpotPrice, params.oracleStalenessSeconds)
): ClumContext {
  const registry = new BucketRegistry(spot, {
    centerPrice: params.bucketCenterPrice,
    bucketWidth: params.bucketWidth,
    numRegular: params.numRegularBuckets,
    rebalanceThreshold: params.rebalanceThreshold,
  });
  const engine = new ClumEngine(registry, {
    liquidity: params.liquidityB,
    positionManager: params.positionManagerId,
    maxBucketExposure: params.maxBucketExposure,
    maxWorstCaseLoss: params.maxWorstCaseLoss,
    costTolerance: params.costTolerance,
    simplexTolerance: params.simplexTolerance,
    maxBatchTrades: params.maxBatchTrades,
    autoRecenter: params.autoRecenter,
  });
  const funding = new FundingDeriver(engine, registry, {
    premiumFactor: params.premiumFactor,
    fundingPeriodSeconds: BigInt(params.fundingPeriodSeconds),
    maxFundingRatePerSecond: params.maxFundingRatePerSecond,
  });
  const guard = new ArbitrageGuard(engine, registry);
  return { params, spot, registry, engine, funding, guard };
}
