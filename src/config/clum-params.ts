import { config, type AppConfig } from "./index.js";
import { clumParamsSchema, type ClumParams } from "../schemas/params.schema.js";

/** Validated engine parameters from the environment. Throws listing every bad variable. */
export function loadClumParams(cfg: AppConfig = config): ClumParams {
  const parsed = clumParamsSchema.safeParse({
    positionManagerId: cfg.positionManagerId,
    initialSpotPrice: cfg.initialSpotPrice,
    oracleStalenessSeconds: cfg.oracleStalenessSeconds,
    bucketCenterPrice: cfg.bucketCenterPrice,
    bucketWidth: cfg.bucketWidth,
    numRegularBuckets: cfg.numRegularBuckets,
    rebalanceThreshold: cfg.rebalanceThreshold,
    liquidityB: cfg.liquidityB,
    maxBucketExposure: cfg.maxBucketExposure,
    maxWorstCaseLoss: cfg.maxWorstCaseLoss,
    costTolerance: cfg.costTolerance,
    simplexTolerance: cfg.simplexTolerance,
    maxBatchTrades: cfg.maxBatchTrades,
    autoRecenter: cfg.autoRecenter,
    premiumFactor: cfg.premiumFactor,
    fundingPeriodSeconds: cfg.fundingPeriodSeconds,
    maxFundingRatePerSecond: cfg.maxFundingRatePerSecond,
  });
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new Error(`Invalid CLUM configuration: ${issues}`);
  }
  return parsed.data;
}
