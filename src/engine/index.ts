export { WAD, expWad, lnWad, mulWad, divWad } from "./fixed-point.js";
export { ClumError, CLUM_ERROR_REASONS, isClumError } from "./errors.js";
export type { ClumErrorReason, VerificationCheck } from "./errors.js";

export {
  BucketRegistry,
  MAX_PRICE_WAD,
  buildGrid,
  gridBounds,
  gridIndexOf,
  gridMidpoint,
  gridMidpoints,
  remapQuantities,
} from "./bucket-registry.js";
export type { BucketRegistryParams } from "./bucket-registry.js";

export { costOf, costBounds, probabilitiesOf, solvencyBreach, utilityLevelOf, worstCaseLossOf } from "./cost-function.js";
export type { SolvencyLimits } from "./cost-function.js";
export { buildTradeDelta, optionPayoff, expectedPayoff } from "./trade-delta.js";
export { verifyCostProposal } from "./cost-verifier.js";
export type { VerificationParams, VerificationResult } from "./cost-verifier.js";

export { ClumEngine } from "./clum-engine.js";
export type { ClumEngineParams } from "./clum-engine.js";
export { FundingDeriver } from "./funding-deriver.js";
export type { FundingParams } from "./funding-deriver.js";
export { ArbitrageGuard, checkConvexity, computeArbitrageBounds } from "./arbitrage-guard.js";
export type { ArbitrageBounds, StrikePrice } from "./arbitrage-guard.js";
