import { z } from "zod";
import { parseUsdc, parseWad } from "../lib/wad.js";

const DECIMAL_RE = /^\d+(\.\d+)?$/;

const wadAmount = z
  .string()
  .trim()
  .regex(DECIMAL_RE, "Expected a non-negative decimal")
  .refine((s) => (s.split(".")[1]?.length ?? 0) <= 18, "At most 18 decimals")
  .transform(parseWad);

const positiveWad = wadAmount.refine((v) => v > 0n, "Must be positive");

const usdcAmount = z
  .string()
  .trim()
  .regex(DECIMAL_RE, "Expected a non-negative decimal")
  .refine((s) => (s.split(".")[1]?.length ?? 0) <= 6, "At most 6 decimals")
  .transform(parseUsdc);

export const clumParamsSchema = z.object({
  positionManagerId: z.string().min(1),
  initialSpotPrice: positiveWad,
  oracleStalenessSeconds: z.number().int().positive(),
  bucketCenterPrice: positiveWad,
  bucketWidth: positiveWad,
  numRegularBuckets: z.number().int().min(1).max(1024),
  rebalanceThreshold: positiveWad,
  liquidityB: positiveWad,
  maxBucketExposure: positiveWad,
  maxWorstCaseLoss: positiveWad.optional(),
  costTolerance: wadAmount,
  simplexTolerance: wadAmount,
  maxBatchTrades: z.number().int().min(1).max(256),
  autoRecenter: z.boolean(),
  premiumFactor: wadAmount,
  fundingPeriodSeconds: z.number().int().positive(),
  maxFundingRatePerSecond: usdcAmount,
});

export type ClumParamsInput = z.input<typeof clumParamsSchema>;
export type ClumParams = z.output<typeof clumParamsSchema>;
