import { z } from "zod";
import { parseWad } from "../lib/wad.js";

const SIGNED_WAD_RE = /^-?\d+(\.\d{1,18})?$/;

/** Decimal string with up to 18 fractional digits, parsed to a WAD bigint. */
export const wadSchema = z.string().trim().regex(SIGNED_WAD_RE, "Expected a decimal with at most 18 decimals").transform(parseWad);

const nonNegativeWad = wadSchema.refine((v) => v >= 0n, "Must be non-negative");
const positiveWad = wadSchema.refine((v) => v > 0n, "Must be positive");

export const optionTypeSchema = z.enum(["CALL", "PUT"]);
export const tradeSideSchema = z.enum(["BUY", "SELL"]);

export const tradeIntentSchema = z.object({
  type: optionTypeSchema,
  strike: nonNegativeWad,
  size: positiveWad,
  side: tradeSideSchema,
});

export const quoteQuerySchema = z.object({
  type: optionTypeSchema,
  strike: nonNegativeWad,
  /** Default 1 unit. */
  size: positiveWad.optional().default("1"),
  side: tradeSideSchema.optional().default("BUY"),
});

export const tradeBodySchema = tradeIntentSchema;

export const costProposalBodySchema = z.object({
  proposedCost: wadSchema,
  newQuantities: z.array(wadSchema).min(1).max(1026),
  trades: z.array(tradeIntentSchema).max(256).default([]),
});

export const bucketIndexQuerySchema = z.object({
  price: nonNegativeWad,
});

export const recenterBodySchema = z
  .object({
    /** Omit to rebalance on spot. */
    newCenter: positiveWad.optional(),
  })
  .default({});

export const priceBoundsQuerySchema = z.object({
  /** Comma-separated strictly increasing strikes, e.g. "1900,2000,2100". */
  strikes: z
    .string()
    .min(1)
    .transform((s) => s.split(",").map((k) => k.trim()).filter(Boolean))
    .pipe(z.array(nonNegativeWad).min(1).max(64)),
});

export const fundingQuerySchema = z.object({
  type: optionTypeSchema,
  strike: nonNegativeWad,
  size: positiveWad.optional().default("1"),
});

export type QuoteQueryInput = z.input<typeof quoteQuerySchema>;
export type TradeBodyInput = z.input<typeof tradeBodySchema>;
export type CostProposalBodyInput = z.input<typeof costProposalBodySchema>;
export type RecenterBodyInput = z.input<typeof recenterBodySchema>;
export type FundingQueryInput = z.input<typeof fundingQuerySchema>;
