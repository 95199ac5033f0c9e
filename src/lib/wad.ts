import { formatUnits, parseUnits } from "viem";

export const WAD_DECIMALS = 18;
export const USDC_DECIMALS = 6;

/** "2000.5" -> 2000500000000000000000n. Throws on malformed decimals. */
export function parseWad(value: string): bigint {
  return parseUnits(value, WAD_DECIMALS);
}

export function formatWad(value: bigint): string {
  return formatUnits(value, WAD_DECIMALS);
}

export function parseUsdc(value: string): bigint {
  return parseUnits(value, USDC_DECIMALS);
}

export function formatUsdc(value: bigint): string {
  return formatUnits(value, USDC_DECIMALS);
}
