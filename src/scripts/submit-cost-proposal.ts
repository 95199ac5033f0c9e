/**
 * Off-path solver run: settles one batch of trades through POST /api/clum/verify.
 * Run: npm run solver -- CALL 2000 1 BUY [PUT 1900 0.5 SELL ...]
 * Env: SOLVER_BASE_URL (default http://localhost:$PORT), API_KEY.
 */

import dotenv from "dotenv";
dotenv.config();

import { config } from "../config/index.js";
import { tradeIntentSchema } from "../schemas/clum.schema.js";
import { formatWad } from "../lib/wad.js";
import { ClumSolverClient } from "../solver/clum-solver-client.js";
import type { TradeIntent } from "../types/clum.js";

const FIELDS_PER_TRADE = 4;

function parseTradeArgs(args: readonly string[]): TradeIntent[] {
  if (args.length === 0 || args.length % FIELDS_PER_TRADE !== 0) {
    throw new Error("Expected groups of: <CALL|PUT> <strike> <size> <BUY|SELL>");
  }
  const trades: TradeIntent[] = [];
  for (let i = 0; i < args.length; i += FIELDS_PER_TRADE) {
    const [type, strike, size, side] = args.slice(i, i + FIELDS_PER_TRADE);
    trades.push(tradeIntentSchema.parse({ type: type.toUpperCase(), strike, size, side: side.toUpperCase() }));
  }
  return trades;
}

async function main(): Promise<void> {
  const trades = parseTradeArgs(process.argv.slice(2));
  const client = new ClumSolverClient({ baseUrl: config.solverBaseUrl, apiKey: config.solverApiKey });

  const proposal = await client.buildProposal(trades);
  console.log(`Proposed cost: ${formatWad(proposal.proposedCost)} for ${trades.length} trade(s)`);

  const state = await client.submitProposal(proposal);
  console.log(`Accepted. cachedCost=${formatWad(state.cachedCost)}`);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
