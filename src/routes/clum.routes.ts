import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import {
  costProposalBodySchema,
  priceBoundsQuerySchema,
  quoteQuerySchema,
  tradeBodySchema,
} from "../schemas/clum.schema.js";
import { computeArbitrageBounds } from "../engine/arbitrage-guard.js";
import { sendClumError } from "../lib/http-errors.js";
import { buildPriceBoundsMerkleTree, type PriceBound } from "../lib/price-bounds-merkle.js";
import {
  serializeDistribution,
  serializeQuote,
  serializeSnapshot,
  serializeTradeRecord,
} from "../lib/serialize.js";
import { formatWad } from "../lib/wad.js";
import type { ClumContext } from "../services/clum.service.js";

export async function registerClumRoutes(app: FastifyInstance, ctx: ClumContext): Promise<void> {
  const { engine, funding, guard, registry } = ctx;

  app.get("/api/clum/state", async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      ...serializeSnapshot(engine.snapshot()),
      numBuckets: engine.getNumBuckets(),
      oracleFresh: registry.isOracleFresh(),
    });
  });

  app.get("/api/clum/distribution", async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.send(serializeDistribution(engine.getImpliedDistribution()));
  });

  app.get("/api/clum/quote", async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = quoteQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid query", details: parsed.error.flatten() });
    }
    try {
      const quote = engine.quote(parsed.data);
      return reply.send({ ...serializeQuote(quote), noArbitrage: guard.validateTrade(parsed.data) });
    } catch (err) {
      return sendClumError(reply, err);
    }
  });

  app.post("/api/clum/trades", async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = tradeBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    try {
      const record = engine.executeTrade(req.caller, parsed.data);
      req.log.info({ type: record.type, side: record.side, cost: formatWad(record.cost) }, "trade executed");
      return reply.code(201).send({
        trade: serializeTradeRecord(record),
        state: serializeSnapshot(engine.snapshot()),
      });
    } catch (err) {
      return sendClumError(reply, err);
    }
  });

  app.post("/api/clum/verify", async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = costProposalBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    try {
      const state = engine.verifyAndSetCost(req.caller, parsed.data);
      return reply.send({ state: serializeSnapshot(state) });
    } catch (err) {
      return sendClumError(reply, err);
    }
  });

  app.get("/api/clum/price-bounds", async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = priceBoundsQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid query", details: parsed.error.flatten() });
    }
    try {
      const strikes = parsed.data.strikes;
      const spot = registry.getSpotPrice();
      const calls = strikes.map((k) => funding.getMarkPrice("CALL", k));
      const puts = strikes.map((k) => funding.getMarkPrice("PUT", k));
      const bounds = computeArbitrageBounds(strikes, calls, puts, spot);

      const entries: PriceBound[] = [
        ...strikes.map((strike, j) => ({ type: "CALL" as const, strike, bid: bounds.callBids[j], ask: bounds.callAsks[j] })),
        ...strikes.map((strike, j) => ({ type: "PUT" as const, strike, bid: bounds.putBids[j], ask: bounds.putAsks[j] })),
      ];
      const tree = buildPriceBoundsMerkleTree(entries);
      return reply.send({
        spot: formatWad(spot),
        root: tree.root,
        bounds: entries.map((e, i) => ({
          type: e.type,
          strike: formatWad(e.strike),
          bid: formatWad(e.bid),
          ask: formatWad(e.ask),
          leaf: tree.leaves[i],
          proof: tree.proofs[i],
        })),
      });
    } catch (err) {
      return sendClumError(reply, err);
    }
  });
}
