import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { fundingQuerySchema } from "../schemas/clum.schema.js";
import { sendClumError } from "../lib/http-errors.js";
import { serializeFundingParams } from "../lib/serialize.js";
import { formatUsdc, formatWad } from "../lib/wad.js";
import type { ClumContext } from "../services/clum.service.js";

export async function registerFundingRoutes(app: FastifyInstance, ctx: ClumContext): Promise<void> {
  const { funding } = ctx;

  app.get("/api/funding", async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = fundingQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid query", details: parsed.error.flatten() });
    }
    const { type, strike, size } = parsed.data;
    try {
      const markPrice = funding.getMarkPrice(type, strike);
      const intrinsicValue = funding.getIntrinsicValue(type, strike);
      return reply.send({
        type,
        strike: formatWad(strike),
        size: formatWad(size),
        markPrice: formatWad(markPrice),
        intrinsicValue: formatWad(intrinsicValue),
        timeValue: formatWad(markPrice - intrinsicValue),
        fundingPerSecond: formatUsdc(funding.getFundingPerSecond(type, strike, size)),
        oracleFresh: funding.isOracleFresh(),
        params: serializeFundingParams(funding.getParams()),
      });
    } catch (err) {
      return sendClumError(reply, err);
    }
  });
}
