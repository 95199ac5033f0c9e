import type { FastifyInstance, FastifyReply, FastifyRequest } from "fastify";
import { bucketIndexQuerySchema, recenterBodySchema } from "../schemas/clum.schema.js";
import { CLUM_ERROR_REASONS, ClumError } from "../engine/errors.js";
import { sendClumError } from "../lib/http-errors.js";
import { serializeGrid, serializeSnapshot } from "../lib/serialize.js";
import { formatWad } from "../lib/wad.js";
import type { ClumContext } from "../services/clum.service.js";
import type { GridRecenteredPayload } from "../types/clum.js";

export async function registerBucketRoutes(app: FastifyInstance, ctx: ClumContext): Promise<void> {
  const { registry, engine } = ctx;

  app.get("/api/buckets", async (_req: FastifyRequest, reply: FastifyReply) => {
    return reply.send({
      ...serializeGrid(registry.getGrid(), registry.getSpotPrice(), registry.needsRebalance()),
      rebalanceThreshold: formatWad(registry.getRebalanceThreshold()),
      oracleFresh: registry.isOracleFresh(),
    });
  });

  app.get("/api/buckets/index", async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = bucketIndexQuerySchema.safeParse(req.query);
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid query", details: parsed.error.flatten() });
    }
    const index = registry.getBucketIndex(parsed.data.price);
    const { lower, upper } = registry.getBucketBounds(index);
    return reply.send({
      price: formatWad(parsed.data.price),
      index,
      lower: formatWad(lower),
      upper: upper === null ? null : formatWad(upper),
      midpoint: formatWad(registry.getBucketMidpoint(index)),
    });
  });

  app.post("/api/buckets/recenter", async (req: FastifyRequest, reply: FastifyReply) => {
    const parsed = recenterBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return reply.code(400).send({ error: "Invalid body", details: parsed.error.flatten() });
    }
    try {
      const { newCenter } = parsed.data;
      let moved: GridRecenteredPayload | null;
      if (newCenter !== undefined) {
        moved = engine.recenter(req.caller, newCenter);
      } else {
        if (req.caller !== engine.getPositionManager()) {
          throw new ClumError(CLUM_ERROR_REASONS.UNAUTHORIZED_CALLER, "Rebalance requires the position manager key");
        }
        moved = engine.rebalance();
      }
      return reply.send({
        recentered: moved !== null,
        ...(moved !== null
          ? { oldCenter: formatWad(moved.oldCenter), newCenter: formatWad(moved.newCenter) }
          : {}),
        state: serializeSnapshot(engine.snapshot()),
      });
    } catch (err) {
      return sendClumError(reply, err);
    }
  });
}
