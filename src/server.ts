import dotenv from "dotenv";
dotenv.config();

import { config } from "./config/index.js";
import { loadClumParams } from "./config/clum-params.js";
import { buildApp } from "./app.js";
import { createClumContext } from "./services/clum.service.js";
import { BinanceSpotPriceFeed } from "./services/spot-price.service.js";
import { closeRedis, getRedisPublisher } from "./lib/redis.js";

const ctx = createClumContext(loadClumParams());
const fastify = await buildApp({
  ctx,
  apiKey: config.apiKey,
  corsOrigin: config.corsOrigin,
  logger: true,
  getPublisher: getRedisPublisher,
});

const spotFeed = config.spotFeedEnabled
  ? new BinanceSpotPriceFeed(ctx.spot, {
      wsUrl: config.binanceWsUrl,
      symbol: config.spotSymbol,
    })
  : null;

const start = async () => {
  try {
    await fastify.listen({ port: config.port, host: "0.0.0.0" });
    spotFeed?.start();
    if (config.apiKey === undefined) {
      fastify.log.warn("API_KEY not set: trades, cost submissions and recenters are disabled");
    }
    fastify.log.info(
      { buckets: ctx.engine.getNumBuckets(), spotFeed: spotFeed !== null },
      "CLUM server started"
    );
  } catch (err) {
    fastify.log.error(err);
    process.exit(1);
  }
};

const shutdown = async () => {
  spotFeed?.stop();
  await fastify.close();
  await closeRedis();
  process.exit(0);
};

process.on("SIGINT", () => {
  shutdown().catch((err) => console.error("shutdown error:", err));
});
process.on("SIGTERM", () => {
  shutdown().catch((err) => console.error("shutdown error:", err));
});

start().catch((err) => console.error("start error:", err));
