import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";
import fastifyCors from "@fastify/cors";
import fastifyWebsocket from "@fastify/websocket";
import { resolveCaller } from "./lib/auth.js";
import { SocketManager } from "./services/websocket.service.js";
import { attachEngineBroadcast, type EventPublisher } from "./services/engine-broadcast.service.js";
import { registerBucketRoutes } from "./routes/buckets.routes.js";
import { registerClumRoutes } from "./routes/clum.routes.js";
import { registerFundingRoutes } from "./routes/funding.routes.js";
import type { ClumContext } from "./services/clum.service.js";

export interface BuildAppOptions {
  ctx: ClumContext;
  /** Key that identifies the position manager. Unset = every request is anonymous. */
  apiKey?: string;
  corsOrigin?: string | string[] | true;
  logger?: FastifyServerOptions["logger"];
  sockets?: SocketManager;
  getPublisher?: () => Promise<EventPublisher | null>;
}

export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const { ctx } = options;
  const app = Fastify({ logger: options.logger ?? false });
  const sockets = options.sockets ?? new SocketManager();

  await app.register(fastifyCors, {
    origin: options.corsOrigin ?? true,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type", "x-api-key", "api-key"],
  });
  await app.register(fastifyWebsocket, {
    options: { maxPayload: 65536 },
  });

  app.decorateRequest("caller", "");
  app.addHook("preValidation", async (request) => {
    request.caller = resolveCaller(request, {
      apiKey: options.apiKey,
      positionManagerId: ctx.engine.getPositionManager(),
    });
  });

  app.get("/ws", { websocket: true }, (socket) => {
    sockets.addSocket(socket);
  });

  app.get("/health", async () => ({
    status: "ok",
    oracleFresh: ctx.registry.isOracleFresh(),
  }));

  await registerBucketRoutes(app, ctx);
  await registerClumRoutes(app, ctx);
  await registerFundingRoutes(app, ctx);

  const detach = attachEngineBroadcast(ctx.engine, {
    sockets,
    getPublisher: options.getPublisher ?? (async () => null),
  });
  const detachLog = ctx.engine.subscribe((event) => {
    app.log.info({ event: event.type }, "clum event");
  });

  app.addHook("onClose", async () => {
    detach();
    detachLog();
    sockets.closeAll();
  });

  return app;
}
