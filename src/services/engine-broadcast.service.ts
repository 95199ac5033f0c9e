import { CLUM_ROOM, REDIS_CHANNELS } from "../config/index.js";
import { serializeClumEvent } from "../lib/serialize.js";
import type { ClumEngine } from "../engine/clum-engine.js";
import type { SocketManager } from "./websocket.service.js";

/** The slice of an ioredis client this service uses. */
export interface EventPublisher {
  publish(channel: string, message: string): Promise<number>;
}

export interface EngineBroadcastOptions {
  sockets: SocketManager;
  getPublisher: () => Promise<EventPublisher | null>;
}

async function publishEvent(getPublisher: EngineBroadcastOptions["getPublisher"], message: string): Promise<void> {
  const pub = await getPublisher();
  if (pub === null) return;
  await pub.publish(REDIS_CHANNELS.CLUM_EVENTS, message);
}

/** Fans engine events out to WebSocket clients and the Redis channel. Returns a detach function. */
export function attachEngineBroadcast(engine: ClumEngine, options: EngineBroadcastOptions): () => void {
  return engine.subscribe((event) => {
    const msg = serializeClumEvent(event);
    options.sockets.broadcastToRoom(CLUM_ROOM, msg);
    publishEvent(options.getPublisher, JSON.stringify(msg)).catch((err) =>
      console.error("clum event publish error:", err)
    );
  });
}
