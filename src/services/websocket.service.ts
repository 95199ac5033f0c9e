import type { RawData, WebSocket } from "ws";
import { CLUM_ROOM, HEARTBEAT_INTERVAL_MS } from "../config/index.js";
import { WS_EVENT_NAMES } from "../types/websocket-events.js";
import type { WsEventName, WsMessage } from "../types/websocket-events.js";
import { wsClientMessageSchema } from "../schemas/websocket.schema.js";

const WS_OPEN = 1;

interface SocketMeta {
  lastPongAt: number;
  heartbeatTimer: ReturnType<typeof setInterval> | null;
}

/** Rooms of connected sockets with a PING/PONG heartbeat. New sockets join the engine room. */
export class SocketManager {
  private readonly rooms = new Map<string, Set<WebSocket>>();
  private readonly socketToRooms = new Map<WebSocket, Set<string>>();
  private readonly socketMeta = new Map<WebSocket, SocketMeta>();
  private readonly heartbeatMs: number;

  constructor(heartbeatMs: number = HEARTBEAT_INTERVAL_MS) {
    this.heartbeatMs = heartbeatMs;
  }

  get connectionCount(): number {
    return this.socketToRooms.size;
  }

  addSocket(socket: WebSocket): void {
    this.socketToRooms.set(socket, new Set());
    this.socketMeta.set(socket, { lastPongAt: Date.now(), heartbeatTimer: null });
    this.subscribe(socket, CLUM_ROOM);
    this.startHeartbeat(socket);

    socket.on("message", (raw: RawData) => {
      this.handleMessage(socket, raw.toString());
    });
    socket.on("close", () => this.removeSocket(socket));
    socket.on("error", () => this.removeSocket(socket));
  }

  handleMessage(socket: WebSocket, text: string): void {
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      this.sendError(socket, "INVALID_JSON", "Invalid JSON");
      return;
    }

    const parsed = wsClientMessageSchema.safeParse(data);
    if (!parsed.success) {
      this.sendError(socket, "VALIDATION_ERROR", parsed.error.message);
      return;
    }

    const msg = parsed.data;
    switch (msg.type) {
      case WS_EVENT_NAMES.SUBSCRIBE:
        this.subscribe(socket, msg.payload.room);
        return;
      case WS_EVENT_NAMES.UNSUBSCRIBE:
        this.unsubscribe(socket, msg.payload.room);
        return;
      case WS_EVENT_NAMES.PING:
      case WS_EVENT_NAMES.PONG: {
        const meta = this.socketMeta.get(socket);
        if (meta) meta.lastPongAt = Date.now();
        if (msg.type === WS_EVENT_NAMES.PING) {
          this.send(socket, { type: WS_EVENT_NAMES.PONG, payload: undefined });
        }
        return;
      }
    }
  }

  subscribe(socket: WebSocket, room: string): void {
    let set = this.rooms.get(room);
    if (set === undefined) {
      set = new Set();
      this.rooms.set(room, set);
    }
    set.add(socket);
    this.socketToRooms.get(socket)?.add(room);
  }

  unsubscribe(socket: WebSocket, room: string): void {
    this.rooms.get(room)?.delete(socket);
    this.socketToRooms.get(socket)?.delete(room);
  }

  removeSocket(socket: WebSocket): void {
    this.clearHeartbeat(socket);
    this.socketToRooms.get(socket)?.forEach((room) => {
      this.rooms.get(room)?.delete(socket);
    });
    this.socketToRooms.delete(socket);
    this.socketMeta.delete(socket);
  }

  send<E extends WsEventName>(socket: WebSocket, message: WsMessage<E>): void {
    if (socket.readyState !== WS_OPEN) return;
    socket.send(JSON.stringify(message));
  }

  broadcastToRoom(room: string, message: WsMessage): void {
    const set = this.rooms.get(room);
    if (!set) return;
    const payload = JSON.stringify(message);
    for (const ws of set) {
      if (ws.readyState === WS_OPEN) ws.send(payload);
    }
  }

  closeAll(): void {
    for (const socket of [...this.socketToRooms.keys()]) {
      this.removeSocket(socket);
      socket.close();
    }
  }

  private startHeartbeat(socket: WebSocket): void {
    const meta = this.socketMeta.get(socket);
    if (meta === undefined) return;
    meta.heartbeatTimer = setInterval(() => {
      const m = this.socketMeta.get(socket);
      if (socket.readyState !== WS_OPEN || m === undefined) {
        this.clearHeartbeat(socket);
        return;
      }
      if (Date.now() - m.lastPongAt > this.heartbeatMs * 2) {
        socket.terminate();
        return;
      }
      this.send(socket, { type: WS_EVENT_NAMES.PING, payload: undefined });
    }, this.heartbeatMs);
  }

  private clearHeartbeat(socket: WebSocket): void {
    const meta = this.socketMeta.get(socket);
    if (meta === undefined) return;
    if (meta.heartbeatTimer !== null) {
      clearInterval(meta.heartbeatTimer);
      meta.heartbeatTimer = null;
    }
  }

  private sendError(socket: WebSocket, code: string, message: string): void {
    this.send(socket, { type: WS_EVENT_NAMES.ERROR, payload: { code, message } });
  }
}
