import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import WebSocket from "ws";
import type { FastifyInstance } from "fastify";
import { SocketManager } from "../../src/services/websocket.service.js";
import { AUTH, makeTestApp } from "../helpers/app.js";

interface WireMessage {
  type: string;
  payload?: Record<string, unknown>;
}

function nextMessage(client: WebSocket, type: string): Promise<WireMessage> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => reject(new Error(`Timed out waiting for ${type}`)), 2000);
    const onMessage = (raw: WebSocket.RawData) => {
      const msg: WireMessage = JSON.parse(raw.toString());
      if (msg.type !== type) return;
      clearTimeout(timer);
      client.off("message", onMessage);
      resolve(msg);
    };
    client.on("message", onMessage);
  });
}

describe("WebSocket event stream", () => {
  let app: FastifyInstance;
  let sockets: SocketManager;
  let client: WebSocket;

  beforeEach(async () => {
    sockets = new SocketManager(60_000);
    ({ app } = await makeTestApp({}, { sockets }));
    const address = await app.listen({ port: 0, host: "127.0.0.1" });
    client = new WebSocket(`${address.replace("http", "ws")}/ws`);
    await new Promise<void>((resolve, reject) => {
      client.once("open", () => resolve());
      client.once("error", reject);
    });
    // Round trip so the server side has registered the socket.
    const pong = nextMessage(client, "PONG");
    client.send(JSON.stringify({ type: "PING" }));
    await pong;
  });

  afterEach(async () => {
    client.close();
    await app.close();
  });

  it("tracks the connection", () => {
    expect(sockets.connectionCount).toBe(1);
  });

  it("pushes executed trades to subscribed clients", async () => {
    const received = nextMessage(client, "TRADE_EXECUTED");
    const res = await app.inject({
      method: "POST",
      url: "/api/clum/trades",
      headers: AUTH,
      payload: { type: "PUT", strike: "1900", size: "1", side: "BUY" },
    });
    expect(res.statusCode).toBe(201);
    const msg = await received;
    expect(msg.payload).toMatchObject({ type: "PUT", strike: "1900", size: "1", side: "BUY" });
    expect(msg.payload?.cost).toBe(res.json().trade.cost);
  });

  it("answers malformed frames with an error", async () => {
    const error = nextMessage(client, "ERROR");
    client.send("not json");
    expect((await error).payload).toEqual({ code: "INVALID_JSON", message: "Invalid JSON" });
  });

  it("only knows the engine room", async () => {
    const error = nextMessage(client, "ERROR");
    client.send(JSON.stringify({ type: "SUBSCRIBE", payload: { room: "elsewhere" } }));
    expect((await error).payload?.code).toBe("VALIDATION_ERROR");
  });

  it("forgets the socket once the client disconnects", async () => {
    client.close();
    await vi.waitFor(() => expect(sockets.connectionCount).toBe(0));
  });
});
