import { describe, it, expect, vi } from "vitest";
import { attachEngineBroadcast } from "../../src/services/engine-broadcast.service.js";
import { SocketManager } from "../../src/services/websocket.service.js";
import { POSITION_MANAGER, makeEngine, wad } from "../helpers/clum.js";

describe("attachEngineBroadcast", () => {
  it("publishes each engine event to the Redis channel as a wire message", async () => {
    const engine = makeEngine();
    const publish = vi.fn(async (_channel: string, _message: string) => 1);
    attachEngineBroadcast(engine, { sockets: new SocketManager(), getPublisher: async () => ({ publish }) });

    engine.recenter(POSITION_MANAGER, wad(2100));

    await vi.waitFor(() => expect(publish).toHaveBeenCalledTimes(2));
    expect(publish.mock.calls.map(([channel]) => channel)).toEqual(["clum_events", "clum_events"]);
    expect(JSON.parse(publish.mock.calls[0][1])).toEqual({
      type: "GRID_RECENTERED",
      payload: { oldCenter: "2000", newCenter: "2100" },
    });
    expect(JSON.parse(publish.mock.calls[1][1]).type).toBe("COST_UPDATED");
  });

  it("skips publishing without a configured publisher", () => {
    const engine = makeEngine();
    const getPublisher = vi.fn(async () => null);
    attachEngineBroadcast(engine, { sockets: new SocketManager(), getPublisher });
    expect(() => engine.executeBuy(POSITION_MANAGER, "CALL", wad(2000), wad(1))).not.toThrow();
    expect(getPublisher).toHaveBeenCalledTimes(1);
  });

  it("logs publish failures without affecting the trade", async () => {
    const engine = makeEngine();
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const publish = vi.fn(async () => {
      throw new Error("redis down");
    });
    attachEngineBroadcast(engine, { sockets: new SocketManager(), getPublisher: async () => ({ publish }) });

    engine.executeBuy(POSITION_MANAGER, "CALL", wad(2000), wad(1));
    await vi.waitFor(() => expect(spy).toHaveBeenCalled());
    expect(engine.getQuantity(6)).toBe(wad(1125));
    spy.mockRestore();
  });

  it("stops after detaching", () => {
    const engine = makeEngine();
    const getPublisher = vi.fn(async () => null);
    const detach = attachEngineBroadcast(engine, { sockets: new SocketManager(), getPublisher });
    detach();
    engine.executeBuy(POSITION_MANAGER, "CALL", wad(2000), wad(1));
    expect(getPublisher).not.toHaveBeenCalled();
  });
});
