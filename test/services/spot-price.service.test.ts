import { describe, it, expect, vi } from "vitest";
import {
  BinanceSpotPriceFeed,
  ManualSpotPriceSource,
  parseTickerPrice,
} from "../../src/services/spot-price.service.js";
import { wad } from "../helpers/clum.js";

describe("ManualSpotPriceSource", () => {
  it("goes stale once the last update is older than the window", () => {
    let now = 1_000_000;
    const source = new ManualSpotPriceSource(wad(2000), 60, () => now);
    expect(source.isOracleFresh()).toBe(true);
    now += 60_000;
    expect(source.isOracleFresh()).toBe(true);
    now += 1;
    expect(source.isOracleFresh()).toBe(false);

    source.setSpotPrice(wad(2050));
    expect(source.getSpotPrice()).toBe(wad(2050));
    expect(source.getUpdatedAt()).toBe(now);
    expect(source.isOracleFresh()).toBe(true);
  });

  it("rejects non-positive prices", () => {
    expect(() => new ManualSpotPriceSource(0n, 60)).toThrow(/must be positive/);
    expect(() => new ManualSpotPriceSource(wad(1), 60).setSpotPrice(-1n)).toThrow(/must be positive/);
  });
});

describe("parseTickerPrice", () => {
  it("reads the last price of a 24h ticker frame", () => {
    expect(parseTickerPrice(JSON.stringify({ e: "24hrTicker", s: "ETHUSDT", c: "3012.45000000" }))).toBe(
      3012450000000000000000n
    );
  });

  it("ignores other frames", () => {
    expect(parseTickerPrice(JSON.stringify({ e: "trade", s: "ETHUSDT", p: "3000" }))).toBeNull();
    expect(parseTickerPrice(JSON.stringify({ e: "24hrTicker", s: "ETHUSDT", c: "0.00" }))).toBeNull();
  });
});

describe("BinanceSpotPriceFeed.handleMessage", () => {
  it("pushes parsed prices into the source", () => {
    const source = new ManualSpotPriceSource(wad(2000), 60);
    const onPrice = vi.fn();
    const feed = new BinanceSpotPriceFeed(source, { wsUrl: "wss://feed.invalid/ws", symbol: "ethusdt", onPrice });
    feed.handleMessage(JSON.stringify({ e: "24hrTicker", s: "ETHUSDT", c: "2100" }));
    expect(source.getSpotPrice()).toBe(wad(2100));
    expect(onPrice).toHaveBeenCalledWith(wad(2100));
  });

  it("logs unparseable frames and keeps the last price", () => {
    const spy = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const source = new ManualSpotPriceSource(wad(2000), 60);
    new BinanceSpotPriceFeed(source, { wsUrl: "wss://feed.invalid/ws", symbol: "ethusdt" }).handleMessage("{");
    expect(source.getSpotPrice()).toBe(wad(2000));
    expect(spy).toHaveBeenCalledTimes(1);
    spy.mockRestore();
  });
});
