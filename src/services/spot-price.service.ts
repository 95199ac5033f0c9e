import WebSocket from "ws";
import { z } from "zod";
import { parseWad } from "../lib/wad.js";
import type { SpotPriceSource } from "../types/clum.js";

const RECONNECT_DELAY_MS = 5000;

const tickerMessageSchema = z.object({
  e: z.literal("24hrTicker"),
  s: z.string(),
  c: z.string().regex(/^\d+(\.\d{1,18})?$/),
});

/**
 * Spot source updated by push (feed, admin call, test). Fresh while the last update is
 * younger than the staleness window.
 */
export class ManualSpotPriceSource implements SpotPriceSource {
  private price: bigint;
  private updatedAt: number;
  private readonly stalenessMs: number;
  private readonly now: () => number;

  constructor(initialPrice: bigint, stalenessSeconds: number, now: () => number = Date.now) {
    if (initialPrice <= 0n) throw new Error("Spot price must be positive");
    this.price = initialPrice;
    this.stalenessMs = stalenessSeconds * 1000;
    this.now = now;
    this.updatedAt = now();
  }

  getSpotPrice(): bigint {
    return this.price;
  }

  getUpdatedAt(): number {
    return this.updatedAt;
  }

  isOracleFresh(): boolean {
    return this.now() - this.updatedAt <= this.stalenessMs;
  }

  setSpotPrice(price: bigint): void {
    if (price <= 0n) throw new Error("Spot price must be positive");
    this.price = price;
    this.updatedAt = this.now();
  }
}

/** Parses a Binance 24h ticker frame; returns the last price in WAD or null for other frames. */
export function parseTickerPrice(raw: string): bigint | null {
  const parsed = tickerMessageSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) return null;
  const price = parseWad(parsed.data.c);
  return price > 0n ? price : null;
}

export interface BinanceSpotFeedOptions {
  wsUrl: string;
  symbol: string;
  onPrice?: (price: bigint) => void;
}

/** Streams the Binance ticker into a ManualSpotPriceSource, reconnecting on close. */
export class BinanceSpotPriceFeed {
  private ws: WebSocket | null = null;
  private reconnectTimer: ReturnType<typeof setTimeout> | null = null;
  private stopped = false;

  constructor(
    private readonly source: ManualSpotPriceSource,
    private readonly options: BinanceSpotFeedOptions
  ) {}

  start(): void {
    this.stopped = false;
    this.connect();
  }

  stop(): void {
    this.stopped = true;
    if (this.reconnectTimer !== null) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
    this.ws?.close();
    this.ws = null;
  }

  handleMessage(raw: string): void {
    try {
      const price = parseTickerPrice(raw);
      if (price === null) return;
      this.source.setSpotPrice(price);
      this.options.onPrice?.(price);
    } catch (err) {
      console.error("Binance message parse error:", err);
    }
  }

  private connect(): void {
    const url = `${this.options.wsUrl}/${this.options.symbol}@ticker`;
    const ws = new WebSocket(url);
    this.ws = ws;

    ws.on("message", (raw: Buffer) => this.handleMessage(raw.toString()));

    ws.on("close", () => {
      if (this.stopped) return;
      this.reconnectTimer = setTimeout(() => this.connect(), RECONNECT_DELAY_MS);
    });

    ws.on("error", (err: Error) => {
      console.error("Binance WS error:", err);
    });
  }
}
