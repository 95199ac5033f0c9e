const requiredEnv = (key: string): string => {
  const value = process.env[key];
  if (value === undefined || value === "") {
    throw new Error(`Missing required env: ${key}`);
  }
  return value;
};

const optionalEnv = (key: string, fallback: string): string => {
  return process.env[key] ?? fallback;
};

const flagEnv = (key: string, fallback: boolean): boolean => {
  const v = process.env[key]?.trim();
  if (v === undefined || v === "") return fallback;
  return v === "true" || v === "1";
};

function makeConfig() {
  return {
    get port(): number {
      return Number(optionalEnv("PORT", "3000"));
    },
    get nodeEnv(): string {
      return optionalEnv("NODE_ENV", "development");
    },
    /** Comma-separated origins (e.g. "http://localhost:3000,http://localhost:3001"). "*" or "true" = allow all. */
    get corsOrigin(): string | string[] | true {
      const o = process.env.CORS_ORIGIN?.trim();
      if (o === "true" || o === "*") return true;
      const raw = o ?? "http://localhost:3000";
      const list = raw.split(",").map((s) => s.trim()).filter(Boolean);
      return list.length > 1 ? list : list[0] ?? raw;
    },
    /** Key the position manager presents as x-api-key. Unset = no caller is authorized to mutate. */
    get apiKey(): string | undefined {
      return process.env.API_KEY?.trim() || undefined;
    },
    get positionManagerId(): string {
      return optionalEnv("POSITION_MANAGER_ID", "position-manager");
    },
    /** Optional; engine events are only published to Redis when set. */
    get redisUrl(): string | undefined {
      return process.env.REDIS_URL?.trim() || undefined;
    },
    get binanceWsUrl(): string {
      return optionalEnv("BINANCE_WS_URL", "wss://stream.binance.com:9443/ws");
    },
    /** Binance stream symbol feeding spot (lowercase, e.g. ethusdt). */
    get spotSymbol(): string {
      return optionalEnv("SPOT_SYMBOL", "ethusdt").toLowerCase();
    },
    get spotFeedEnabled(): boolean {
      return flagEnv("SPOT_FEED_ENABLED", false);
    },
    /** Decimal string; defaults to the bucket center. */
    get initialSpotPrice(): string {
      return optionalEnv("INITIAL_SPOT_PRICE", this.bucketCenterPrice);
    },
    get oracleStalenessSeconds(): number {
      return Number(optionalEnv("ORACLE_STALENESS_SECONDS", "3600"));
    },
    get bucketCenterPrice(): string {
      return optionalEnv("BUCKET_CENTER_PRICE", "3000");
    },
    get bucketWidth(): string {
      return optionalEnv("BUCKET_WIDTH", "50");
    },
    get numRegularBuckets(): number {
      return Number(optionalEnv("NUM_REGULAR_BUCKETS", "64"));
    },
    /** Fraction of center, e.g. "0.1" = 10%. */
    get rebalanceThreshold(): string {
      return optionalEnv("REBALANCE_THRESHOLD", "0.1");
    },
    /** LMSR liquidity depth b. */
    get liquidityB(): string {
      return optionalEnv("LIQUIDITY_B", "10000");
    },
    get maxBucketExposure(): string {
      return optionalEnv("MAX_BUCKET_EXPOSURE", "1000000");
    },
    /** Unset = the utility level b * ln(N), which no book can exceed; only MAX_BUCKET_EXPOSURE then binds. */
    get maxWorstCaseLoss(): string | undefined {
      return process.env.MAX_WORST_CASE_LOSS?.trim() || undefined;
    },
    get costTolerance(): string {
      return optionalEnv("COST_TOLERANCE", "0.000000001");
    },
    get simplexTolerance(): string {
      return optionalEnv("SIMPLEX_TOLERANCE", "0.000000000001");
    },
    get maxBatchTrades(): number {
      return Number(optionalEnv("MAX_BATCH_TRADES", "32"));
    },
    get autoRecenter(): boolean {
      return flagEnv("AUTO_RECENTER", false);
    },
    /** Fraction of time value charged per funding period. */
    get premiumFactor(): string {
      return optionalEnv("PREMIUM_FACTOR", "1");
    },
    get fundingPeriodSeconds(): number {
      return Number(optionalEnv("FUNDING_PERIOD_SECONDS", "86400"));
    },
    /** USDC per second per unit size, decimal string (6 decimals). */
    get maxFundingRatePerSecond(): string {
      return optionalEnv("MAX_FUNDING_RATE_PER_SECOND", "0.01");
    },
    /** Base URL the solver script talks to. */
    get solverBaseUrl(): string {
      return optionalEnv("SOLVER_BASE_URL", `http://localhost:${this.port}`).replace(/\/$/, "");
    },
    /** Key the solver script sends; same as the server's API_KEY in a single deployment. */
    get solverApiKey(): string {
      return requiredEnv("API_KEY");
    },
  };
}

export const config = makeConfig();

export type AppConfig = typeof config;

export const REDIS_CHANNELS = {
  CLUM_EVENTS: "clum_events",
} as const;

export const HEARTBEAT_INTERVAL_MS = 30_000;
export const CLUM_ROOM = "clum";
