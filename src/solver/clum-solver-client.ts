/**
 * HTTP side of the off-path solver: reads engine state, builds a proposal for a batch of
 * trades and submits it to POST /api/clum/verify.
 */

import { z } from "zod";
import { formatWad } from "../lib/wad.js";
import { wadSchema } from "../schemas/clum.schema.js";
import { buildCostProposal } from "./lmsr-solver.js";
import type { ClumStateSnapshot, CostProposal, TradeIntent } from "../types/clum.js";

const snapshotResponseSchema = z.object({
  quantities: z.array(wadSchema),
  cachedCost: wadSchema,
  utilityLevel: wadSchema,
  liquidity: wadSchema,
});

const distributionResponseSchema = z.object({
  midpoints: z.array(wadSchema),
  probabilities: z.array(wadSchema),
});

const errorResponseSchema = z.object({
  error: z.string(),
  reason: z.string().optional(),
  check: z.string().optional(),
});

export type FetchLike = (
  url: string,
  init?: { method?: string; headers?: Record<string, string>; body?: string }
) => Promise<{ ok: boolean; status: number; json(): Promise<unknown> }>;

export interface SolverClientOptions {
  baseUrl: string;
  apiKey: string;
  fetch?: FetchLike;
}

export class SolverRequestError extends Error {
  constructor(
    message: string,
    readonly status: number,
    readonly reason?: string,
    readonly check?: string
  ) {
    super(message);
    this.name = "SolverRequestError";
  }
}

export class ClumSolverClient {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly fetchFn: FetchLike;

  constructor(options: SolverClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/$/, "");
    this.apiKey = options.apiKey;
    this.fetchFn = options.fetch ?? fetch;
  }

  async getState(): Promise<ClumStateSnapshot> {
    return snapshotResponseSchema.parse(await this.request("GET", "/api/clum/state"));
  }

  async getMidpoints(): Promise<bigint[]> {
    return distributionResponseSchema.parse(await this.request("GET", "/api/clum/distribution")).midpoints;
  }

  async buildProposal(trades: readonly TradeIntent[]): Promise<CostProposal> {
    const [state, midpoints] = await Promise.all([this.getState(), this.getMidpoints()]);
    return buildCostProposal(state, midpoints, trades);
  }

  async submitProposal(proposal: CostProposal): Promise<ClumStateSnapshot> {
    const body = {
      proposedCost: formatWad(proposal.proposedCost),
      newQuantities: proposal.newQuantities.map(formatWad),
      trades: proposal.trades.map((t) => ({
        type: t.type,
        strike: formatWad(t.strike),
        size: formatWad(t.size),
        side: t.side,
      })),
    };
    const res = await this.request("POST", "/api/clum/verify", body);
    return z.object({ state: snapshotResponseSchema }).parse(res).state;
  }

  /** Fetch, solve and submit in one go. */
  async settle(trades: readonly TradeIntent[]): Promise<ClumStateSnapshot> {
    return this.submitProposal(await this.buildProposal(trades));
  }

  private async request(method: "GET" | "POST", path: string, body?: unknown): Promise<unknown> {
    const headers: Record<string, string> = { "x-api-key": this.apiKey };
    if (body !== undefined) headers["content-type"] = "application/json";
    const res = await this.fetchFn(`${this.baseUrl}${path}`, {
      method,
      headers,
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
    });
    const json = await res.json();
    if (!res.ok) {
      const parsed = errorResponseSchema.safeParse(json);
      const message = parsed.success ? parsed.data.error : `HTTP ${res.status}`;
      throw new SolverRequestError(
        `${method} ${path} failed: ${message}`,
        res.status,
        parsed.success ? parsed.data.reason : undefined,
        parsed.success ? parsed.data.check : undefined
      );
    }
    return json;
  }
}
