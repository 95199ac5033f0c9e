import { timingSafeEqual } from "crypto";
import type { FastifyRequest } from "fastify";

export const ANONYMOUS_CALLER = "anonymous";

export function getApiKeyFromRequest(req: FastifyRequest): string | null {
  const header = req.headers["x-api-key"] ?? req.headers["api-key"];
  if (typeof header === "string" && header.trim()) return header.trim();
  return null;
}

function sameKey(a: string, b: string): boolean {
  const left = Buffer.from(a, "utf8");
  const right = Buffer.from(b, "utf8");
  return left.length === right.length && timingSafeEqual(left, right);
}

export interface CallerOptions {
  apiKey: string | undefined;
  positionManagerId: string;
}

/**
 * Caller identity handed to the engine: the position manager id when the request carries
 * the configured API key, otherwise anonymous (which the engine rejects for mutations).
 */
export function resolveCaller(req: FastifyRequest, options: CallerOptions): string {
  const presented = getApiKeyFromRequest(req);
  if (presented !== null && options.apiKey !== undefined && sameKey(presented, options.apiKey)) {
    return options.positionManagerId;
  }
  return ANONYMOUS_CALLER;
}
