import type { FastifyReply } from "fastify";
import { CLUM_ERROR_REASONS, isClumError, type ClumErrorReason } from "../engine/errors.js";

const STATUS_BY_REASON: Record<ClumErrorReason, number> = {
  [CLUM_ERROR_REASONS.INVALID_INPUT]: 400,
  [CLUM_ERROR_REASONS.INVALID_GEOMETRY]: 400,
  [CLUM_ERROR_REASONS.UNAUTHORIZED_CALLER]: 403,
  [CLUM_ERROR_REASONS.VERIFICATION_FAILED]: 422,
  [CLUM_ERROR_REASONS.NUMERIC_OVERFLOW]: 422,
  [CLUM_ERROR_REASONS.SOLVENCY_VIOLATION]: 422,
};

/** Replies for a ClumError; anything else is rethrown to Fastify's 500 handler. */
export function sendClumError(reply: FastifyReply, err: unknown): FastifyReply {
  if (!isClumError(err)) throw err;
  return reply.code(STATUS_BY_REASON[err.reason]).send({
    error: err.message,
    reason: err.reason,
    ...(err.check !== undefined ? { check: err.check } : {}),
  });
}
