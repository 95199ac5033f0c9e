export const CLUM_ERROR_REASONS = {
  INVALID_INPUT: "INVALID_INPUT",
  INVALID_GEOMETRY: "INVALID_GEOMETRY",
  UNAUTHORIZED_CALLER: "UNAUTHORIZED_CALLER",
  VERIFICATION_FAILED: "VERIFICATION_FAILED",
  NUMERIC_OVERFLOW: "NUMERIC_OVERFLOW",
  SOLVENCY_VIOLATION: "SOLVENCY_VIOLATION",
} as const;

export type ClumErrorReason = (typeof CLUM_ERROR_REASONS)[keyof typeof CLUM_ERROR_REASONS];

/** Which verifyAndSetCost check rejected a proposal. */
export type VerificationCheck = "delta" | "monotonicity" | "bound" | "simplex";

export class ClumError extends Error {
  readonly reason: ClumErrorReason;
  readonly check?: VerificationCheck;

  constructor(reason: ClumErrorReason, message: string, check?: VerificationCheck) {
    super(message);
    this.name = "ClumError";
    this.reason = reason;
    this.check = check;
  }
}

export function invalidInput(message: string): ClumError {
  return new ClumError(CLUM_ERROR_REASONS.INVALID_INPUT, message);
}

export function numericOverflow(message: string): ClumError {
  return new ClumError(CLUM_ERROR_REASONS.NUMERIC_OVERFLOW, message);
}

export function isClumError(err: unknown): err is ClumError {
  return err instanceof ClumError;
}
