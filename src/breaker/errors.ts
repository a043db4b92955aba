/**
 * Breaker Module - Error Types
 *
 * Typed error unions for breaker operations.
 */
import type { ZodIssue } from "zod";

/**
 * Errors that can occur during breaker configuration.
 */
export type BreakerError =
  | {
      readonly type: "VALIDATION_FAILED";
      readonly issues: ReadonlyArray<ZodIssue>;
    }
  | {
      readonly type: "ALREADY_ASSOCIATED";
      readonly breaker: string;
      readonly relay: string;
      readonly requested: string;
    };

/**
 * Helper to create validation error.
 */
export const validationError = (
  issues: ReadonlyArray<ZodIssue>,
): BreakerError => ({
  type: "VALIDATION_FAILED",
  issues,
});

/**
 * Create an ALREADY_ASSOCIATED error.
 */
export function alreadyAssociated(
  breaker: string,
  relay: string,
  requested: string,
): BreakerError {
  return { type: "ALREADY_ASSOCIATED", breaker, relay, requested };
}

/**
 * Format a BreakerError for logging.
 */
export function formatBreakerError(error: BreakerError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return `Invalid breaker settings: ${error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`;
    case "ALREADY_ASSOCIATED":
      return `${error.breaker} is already tripped by ${error.relay}, cannot associate ${error.requested}`;
  }
}
