/**
 * Relay Module - Error Types
 *
 * Typed error unions for relay configuration and evaluation.
 * Errors carry context about what failed.
 */
import type { ZodIssue } from "zod";
import { type BreakerError, formatBreakerError } from "../breaker/index.js";
import { type CurveError, formatCurveError } from "../curves/index.js";

/**
 * Errors that can occur during relay operations.
 */
export type RelayError =
  | {
      readonly type: "VALIDATION_FAILED";
      readonly issues: ReadonlyArray<ZodIssue>;
    }
  | CurveError
  | {
      readonly type: "BREAKER_REJECTED";
      readonly relay: string;
      readonly cause: BreakerError;
    }
  | {
      readonly type: "NO_BREAKER";
      readonly relay: string;
    };

/**
 * Helper to create validation error.
 */
export const validationError = (
  issues: ReadonlyArray<ZodIssue>,
): RelayError => ({
  type: "VALIDATION_FAILED",
  issues,
});

/**
 * Create a BREAKER_REJECTED error.
 */
export function breakerRejected(relay: string, cause: BreakerError): RelayError {
  return { type: "BREAKER_REJECTED", relay, cause };
}

/**
 * Create a NO_BREAKER error.
 */
export function noBreaker(relay: string): RelayError {
  return { type: "NO_BREAKER", relay };
}

/**
 * Format a RelayError for logging.
 */
export function formatRelayError(error: RelayError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return `Invalid relay settings: ${error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`;
    case "UNKNOWN_CURVE":
      return formatCurveError(error);
    case "BREAKER_REJECTED":
      return `${error.relay}: ${formatBreakerError(error.cause)}`;
    case "NO_BREAKER":
      return `${error.relay} has no interrupting device`;
  }
}
