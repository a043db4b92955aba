/**
 * Coordination Module - Error Types
 */
import type { ZodIssue } from "zod";
import { type RelayError, formatRelayError } from "../relay/index.js";

/**
 * Errors that abort a coordination study.
 */
export type CoordinationError =
  | {
      readonly type: "VALIDATION_FAILED";
      readonly issues: ReadonlyArray<ZodIssue>;
    }
  | {
      readonly type: "DUPLICATE_RELAY";
      readonly relay: string;
    }
  | {
      readonly type: "EVALUATION_FAILED";
      readonly relay: string;
      readonly current: number;
      readonly cause: RelayError;
    };

/**
 * Helper to create validation error.
 */
export const validationError = (
  issues: ReadonlyArray<ZodIssue>,
): CoordinationError => ({
  type: "VALIDATION_FAILED",
  issues,
});

/**
 * Create a DUPLICATE_RELAY error.
 */
export function duplicateRelay(relay: string): CoordinationError {
  return { type: "DUPLICATE_RELAY", relay };
}

/**
 * Create an EVALUATION_FAILED error.
 */
export function evaluationFailed(
  relay: string,
  current: number,
  cause: RelayError,
): CoordinationError {
  return { type: "EVALUATION_FAILED", relay, current, cause };
}

/**
 * Format a CoordinationError for logging.
 */
export function formatCoordinationError(error: CoordinationError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return `Invalid coordination input: ${error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`;
    case "DUPLICATE_RELAY":
      return `Relay name ${error.relay} appears more than once`;
    case "EVALUATION_FAILED":
      return `${error.relay} at ${error.current}A: ${formatRelayError(error.cause)}`;
  }
}
