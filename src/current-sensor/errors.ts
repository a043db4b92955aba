/**
 * Current Sensor Module - Error Types
 */
import type { ZodIssue } from "zod";

/**
 * Errors that can occur while configuring a current sensor.
 */
export type SensorError = {
  readonly type: "VALIDATION_FAILED";
  readonly issues: ReadonlyArray<ZodIssue>;
};

/**
 * Helper to create validation error.
 */
export const validationError = (
  issues: ReadonlyArray<ZodIssue>,
): SensorError => ({
  type: "VALIDATION_FAILED",
  issues,
});

/**
 * Format a SensorError for logging.
 */
export function formatSensorError(error: SensorError): string {
  switch (error.type) {
    case "VALIDATION_FAILED":
      return `Invalid current sensor settings: ${error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ")}`;
  }
}
