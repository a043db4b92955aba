/**
 * Current Sensor Service - validates settings and surfaces diagnostics.
 */
import { type Result, err, ok } from "neverthrow";
import { type WithDiagnostics, formatDiagnostic } from "../diagnostics.js";
import { createLogger } from "../logger.js";
import { type SensorError, validationError } from "./errors.js";
import {
  type CurrentSensor,
  type CurrentSensorInput,
  CurrentSensorSettingsSchema,
} from "./schema.js";
import { buildCurrentSensor } from "./transform.js";

const log = createLogger("sensor");

/**
 * Create a current sensor from (partial) settings.
 * A malformed accuracy class is a diagnostic, not an error.
 */
export const createCurrentSensor = (
  input: CurrentSensorInput = {},
): Result<WithDiagnostics<CurrentSensor>, SensorError> => {
  const parsed = CurrentSensorSettingsSchema.safeParse(input);
  if (!parsed.success) {
    log.warn(
      { operation: "createCurrentSensor", issues: parsed.error.issues },
      "  ↳ Validation failed",
    );
    return err(validationError(parsed.error.issues));
  }

  const built = buildCurrentSensor(parsed.data);
  for (const diagnostic of built.diagnostics) {
    log.warn(
      { operation: "createCurrentSensor", diagnostic },
      formatDiagnostic(diagnostic),
    );
  }

  log.debug(
    {
      operation: "createCurrentSensor",
      sensor: parsed.data.name,
      ratio: built.value.ratio,
      accuracyLimit: built.value.accuracyLimit,
    },
    "✓ Current sensor configured",
  );

  return ok(built);
};
