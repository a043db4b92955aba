/**
 * Relay Service - configures relays and evaluates them against fault currents.
 *
 * Orchestration reads like the protection sequence:
 * sensor diagnostics → element decision → breaker clearing time.
 */
import { type Result, err, ok } from "neverthrow";
import type { InterruptingDevice } from "../breaker/index.js";
import {
  type CurrentSensor,
  secondaryCurrent,
} from "../current-sensor/index.js";
import { lookupCurve } from "../curves/index.js";
import {
  type WithDiagnostics,
  formatDiagnostic,
  withDiagnostics,
} from "../diagnostics.js";
import { createLogger } from "../logger.js";
import {
  type RelayError,
  breakerRejected,
  formatRelayError,
  noBreaker,
  validationError,
} from "./errors.js";
import {
  type ClearingOutcome,
  type FaultType,
  type ProtectionRelay,
  type RelayInput,
  RelaySettingsSchema,
  type TripOutcome,
} from "./schema.js";
import { armedElements, clearingOutcome, evaluateTrip } from "./transform.js";

const log = createLogger("relay");

/**
 * Configure a relay on its current sensor and optional breaker.
 * The breaker records this relay as the one that trips it.
 */
export const createRelay = (
  input: RelayInput,
  sensor: CurrentSensor,
  breaker: InterruptingDevice | null = null,
): Result<ProtectionRelay, RelayError> => {
  const parsed = RelaySettingsSchema.safeParse(input);
  if (!parsed.success) {
    log.warn(
      { operation: "createRelay", issues: parsed.error.issues },
      "  ↳ Validation failed",
    );
    return err(validationError(parsed.error.issues));
  }

  const settings = parsed.data;

  if (breaker !== null) {
    const associated = breaker.associateRelay(settings);
    if (associated.isErr()) {
      const error = breakerRejected(settings.name, associated.error);
      log.warn({ operation: "createRelay", error }, formatRelayError(error));
      return err(error);
    }
  }

  log.debug(
    {
      operation: "createRelay",
      relay: settings.name,
      sensor: sensor.settings.name,
      breaker: breaker?.settings.name ?? null,
    },
    "✓ Relay configured",
  );

  return ok({
    settings,
    sensor,
    breaker,
    phaseCurve: lookupCurve(settings.phaseTime.curve),
    groundCurve: lookupCurve(settings.groundTime.curve),
  });
};

/**
 * Operate time of whichever element fires first, or NO_TRIP.
 *
 * The sensor's secondary current is computed for saturation diagnostics
 * only; pickups compare against the primary current.
 */
export const calculateTripTime = (
  relay: ProtectionRelay,
  current: number,
  faultType: FaultType = "phase",
): Result<WithDiagnostics<TripOutcome>, RelayError> => {
  const { diagnostics } = secondaryCurrent(relay.sensor, current);
  for (const diagnostic of diagnostics) {
    log.warn(
      { operation: "calculateTripTime", relay: relay.settings.name, diagnostic },
      formatDiagnostic(diagnostic),
    );
  }

  const outcome = evaluateTrip(armedElements(relay, faultType), current);
  if (outcome.isErr()) {
    log.error(
      { operation: "calculateTripTime", relay: relay.settings.name, error: outcome.error },
      formatRelayError(outcome.error),
    );
    return err(outcome.error);
  }

  log.trace(
    {
      operation: "calculateTripTime",
      relay: relay.settings.name,
      current,
      faultType,
      outcome: outcome.value,
    },
    "  ↳ Trip evaluated",
  );

  return ok(withDiagnostics(outcome.value, diagnostics));
};

/**
 * Relay trip time plus breaker operating time, or NO_TRIP.
 */
export const calculateClearingTime = (
  relay: ProtectionRelay,
  current: number,
  faultType: FaultType = "phase",
): Result<WithDiagnostics<ClearingOutcome>, RelayError> => {
  const { breaker } = relay;
  if (breaker === null) {
    return err(noBreaker(relay.settings.name));
  }

  return calculateTripTime(relay, current, faultType).map(
    ({ value, diagnostics }) =>
      withDiagnostics(clearingOutcome(value, breaker), diagnostics),
  );
};
