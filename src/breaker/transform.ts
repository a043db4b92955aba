/**
 * Breaker Module - Pure Transformations
 *
 * Operating-time normalization, clearing-time composition and
 * interrupting capability.
 */
import { type WithDiagnostics, withDiagnostics } from "../diagnostics.js";
import type { BreakerSettings, InterruptingDevice } from "./schema.js";

/**
 * Operating time in seconds.
 * Explicit milliseconds win over the cycle count.
 *
 * @param settings - Validated breaker settings
 * @param lineFrequencyHz - System frequency used for the cycle count
 */
export function operatingTimeSeconds(
  settings: Pick<BreakerSettings, "operatingTimeCycles" | "operatingTimeMs">,
  lineFrequencyHz: number,
): number {
  if (settings.operatingTimeMs !== undefined) {
    return settings.operatingTimeMs / 1000;
  }
  return settings.operatingTimeCycles / lineFrequencyHz;
}

/**
 * Relay trip time plus breaker operating time.
 * A relay that does not trip (null) stays null.
 */
export function totalClearingTime(
  device: Pick<InterruptingDevice, "operatingTime">,
  relayTripTime: number | null,
): number | null {
  if (relayTripTime === null) {
    return null;
  }
  return relayTripTime + device.operatingTime;
}

/**
 * Whether the breaker can interrupt a fault of `faultKa` (symmetrical kA).
 */
export function checkInterruptingCapability(
  device: Pick<InterruptingDevice, "settings">,
  faultKa: number,
): WithDiagnostics<boolean> {
  const ratingKa = device.settings.interruptingRatingKaSym;

  if (faultKa > ratingKa) {
    return withDiagnostics(false, [
      {
        type: "INTERRUPTING_RATING_EXCEEDED",
        breaker: device.settings.name,
        faultKa,
        ratingKa,
      },
    ]);
  }

  return withDiagnostics(true);
}
