/**
 * Shared relay builders for tests.
 */
import type { InterruptingDevice } from "../../breaker/index.js";
import { createCurrentSensor } from "../../current-sensor/index.js";
import type { ProtectionRelay, RelayInput } from "../schema.js";
import { createRelay } from "../service.js";

export const testSensor = () =>
  createCurrentSensor({ name: "CT1", primaryRating: 200, secondaryRating: 5 })
    ._unsafeUnwrap().value;

/**
 * Feeder relay: 51 at 150 A on IEC NI, TMS 0.3, and 50 at 900 A / 50 ms.
 */
export const FEEDER_SETTINGS: RelayInput = {
  name: "Relay1",
  phaseTime: { pickup: 150, curve: "IEC_NI", tms: 0.3 },
  phaseInstantaneous: { pickup: 900, delayMs: 50 },
};

export const buildRelay = (
  input: RelayInput = FEEDER_SETTINGS,
  breaker: InterruptingDevice | null = null,
): ProtectionRelay => createRelay(input, testSensor(), breaker)._unsafeUnwrap();
