/**
 * Relay sets for coordination tests.
 */
import {
  type InterruptingDevice,
  createInterruptingDevice,
} from "../../breaker/index.js";
import { createCurrentSensor } from "../../current-sensor/index.js";
import { type ProtectionRelay, createRelay } from "../../relay/index.js";

export const sensor = createCurrentSensor({
  name: "CT1",
  primaryRating: 400,
  secondaryRating: 1,
  accuracyClassIec: "10P20",
})._unsafeUnwrap().value;

/**
 * Relay whose only element is a definite-time instantaneous at 100 A.
 */
export const definiteTimeRelay = (
  name: string,
  delayMs: number,
  breaker: InterruptingDevice | null = null,
): ProtectionRelay =>
  createRelay(
    { name, phaseInstantaneous: { pickup: 100, delayMs } },
    sensor,
    breaker,
  )._unsafeUnwrap();

export const breaker = (name: string, operatingTimeMs: number) =>
  createInterruptingDevice({ name, operatingTimeMs })._unsafeUnwrap();
