/**
 * Relay Module - Schemas and Types
 *
 * Four independently configurable overcurrent elements:
 * - phase time (51) and phase instantaneous (50)
 * - ground time (51N) and ground instantaneous (50N)
 *
 * A null pickup disables an element regardless of its enabled flag.
 */
import type { Result } from "neverthrow";
import { z } from "zod";
import type { InterruptingDevice } from "../breaker/index.js";
import type { CurrentSensor } from "../current-sensor/index.js";
import type { Curve, CurveError } from "../curves/index.js";

// =============================================================================
// Fault Types and Elements
// =============================================================================

export const FaultTypeSchema = z.enum(["phase", "ground"]);

export type FaultType = z.infer<typeof FaultTypeSchema>;

export const ProtectionElementSchema = z.enum([
  "PHASE_INSTANTANEOUS",
  "PHASE_TIME",
  "GROUND_INSTANTANEOUS",
  "GROUND_TIME",
]);

export type ProtectionElement = z.infer<typeof ProtectionElementSchema>;

/**
 * ANSI/IEEE C37.2 device numbers.
 */
export const ANSI_DEVICE_NUMBERS: Readonly<Record<ProtectionElement, string>> =
  {
    PHASE_INSTANTANEOUS: "50",
    PHASE_TIME: "51",
    GROUND_INSTANTANEOUS: "50N",
    GROUND_TIME: "51N",
  };

// =============================================================================
// Element Settings
// =============================================================================

const PickupSchema = z
  .number()
  .positive()
  .finite()
  .nullable()
  .default(null)
  .describe("Pickup (A primary); null disables the element");

export const TimeElementSettingsSchema = z.object({
  pickup: PickupSchema,
  curve: z.string().min(1).default("IEC_NI"),
  tms: z.number().positive().finite().default(0.4),
  enabled: z.boolean().default(true),
});

export type TimeElementSettings = z.infer<typeof TimeElementSettingsSchema>;

export const InstantaneousElementSettingsSchema = z.object({
  pickup: PickupSchema,
  delayMs: z.number().nonnegative().finite().default(50),
  enabled: z.boolean().default(true),
});

export type InstantaneousElementSettings = z.infer<
  typeof InstantaneousElementSettingsSchema
>;

export const RelaySettingsSchema = z.object({
  name: z.string().min(1).default("Relay"),
  manufacturer: z.string().optional(),
  model: z.string().optional(),
  phaseTime: TimeElementSettingsSchema.default({}),
  phaseInstantaneous: InstantaneousElementSettingsSchema.default({}),
  groundTime: TimeElementSettingsSchema.default({}),
  groundInstantaneous: InstantaneousElementSettingsSchema.default({}),
});

export type RelayInput = z.input<typeof RelaySettingsSchema>;
export type RelaySettings = z.infer<typeof RelaySettingsSchema>;

// =============================================================================
// Configured Relay
// =============================================================================

/**
 * A relay bound to its sensor and (optional) breaker.
 *
 * Curve identifiers are resolved once at construction; an unknown identifier
 * is kept as an error and reported when evaluation reaches the curve.
 */
export type ProtectionRelay = Readonly<{
  settings: RelaySettings;
  sensor: CurrentSensor;
  breaker: InterruptingDevice | null;
  phaseCurve: Result<Curve, CurveError>;
  groundCurve: Result<Curve, CurveError>;
}>;

// =============================================================================
// Outcomes
// =============================================================================

export type TripOutcome =
  | { readonly type: "NO_TRIP" }
  | {
      readonly type: "TRIP";
      /** Relay operate time (s) */
      readonly time: number;
      readonly element: ProtectionElement;
    };

export type ClearingOutcome =
  | { readonly type: "NO_TRIP" }
  | {
      readonly type: "CLEARED";
      readonly element: ProtectionElement;
      readonly relayTime: number;
      readonly operatingTime: number;
      readonly totalTime: number;
    };

/**
 * One point of a time-current characteristic. `tripTime` is null where the
 * relay does not operate.
 */
export type TccPoint = Readonly<{
  current: number;
  tripTime: number | null;
}>;
