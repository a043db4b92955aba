/**
 * Breaker Module - Schemas and Types
 *
 * Interrupting device ratings, operating time and open/closed state.
 */
import type { Result } from "neverthrow";
import { z } from "zod";
import type { BreakerError } from "./errors.js";

// =============================================================================
// Breaker Type and State
// =============================================================================

/**
 * Interrupting medium / construction.
 */
export const BreakerTypeSchema = z.enum(["VCB", "SF6", "OIL", "ACB", "MCCB"]);

export type BreakerType = z.infer<typeof BreakerTypeSchema>;

export const BreakerStateSchema = z.enum(["OPEN", "CLOSED"]);

export type BreakerState = z.infer<typeof BreakerStateSchema>;

// =============================================================================
// Settings
// =============================================================================

/**
 * Breaker settings. `operatingTimeMs`, when given, overrides
 * `operatingTimeCycles`.
 */
export const BreakerSettingsSchema = z.object({
  name: z.string().min(1).default("CB"),
  breakerType: BreakerTypeSchema.default("VCB"),
  ratedVoltageKv: z.number().positive().default(24),
  continuousCurrentA: z.number().positive().default(630),
  interruptingRatingKaSym: z
    .number()
    .positive()
    .default(25)
    .describe("Symmetrical breaking capacity (kA RMS)"),
  interruptingRatingKaAsym: z
    .number()
    .positive()
    .default(25)
    .describe("Asymmetrical breaking capacity including DC offset (kA RMS)"),
  makingCapacityKaPeak: z
    .number()
    .positive()
    .default(63)
    .describe("Peak making capacity (kA peak)"),
  operatingTimeCycles: z.number().nonnegative().default(3),
  operatingTimeMs: z.number().nonnegative().optional(),
});

export type BreakerInput = z.input<typeof BreakerSettingsSchema>;
export type BreakerSettings = z.infer<typeof BreakerSettingsSchema>;

// =============================================================================
// Device
// =============================================================================

/**
 * The relay side of a breaker association. Compared by identity, so two
 * relays that share a name are still two relays.
 */
export type RelayLink = Readonly<{ name: string }>;

/**
 * A configured breaker. Everything except the open/closed state and the
 * associated relay is fixed at construction.
 */
export interface InterruptingDevice {
  readonly settings: BreakerSettings;
  /** Mechanical plus arc-interruption time (s) */
  readonly operatingTime: number;
  readonly state: () => BreakerState;
  readonly open: () => void;
  readonly close: () => void;
  /** Name of the relay that trips this breaker, if any */
  readonly relay: () => string | null;
  readonly associateRelay: (link: RelayLink) => Result<void, BreakerError>;
}
