/**
 * Coordination Module - Schemas and Types
 *
 * Trip-time tables, selectivity results and adequacy checks over an explicit
 * set of relays. Relay sets are plain arrays owned by the caller.
 */
import { z } from "zod";
import type { BreakerState, BreakerType } from "../breaker/index.js";
import type { FaultType, ProtectionElement } from "../relay/index.js";

// =============================================================================
// Inputs
// =============================================================================

export const FaultCurrentSchema = z
  .number()
  .finite()
  .nonnegative()
  .describe("Fault current magnitude (A primary)");

export const FaultCurrentsSchema = z.array(FaultCurrentSchema);

export const MinMarginSchema = z
  .number()
  .finite()
  .nonnegative()
  .describe("Minimum grading margin between successive relays (s)");

// =============================================================================
// Coordination Table
// =============================================================================

/**
 * RELAY columns hold relay operate time, TOTAL columns relay time plus
 * breaker operating time. A relay gets a TOTAL column only if it has a
 * breaker.
 */
export type TableColumn = Readonly<{
  relay: string;
  kind: "RELAY" | "TOTAL";
}>;

/**
 * NO_TRIP is a distinct cell, never a zero or negative time.
 */
export type TableCell =
  | { readonly type: "NO_TRIP" }
  | {
      readonly type: "TIME";
      readonly seconds: number;
      readonly element: ProtectionElement;
    };

export type TableRow = Readonly<{
  current: number;
  /** One cell per column, in column order */
  cells: ReadonlyArray<TableCell>;
}>;

export type CoordinationTable = Readonly<{
  faultType: FaultType;
  columns: ReadonlyArray<TableColumn>;
  rows: ReadonlyArray<TableRow>;
}>;

// =============================================================================
// Selectivity
// =============================================================================

export type SelectivityEntry = Readonly<{
  relay: string;
  tripTime: number;
  element: ProtectionElement;
  /** Gap to the next-faster relay (s); null for the primary */
  margin: number | null;
  selective: boolean;
  role: "PRIMARY" | "BACKUP";
}>;

export type SelectivityReport = Readonly<{
  faultCurrent: number;
  faultType: FaultType;
  minMargin: number;
  /** Tripping relays, fastest first */
  entries: ReadonlyArray<SelectivityEntry>;
  /** True when every entry is selective */
  selective: boolean;
}>;

// =============================================================================
// Breaker Adequacy
// =============================================================================

export type AdequacyEntry = Readonly<{
  breaker: string;
  faultKa: number;
  ratingKa: number;
  adequate: boolean;
}>;

// =============================================================================
// Protection Summary
// =============================================================================

export type SensorSummary = Readonly<{
  name: string;
  ratio: string;
  accuracyClass: string;
}>;

export type ElementSummary = Readonly<{
  element: ProtectionElement;
  deviceNumber: string;
  pickup: number;
}>;

export type RelaySummary = Readonly<{
  name: string;
  manufacturer: string | null;
  model: string | null;
  sensor: string;
  breaker: string | null;
  elements: ReadonlyArray<ElementSummary>;
}>;

export type BreakerSummary = Readonly<{
  name: string;
  breakerType: BreakerType;
  interruptingRatingKaSym: number;
  operatingTime: number;
  state: BreakerState;
  relay: string | null;
}>;

export type ProtectionSummary = Readonly<{
  sensors: ReadonlyArray<SensorSummary>;
  relays: ReadonlyArray<RelaySummary>;
  breakers: ReadonlyArray<BreakerSummary>;
}>;
