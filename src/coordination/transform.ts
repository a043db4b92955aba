/**
 * Coordination Module - Pure Transformations
 *
 * Table layout, selectivity ranking and inventory summaries.
 * No side effects - relays and outcomes in, plain data out.
 */
import type { InterruptingDevice } from "../breaker/index.js";
import type { CurrentSensor } from "../current-sensor/index.js";
import {
  ANSI_DEVICE_NUMBERS,
  type ClearingOutcome,
  type ProtectionRelay,
  type TripOutcome,
  armedElements,
} from "../relay/index.js";
import type {
  BreakerSummary,
  ElementSummary,
  ProtectionSummary,
  RelaySummary,
  SelectivityEntry,
  TableCell,
  TableColumn,
} from "./schema.js";

/**
 * A margin within this many seconds below the minimum still counts as
 * meeting it (0.7 − 0.4 evaluates to 0.29999999999999993).
 */
export const MARGIN_TOLERANCE_S = 1e-9;

// =============================================================================
// Relay Sets
// =============================================================================

/**
 * First relay name that appears more than once, or null.
 */
export function findDuplicateRelay(
  relays: ReadonlyArray<ProtectionRelay>,
): string | null {
  const seen = new Set<string>();
  for (const relay of relays) {
    const { name } = relay.settings;
    if (seen.has(name)) {
      return name;
    }
    seen.add(name);
  }
  return null;
}

// =============================================================================
// Coordination Table
// =============================================================================

/**
 * One RELAY column per relay, followed by a TOTAL column when it has a
 * breaker.
 */
export function tableColumns(
  relays: ReadonlyArray<ProtectionRelay>,
): ReadonlyArray<TableColumn> {
  return relays.flatMap((relay): TableColumn[] =>
    relay.breaker === null
      ? [{ relay: relay.settings.name, kind: "RELAY" }]
      : [
          { relay: relay.settings.name, kind: "RELAY" },
          { relay: relay.settings.name, kind: "TOTAL" },
        ],
  );
}

export function tripCell(outcome: TripOutcome): TableCell {
  if (outcome.type === "NO_TRIP") {
    return { type: "NO_TRIP" };
  }
  return { type: "TIME", seconds: outcome.time, element: outcome.element };
}

export function clearingCell(outcome: ClearingOutcome): TableCell {
  if (outcome.type === "NO_TRIP") {
    return { type: "NO_TRIP" };
  }
  return { type: "TIME", seconds: outcome.totalTime, element: outcome.element };
}

// =============================================================================
// Selectivity
// =============================================================================

/**
 * Rank tripping relays fastest first and grade each against the one before.
 *
 * Non-tripping relays are dropped. Equal trip times keep input order (the
 * sort is stable). The fastest relay is PRIMARY with no margin.
 */
export function rankSelectivity(
  outcomes: ReadonlyArray<Readonly<{ relay: string; outcome: TripOutcome }>>,
  minMargin: number,
): ReadonlyArray<SelectivityEntry> {
  const ordered = outcomes
    .flatMap(({ relay, outcome }) =>
      outcome.type === "TRIP"
        ? [{ relay, tripTime: outcome.time, element: outcome.element }]
        : [],
    )
    .sort((a, b) => a.tripTime - b.tripTime);

  return ordered.map((entry, i): SelectivityEntry => {
    if (i === 0) {
      return { ...entry, margin: null, selective: true, role: "PRIMARY" };
    }

    const margin = entry.tripTime - ordered[i - 1].tripTime;
    return {
      ...entry,
      margin,
      selective: margin + MARGIN_TOLERANCE_S >= minMargin,
      role: "BACKUP",
    };
  });
}

// =============================================================================
// Protection Summary
// =============================================================================

const elementSummaries = (relay: ProtectionRelay): ElementSummary[] =>
  (["phase", "ground"] as const).flatMap((faultType) => {
    const { instantaneous, time } = armedElements(relay, faultType);
    return [time, instantaneous].flatMap((armed) =>
      armed === null
        ? []
        : [
            {
              element: armed.element,
              deviceNumber: ANSI_DEVICE_NUMBERS[armed.element],
              pickup: armed.pickup,
            },
          ],
    );
  });

const breakerSummary = (breaker: InterruptingDevice): BreakerSummary => ({
  name: breaker.settings.name,
  breakerType: breaker.settings.breakerType,
  interruptingRatingKaSym: breaker.settings.interruptingRatingKaSym,
  operatingTime: breaker.operatingTime,
  state: breaker.state(),
  relay: breaker.relay(),
});

/**
 * Inventory of the sensors, relays and breakers in a relay set.
 * A sensor shared by several relays is listed once.
 */
export function summarizeProtection(
  relays: ReadonlyArray<ProtectionRelay>,
): ProtectionSummary {
  const sensors = [...new Set<CurrentSensor>(relays.map((r) => r.sensor))];
  const breakers = relays.flatMap((r) => (r.breaker === null ? [] : [r.breaker]));

  return {
    sensors: sensors.map((sensor) => ({
      name: sensor.settings.name,
      ratio: `${sensor.settings.primaryRating}/${sensor.settings.secondaryRating}`,
      accuracyClass: sensor.settings.accuracyClassIec,
    })),
    relays: relays.map(
      (relay): RelaySummary => ({
        name: relay.settings.name,
        manufacturer: relay.settings.manufacturer ?? null,
        model: relay.settings.model ?? null,
        sensor: relay.sensor.settings.name,
        breaker: relay.breaker?.settings.name ?? null,
        elements: elementSummaries(relay),
      }),
    ),
    breakers: breakers.map(breakerSummary),
  };
}
