/**
 * Relay Module - Pure Transformations
 *
 * Element selection, the trip decision and TCC series generation.
 * No side effects, no I/O - configuration and current in, outcome out.
 */
import { type Result, ok } from "neverthrow";
import {
  type InterruptingDevice,
  totalClearingTime,
} from "../breaker/index.js";
import {
  type Curve,
  type CurveError,
  curveOperateTime,
} from "../curves/index.js";
import type {
  ClearingOutcome,
  FaultType,
  ProtectionElement,
  ProtectionRelay,
  TccPoint,
  TripOutcome,
} from "./schema.js";

// =============================================================================
// Armed Elements
// =============================================================================

export type ArmedInstantaneous = Readonly<{
  element: ProtectionElement;
  pickup: number;
  /** Fixed operate delay (s) */
  delay: number;
}>;

/**
 * `C` is the curve binding: a Result before resolution, a Curve after.
 */
export type ArmedTime<C> = Readonly<{
  element: ProtectionElement;
  pickup: number;
  tms: number;
  curve: C;
}>;

/**
 * The instantaneous and time element for one fault type. A null entry is
 * disabled or has no pickup.
 */
export type ElementPair<C> = Readonly<{
  instantaneous: ArmedInstantaneous | null;
  time: ArmedTime<C> | null;
}>;

export const NO_TRIP: TripOutcome = { type: "NO_TRIP" };

/**
 * Select the armed elements for a fault type.
 */
export function armedElements(
  relay: ProtectionRelay,
  faultType: FaultType,
): ElementPair<Result<Curve, CurveError>> {
  const { settings } = relay;
  const selected =
    faultType === "phase"
      ? {
          instantaneous: settings.phaseInstantaneous,
          instantaneousElement: "PHASE_INSTANTANEOUS" as const,
          time: settings.phaseTime,
          timeElement: "PHASE_TIME" as const,
          curve: relay.phaseCurve,
        }
      : {
          instantaneous: settings.groundInstantaneous,
          instantaneousElement: "GROUND_INSTANTANEOUS" as const,
          time: settings.groundTime,
          timeElement: "GROUND_TIME" as const,
          curve: relay.groundCurve,
        };

  const instPickup = selected.instantaneous.pickup;
  const timePickup = selected.time.pickup;

  return {
    instantaneous:
      selected.instantaneous.enabled && instPickup !== null
        ? {
            element: selected.instantaneousElement,
            pickup: instPickup,
            delay: selected.instantaneous.delayMs / 1000,
          }
        : null,
    time:
      selected.time.enabled && timePickup !== null
        ? {
            element: selected.timeElement,
            pickup: timePickup,
            tms: selected.time.tms,
            curve: selected.curve,
          }
        : null,
  };
}

/**
 * Swap the time element's curve binding for the resolved curve.
 */
export function resolveCurves(
  pair: ElementPair<Result<Curve, CurveError>>,
): Result<ElementPair<Curve>, CurveError> {
  const { instantaneous, time } = pair;
  if (time === null) {
    return ok({ instantaneous, time: null });
  }
  return time.curve.map((curve) => ({
    instantaneous,
    time: { ...time, curve },
  }));
}

// =============================================================================
// Trip Decision
// =============================================================================

type Decision<C> =
  | { readonly type: "DECIDED"; readonly outcome: TripOutcome }
  | {
      readonly type: "ON_CURVE";
      readonly time: ArmedTime<C>;
      readonly multiple: number;
    };

/**
 * Instantaneous first (absolute precedence), then the time element.
 * Current exactly at the time pickup (M = 1) does not trip.
 */
function decide<C>(pair: ElementPair<C>, current: number): Decision<C> {
  const { instantaneous, time } = pair;

  if (instantaneous !== null && current >= instantaneous.pickup) {
    return {
      type: "DECIDED",
      outcome: {
        type: "TRIP",
        time: instantaneous.delay,
        element: instantaneous.element,
      },
    };
  }

  // Negated so NaN falls through to NO_TRIP
  if (time === null || !(current >= time.pickup)) {
    return { type: "DECIDED", outcome: NO_TRIP };
  }

  const multiple = current / time.pickup;
  if (multiple <= 1) {
    return { type: "DECIDED", outcome: NO_TRIP };
  }

  return { type: "ON_CURVE", time, multiple };
}

/**
 * A multiple a few ulps above 1 can round the curve denominator to zero;
 * a time that is not finite and positive is no trip.
 */
function curveTrip(time: ArmedTime<Curve>, multiple: number): TripOutcome {
  const seconds = curveOperateTime(time.curve, multiple, time.tms);
  if (!(Number.isFinite(seconds) && seconds > 0)) {
    return NO_TRIP;
  }
  return { type: "TRIP", time: seconds, element: time.element };
}

/**
 * Trip outcome for one current. Fails only when the time element must
 * operate on an unknown curve.
 */
export function evaluateTrip(
  pair: ElementPair<Result<Curve, CurveError>>,
  current: number,
): Result<TripOutcome, CurveError> {
  const decision = decide(pair, current);
  if (decision.type === "DECIDED") {
    return ok(decision.outcome);
  }
  const { time, multiple } = decision;
  return time.curve.map((curve) => curveTrip({ ...time, curve }, multiple));
}

/**
 * Trip outcome for one current with curves already resolved.
 */
export function evaluateResolvedTrip(
  pair: ElementPair<Curve>,
  current: number,
): TripOutcome {
  const decision = decide(pair, current);
  if (decision.type === "DECIDED") {
    return decision.outcome;
  }
  return curveTrip(decision.time, decision.multiple);
}

/**
 * Trip time in seconds, or null for no trip.
 */
export function tripTimeOf(outcome: TripOutcome): number | null {
  return outcome.type === "TRIP" ? outcome.time : null;
}

/**
 * Compose a relay outcome with its breaker's operating time.
 */
export function clearingOutcome(
  outcome: TripOutcome,
  breaker: Pick<InterruptingDevice, "operatingTime">,
): ClearingOutcome {
  const totalTime = totalClearingTime(breaker, tripTimeOf(outcome));
  if (outcome.type === "NO_TRIP" || totalTime === null) {
    return { type: "NO_TRIP" };
  }
  return {
    type: "CLEARED",
    element: outcome.element,
    relayTime: outcome.time,
    operatingTime: breaker.operatingTime,
    totalTime,
  };
}

// =============================================================================
// Time-Current Characteristic
// =============================================================================

/**
 * Lazy (current, trip time) series over `currents`.
 *
 * Iterating the result twice walks `currents` twice; nothing is cached.
 * Fails up front when the armed time element has an unknown curve.
 */
export function generateTccSeries(
  relay: ProtectionRelay,
  currents: Iterable<number>,
  faultType: FaultType,
): Result<Iterable<TccPoint>, CurveError> {
  return resolveCurves(armedElements(relay, faultType)).map((pair) => ({
    *[Symbol.iterator](): Generator<TccPoint> {
      for (const current of currents) {
        yield {
          current,
          tripTime: tripTimeOf(evaluateResolvedTrip(pair, current)),
        };
      }
    },
  }));
}

/**
 * `count` currents spaced evenly on a log scale from `min` to `max`
 * inclusive.
 */
export function logSpacedCurrents(
  min: number,
  max: number,
  count: number,
): ReadonlyArray<number> {
  if (count < 1) {
    return [];
  }
  if (count === 1) {
    return [min];
  }

  const ratio = max / min;
  return Array.from({ length: count }, (_, i) => {
    if (i === 0) return min;
    if (i === count - 1) return max;
    return min * ratio ** (i / (count - 1));
  });
}
