/**
 * Relay transformation tests - element selection and the trip decision.
 */
import { describe, expect, it } from "vitest";
import {
  armedElements,
  clearingOutcome,
  evaluateTrip,
  generateTccSeries,
  logSpacedCurrents,
  tripTimeOf,
} from "../transform.js";
import { buildRelay } from "./fixtures.js";

const tripAt = (
  relay: ReturnType<typeof buildRelay>,
  current: number,
  faultType: "phase" | "ground" = "phase",
) => evaluateTrip(armedElements(relay, faultType), current)._unsafeUnwrap();

describe("armedElements", () => {
  it("converts the instantaneous delay to seconds", () => {
    const pair = armedElements(buildRelay(), "phase");

    expect(pair.instantaneous).toEqual({
      element: "PHASE_INSTANTANEOUS",
      pickup: 900,
      delay: 0.05,
    });
    expect(pair.time?.element).toBe("PHASE_TIME");
    expect(pair.time?.tms).toBe(0.3);
  });

  it("disarms elements with no pickup", () => {
    const pair = armedElements(buildRelay(), "ground");

    expect(pair).toEqual({ instantaneous: null, time: null });
  });

  it("disarms disabled elements that have a pickup", () => {
    const relay = buildRelay({
      phaseTime: { pickup: 150, enabled: false },
      phaseInstantaneous: { pickup: 900, enabled: false },
    });

    expect(armedElements(relay, "phase")).toEqual({
      instantaneous: null,
      time: null,
    });
  });
});

describe("evaluateTrip", () => {
  it("computes the IEC normal inverse time at 200 A", () => {
    const outcome = tripAt(buildRelay(), 200);

    expect(outcome.type).toBe("TRIP");
    if (outcome.type === "TRIP") {
      expect(outcome.element).toBe("PHASE_TIME");
      expect(outcome.time).toBeCloseTo(7.28, 2);
    }
  });

  it("computes the IEC normal inverse time at 400 A", () => {
    expect(tripTimeOf(tripAt(buildRelay(), 400))).toBeCloseTo(2.12, 2);
  });

  it("returns exactly the instantaneous delay above the 50 pickup", () => {
    expect(tripAt(buildRelay(), 1600)).toEqual({
      type: "TRIP",
      time: 0.05,
      element: "PHASE_INSTANTANEOUS",
    });
  });

  it("trips instantaneous exactly at its pickup", () => {
    expect(tripAt(buildRelay(), 900)).toEqual({
      type: "TRIP",
      time: 0.05,
      element: "PHASE_INSTANTANEOUS",
    });
  });

  it("gives the instantaneous element precedence over a lower time pickup", () => {
    const relay = buildRelay({
      phaseTime: { pickup: 150, curve: "IEC_EI", tms: 0.05 },
      phaseInstantaneous: { pickup: 500, delayMs: 200 },
    });

    // 51 alone would operate in well under 200 ms at 60 × pickup
    expect(tripAt(relay, 9000)).toEqual({
      type: "TRIP",
      time: 0.2,
      element: "PHASE_INSTANTANEOUS",
    });
  });

  it("does not trip below pickup", () => {
    expect(tripAt(buildRelay(), 100)).toEqual({ type: "NO_TRIP" });
  });

  it.each(["IEC_NI", "IEC_VI", "IEEE_MI", "IEEE_VI", "ANSI_ST", "IEC_61363_B"])(
    "does not trip exactly at pickup on %s",
    (curve) => {
      const relay = buildRelay({ phaseTime: { pickup: 150, curve, tms: 0.5 } });

      expect(tripAt(relay, 150)).toEqual({ type: "NO_TRIP" });
    },
  );

  it("decreases strictly as current rises above pickup", () => {
    const relay = buildRelay({ phaseTime: { pickup: 150, curve: "IEEE_EI", tms: 2 } });
    const times = [151, 160, 200, 400, 800, 3000].map((current) =>
      tripTimeOf(tripAt(relay, current)),
    );

    for (let i = 1; i < times.length; i++) {
      expect(times[i]).toBeLessThan(times[i - 1] ?? Number.NaN);
    }
  });

  it("evaluates ground elements for ground faults", () => {
    const relay = buildRelay({
      phaseTime: { pickup: 150 },
      groundTime: { pickup: 40, curve: "IEC_VI", tms: 0.1 },
      groundInstantaneous: { pickup: 400, delayMs: 100 },
    });

    // 13.5 × 0.1 / (2 − 1)
    const timed = tripAt(relay, 80, "ground");
    expect(timed.type === "TRIP" && timed.element).toBe("GROUND_TIME");
    expect(tripTimeOf(timed)).toBeCloseTo(1.35, 12);
    expect(tripAt(relay, 500, "ground")).toEqual({
      type: "TRIP",
      time: 0.1,
      element: "GROUND_INSTANTANEOUS",
    });
    expect(tripAt(relay, 100, "phase")).toEqual({ type: "NO_TRIP" });
  });

  it("does not trip when the multiple rounds the curve denominator to zero", () => {
    // 150.00000000000003 / 150 is 1 + 2^-52; raised to 0.02 it rounds to 1
    expect(tripAt(buildRelay(), 150.00000000000003)).toEqual({ type: "NO_TRIP" });
  });

  it("never trips with no armed element", () => {
    expect(tripAt(buildRelay({}), 1e6)).toEqual({ type: "NO_TRIP" });
  });

  describe("unknown curve", () => {
    const relay = buildRelay({
      phaseTime: { pickup: 150, curve: "IEC_BOGUS" },
      phaseInstantaneous: { pickup: 900 },
    });
    const pair = armedElements(relay, "phase");

    it("fails when the time element has to operate", () => {
      const result = evaluateTrip(pair, 300);

      expect(result.isErr()).toBe(true);
      if (result.isErr()) {
        expect(result.error.type).toBe("UNKNOWN_CURVE");
        expect(result.error.curveId).toBe("IEC_BOGUS");
      }
    });

    it("still lets the instantaneous element operate", () => {
      expect(evaluateTrip(pair, 1000).isOk()).toBe(true);
    });

    it("does not fail below pickup", () => {
      expect(evaluateTrip(pair, 100)._unsafeUnwrap()).toEqual({ type: "NO_TRIP" });
    });
  });
});

describe("clearingOutcome", () => {
  const breaker = { operatingTime: 0.25 };

  it("adds the breaker operating time", () => {
    expect(
      clearingOutcome({ type: "TRIP", time: 0.5, element: "PHASE_TIME" }, breaker),
    ).toEqual({
      type: "CLEARED",
      element: "PHASE_TIME",
      relayTime: 0.5,
      operatingTime: 0.25,
      totalTime: 0.75,
    });
  });

  it("propagates no trip", () => {
    expect(clearingOutcome({ type: "NO_TRIP" }, breaker)).toEqual({
      type: "NO_TRIP",
    });
  });
});

describe("generateTccSeries", () => {
  it("pairs each current with its trip time, null for no trip", () => {
    const series = generateTccSeries(buildRelay(), [100, 150, 1600], "phase");

    expect(series.isOk()).toBe(true);
    if (series.isOk()) {
      expect([...series.value]).toEqual([
        { current: 100, tripTime: null },
        { current: 150, tripTime: null },
        { current: 1600, tripTime: 0.05 },
      ]);
    }
  });

  it("can be iterated more than once", () => {
    const series = generateTccSeries(buildRelay(), [200, 400], "phase")._unsafeUnwrap();

    expect([...series]).toEqual([...series]);
  });

  it("is lazy", () => {
    let pulled = 0;
    function* currents() {
      for (const current of [200, 400, 800]) {
        pulled++;
        yield current;
      }
    }

    const series = generateTccSeries(buildRelay(), { [Symbol.iterator]: currents }, "phase")._unsafeUnwrap();
    expect(pulled).toBe(0);

    const first = series[Symbol.iterator]().next();
    expect(first.done).toBe(false);
    expect(pulled).toBe(1);
  });

  it("fails up front for an armed time element on an unknown curve", () => {
    const relay = buildRelay({ phaseTime: { pickup: 150, curve: "NOPE" } });

    expect(generateTccSeries(relay, [200], "phase").isErr()).toBe(true);
  });

  it("fails up front even when no current would reach the curve", () => {
    const relay = buildRelay({ phaseTime: { pickup: 150, curve: "NOPE" } });
    const pair = armedElements(relay, "phase");

    expect(evaluateTrip(pair, 100).isOk()).toBe(true);
    expect(generateTccSeries(relay, [100], "phase").isErr()).toBe(true);
  });

  it("ignores unknown curves on disarmed elements", () => {
    const relay = buildRelay({ phaseTime: { pickup: null, curve: "NOPE" } });
    const series = generateTccSeries(relay, [200], "phase")._unsafeUnwrap();

    expect([...series]).toEqual([{ current: 200, tripTime: null }]);
  });
});

describe("logSpacedCurrents", () => {
  it("spans the range on a log scale, inclusive", () => {
    const currents = logSpacedCurrents(10, 1000, 3);

    expect(currents).toHaveLength(3);
    expect(currents[0]).toBe(10);
    expect(currents[1]).toBeCloseTo(100, 9);
    expect(currents[2]).toBe(1000);
  });

  it("handles degenerate counts", () => {
    expect(logSpacedCurrents(10, 1000, 0)).toEqual([]);
    expect(logSpacedCurrents(10, 1000, 1)).toEqual([10]);
  });
});
