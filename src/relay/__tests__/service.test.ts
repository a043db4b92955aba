/**
 * Relay service tests - configuration, trip and clearing times.
 */
import { describe, expect, it } from "vitest";
import { createInterruptingDevice } from "../../breaker/index.js";
import { formatRelayError } from "../errors.js";
import {
  calculateClearingTime,
  calculateTripTime,
  createRelay,
} from "../service.js";
import { FEEDER_SETTINGS, buildRelay, testSensor } from "./fixtures.js";

describe("createRelay", () => {
  it("applies element defaults", () => {
    const result = createRelay({}, testSensor());

    expect(result.isOk()).toBe(true);
    if (result.isOk()) {
      const { settings } = result.value;
      expect(settings.name).toBe("Relay");
      expect(settings.phaseTime).toEqual({
        pickup: null,
        curve: "IEC_NI",
        tms: 0.4,
        enabled: true,
      });
      expect(settings.groundInstantaneous).toEqual({
        pickup: null,
        delayMs: 50,
        enabled: true,
      });
      expect(result.value.breaker).toBeNull();
    }
  });

  it("resolves curves at construction", () => {
    const relay = buildRelay({ phaseTime: { curve: "IEEE_VI" }, groundTime: { curve: "X" } });

    expect(relay.phaseCurve.isOk()).toBe(true);
    expect(relay.groundCurve.isErr()).toBe(true);
  });

  it("rejects a non-positive TMS", () => {
    const result = createRelay({ phaseTime: { pickup: 100, tms: 0 } }, testSensor());

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("VALIDATION_FAILED");
    }
  });

  it("rejects a non-positive pickup", () => {
    const result = createRelay(
      { groundInstantaneous: { pickup: -5 } },
      testSensor(),
    );

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(formatRelayError(result.error)).toMatch(
        /^Invalid relay settings: groundInstantaneous\.pickup: /,
      );
    }
  });

  it("associates the breaker with the relay", () => {
    const breaker = createInterruptingDevice({ name: "CB1" })._unsafeUnwrap();

    buildRelay(FEEDER_SETTINGS, breaker);

    expect(breaker.relay()).toBe("Relay1");
  });

  it("refuses a breaker already tripped by another relay", () => {
    const breaker = createInterruptingDevice({ name: "CB1" })._unsafeUnwrap();
    buildRelay({ name: "R1" }, breaker);

    const result = createRelay({ name: "R2" }, testSensor(), breaker);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("BREAKER_REJECTED");
      expect(formatRelayError(result.error)).toBe(
        "R2: CB1 is already tripped by R1, cannot associate R2",
      );
    }
  });

  it("refuses a second default-named relay on the same breaker", () => {
    const breaker = createInterruptingDevice({ name: "CB1" })._unsafeUnwrap();
    const first = createRelay({ phaseTime: { pickup: 100 } }, testSensor(), breaker);

    const second = createRelay({ phaseTime: { pickup: 400 } }, testSensor(), breaker);

    expect(first.isOk()).toBe(true);
    expect(second.isErr()).toBe(true);
    if (second.isErr()) {
      expect(formatRelayError(second.error)).toBe(
        "Relay: CB1 is already tripped by Relay, cannot associate Relay",
      );
    }
    expect(breaker.relay()).toBe("Relay");
  });
});

describe("calculateTripTime", () => {
  it("defaults to phase faults", () => {
    const result = calculateTripTime(buildRelay(), 1600);

    expect(result._unsafeUnwrap()).toEqual({
      value: { type: "TRIP", time: 0.05, element: "PHASE_INSTANTANEOUS" },
      diagnostics: [],
    });
  });

  it("reports sensor saturation but still trips", () => {
    // 200/5 CT, 5P20: accuracy limit 100 A secondary = 4000 A primary
    const result = calculateTripTime(buildRelay(), 5000, "phase")._unsafeUnwrap();

    expect(result.value).toEqual({
      type: "TRIP",
      time: 0.05,
      element: "PHASE_INSTANTANEOUS",
    });
    expect(result.diagnostics).toEqual([
      {
        type: "SENSOR_SATURATION",
        sensor: "CT1",
        secondaryCurrent: 125,
        accuracyLimit: 100,
      },
    ]);
  });

  it("reports saturation on ground faults the same way", () => {
    const result = calculateTripTime(buildRelay(), 5000, "ground")._unsafeUnwrap();

    expect(result.value).toEqual({ type: "NO_TRIP" });
    expect(result.diagnostics).toHaveLength(1);
  });

  it("surfaces an unknown curve when the time element operates", () => {
    const relay = buildRelay({ phaseTime: { pickup: 150, curve: "IEC_BOGUS" } });

    const result = calculateTripTime(relay, 300, "phase");

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error.type).toBe("UNKNOWN_CURVE");
      expect(formatRelayError(result.error)).toContain("Unknown curve type: IEC_BOGUS");
    }
  });
});

describe("calculateClearingTime", () => {
  it("adds the breaker operating time to the relay time", () => {
    const breaker = createInterruptingDevice({ operatingTimeMs: 250 })._unsafeUnwrap();
    const relay = buildRelay(
      { phaseInstantaneous: { pickup: 900, delayMs: 500 } },
      breaker,
    );

    const result = calculateClearingTime(relay, 1600, "phase")._unsafeUnwrap();

    expect(result.value).toEqual({
      type: "CLEARED",
      element: "PHASE_INSTANTANEOUS",
      relayTime: 0.5,
      operatingTime: 0.25,
      totalTime: 0.75,
    });
  });

  it("propagates no trip", () => {
    const breaker = createInterruptingDevice()._unsafeUnwrap();
    const relay = buildRelay(FEEDER_SETTINGS, breaker);

    expect(calculateClearingTime(relay, 100)._unsafeUnwrap().value).toEqual({
      type: "NO_TRIP",
    });
  });

  it("fails for a relay without a breaker", () => {
    const result = calculateClearingTime(buildRelay(), 1600);

    expect(result.isErr()).toBe(true);
    if (result.isErr()) {
      expect(result.error).toEqual({ type: "NO_BREAKER", relay: "Relay1" });
    }
  });
});
