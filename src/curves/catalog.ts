/**
 * Registered time-current curves.
 *
 * IEC 60255 and IEC 61363 curves use the IEC formula; IEEE C37.112 and the
 * ANSI additions use the IEEE formula.
 */
import type { Curve } from "./schema.js";

export const CURVE_CATALOG = [
  // ===========================================================================
  // IEC 60255
  // ===========================================================================
  {
    id: "IEC_NI",
    name: "IEC Normal Inverse",
    standard: "IEC 60255",
    family: "IEC",
    coefficients: { k: 0.14, alpha: 0.02 },
  },
  {
    id: "IEC_VI",
    name: "IEC Very Inverse",
    standard: "IEC 60255",
    family: "IEC",
    coefficients: { k: 13.5, alpha: 1.0 },
  },
  {
    id: "IEC_EI",
    name: "IEC Extremely Inverse",
    standard: "IEC 60255",
    family: "IEC",
    coefficients: { k: 80.0, alpha: 2.0 },
  },
  {
    id: "IEC_LTI",
    name: "IEC Long Time Inverse",
    standard: "IEC 60255",
    family: "IEC",
    coefficients: { k: 120.0, alpha: 1.0 },
  },
  {
    id: "IEC_STI",
    name: "IEC Short Time Inverse",
    standard: "IEC 60255",
    family: "IEC",
    coefficients: { k: 0.05, alpha: 0.04 },
  },

  // ===========================================================================
  // IEEE C37.112
  // ===========================================================================
  {
    id: "IEEE_MI",
    name: "IEEE Moderately Inverse",
    standard: "IEEE C37.112",
    family: "IEEE",
    coefficients: { a: 0.0515, b: 0.02, p: 0.114 },
  },
  {
    id: "IEEE_VI",
    name: "IEEE Very Inverse",
    standard: "IEEE C37.112",
    family: "IEEE",
    coefficients: { a: 19.61, b: 0.491, p: 2.0 },
  },
  {
    id: "IEEE_EI",
    name: "IEEE Extremely Inverse",
    standard: "IEEE C37.112",
    family: "IEEE",
    coefficients: { a: 28.2, b: 0.1217, p: 2.0 },
  },

  // ===========================================================================
  // ANSI C37.112 additions
  // ===========================================================================
  {
    id: "ANSI_ST",
    name: "ANSI Short Time",
    standard: "ANSI C37.112",
    family: "IEEE",
    coefficients: { a: 0.02394, b: 0.01694, p: 0.02 },
  },
  {
    id: "ANSI_LT",
    name: "ANSI Long Time",
    standard: "ANSI C37.112",
    family: "IEEE",
    coefficients: { a: 5.95, b: 0.18, p: 2.0 },
  },

  // ===========================================================================
  // IEC 61363 (marine and offshore)
  // ===========================================================================
  {
    id: "IEC_61363_A",
    name: "IEC 61363 Type A (Standard Inverse)",
    standard: "IEC 61363",
    application: "Marine/Offshore general protection",
    family: "IEC",
    coefficients: { k: 0.0515, alpha: 0.02 },
  },
  {
    id: "IEC_61363_B",
    name: "IEC 61363 Type B (Very Inverse)",
    standard: "IEC 61363",
    application: "Marine/Offshore motor protection",
    family: "IEC",
    coefficients: { k: 13.5, alpha: 1.0 },
  },
  {
    id: "IEC_61363_C",
    name: "IEC 61363 Type C (Extremely Inverse)",
    standard: "IEC 61363",
    application: "Marine/Offshore transformer protection",
    family: "IEC",
    coefficients: { k: 80.0, alpha: 2.0 },
  },
  {
    id: "IEC_61363_LT",
    name: "IEC 61363 Long Time",
    standard: "IEC 61363",
    application: "Marine/Offshore feeder protection",
    family: "IEC",
    coefficients: { k: 120.0, alpha: 1.0 },
  },
] as const satisfies ReadonlyArray<Curve>;

/**
 * Identifier of a registered curve.
 */
export type CurveId = (typeof CURVE_CATALOG)[number]["id"];
