/**
 * Curve Module - Pure Transformations
 *
 * Registry lookup and the inverse-time formulas. No side effects.
 */
import { type Result, err, ok } from "neverthrow";
import { CURVE_CATALOG } from "./catalog.js";
import { type CurveError, unknownCurve } from "./errors.js";
import type { Curve, CurveFamily, CurveStandard } from "./schema.js";

const CURVES_BY_ID: ReadonlyMap<string, Curve> = new Map<string, Curve>(
  CURVE_CATALOG.map((curve) => [curve.id, curve]),
);

/**
 * Every registered curve identifier, sorted.
 */
export const CURVE_IDS: ReadonlyArray<string> = [...CURVES_BY_ID.keys()].sort();

const compareText = (a: string, b: string): number =>
  a < b ? -1 : a > b ? 1 : 0;

// =============================================================================
// Lookup
// =============================================================================

/**
 * Resolve a curve by identifier.
 */
export function lookupCurve(curveId: string): Result<Curve, CurveError> {
  const curve = CURVES_BY_ID.get(curveId);
  if (curve === undefined) {
    return err(unknownCurve(curveId, CURVE_IDS));
  }
  return ok(curve);
}

/**
 * Which formula a curve uses.
 */
export function curveFamily(curveId: string): Result<CurveFamily, CurveError> {
  return lookupCurve(curveId).map((curve) => curve.family);
}

/**
 * Registered curves ordered by standard then identifier, optionally limited
 * to one standard.
 */
export function listCurves(standard?: CurveStandard): ReadonlyArray<Curve> {
  return [...CURVES_BY_ID.values()]
    .filter((curve) => standard === undefined || curve.standard === standard)
    .sort(
      (a, b) => compareText(a.standard, b.standard) || compareText(a.id, b.id),
    );
}

// =============================================================================
// Formulas
// =============================================================================

/**
 * Operate time in seconds at current multiple `multiple` (I / pickup).
 *
 * Only defined for `multiple > 1`; the caller owns the pickup boundary.
 */
export function curveOperateTime(
  curve: Curve,
  multiple: number,
  tms: number,
): number {
  switch (curve.family) {
    case "IEC": {
      const { k, alpha } = curve.coefficients;
      return (tms * k) / (multiple ** alpha - 1);
    }
    case "IEEE": {
      const { a, b, p } = curve.coefficients;
      return tms * (a / (multiple ** p - b));
    }
  }
}
