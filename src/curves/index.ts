/**
 * Curve Module - Public API
 */

// Types
export type { Curve, CurveFamily, CurveStandard } from "./schema.js";
export type { CurveId } from "./catalog.js";
export type { CurveError } from "./errors.js";

// Schemas
export { CurveSchema, CurveFamilySchema, CurveStandardSchema } from "./schema.js";

// Error utilities
export { formatCurveError } from "./errors.js";

// Registry and formulas
export { CURVE_CATALOG } from "./catalog.js";
export {
  CURVE_IDS,
  lookupCurve,
  curveFamily,
  listCurves,
  curveOperateTime,
} from "./transform.js";
