/**
 * Curve Module - Error Types
 *
 * Errors are values, not exceptions.
 */

/**
 * Errors that can occur when resolving a curve.
 */
export type CurveError = {
  readonly type: "UNKNOWN_CURVE";
  readonly curveId: string;
  readonly available: ReadonlyArray<string>;
};

/**
 * Create an UNKNOWN_CURVE error listing every valid identifier.
 */
export function unknownCurve(
  curveId: string,
  available: ReadonlyArray<string>,
): CurveError {
  return { type: "UNKNOWN_CURVE", curveId, available };
}

/**
 * Format a CurveError for logging.
 */
export function formatCurveError(error: CurveError): string {
  switch (error.type) {
    case "UNKNOWN_CURVE":
      return `Unknown curve type: ${error.curveId}. Available curves: ${error.available.join(", ")}`;
  }
}
