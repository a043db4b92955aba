/**
 * Non-fatal diagnostics shared by all protection modules.
 *
 * A diagnostic never stops a calculation: the operation completes with its
 * documented fallback or unclamped value and hands the warnings back to the
 * caller alongside the result.
 */

/**
 * Warnings raised while configuring or evaluating protection devices.
 */
export type Diagnostic =
  | {
      readonly type: "ACCURACY_CLASS_UNPARSEABLE";
      readonly sensor: string;
      readonly accuracyClass: string;
      readonly fallbackCompositeErrorPct: number;
      readonly fallbackAccuracyLimitFactor: number;
    }
  | {
      readonly type: "SENSOR_SATURATION";
      readonly sensor: string;
      readonly secondaryCurrent: number;
      readonly accuracyLimit: number;
    }
  | {
      readonly type: "INTERRUPTING_RATING_EXCEEDED";
      readonly breaker: string;
      readonly faultKa: number;
      readonly ratingKa: number;
    };

/**
 * A value together with the warnings produced while computing it.
 */
export type WithDiagnostics<T> = Readonly<{
  value: T;
  diagnostics: ReadonlyArray<Diagnostic>;
}>;

/**
 * Wrap a value with the given diagnostics (none by default).
 */
export function withDiagnostics<T>(
  value: T,
  diagnostics: ReadonlyArray<Diagnostic> = [],
): WithDiagnostics<T> {
  return { value, diagnostics };
}

/**
 * Format a Diagnostic for logs and reports.
 */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  switch (diagnostic.type) {
    case "ACCURACY_CLASS_UNPARSEABLE":
      return `${diagnostic.sensor}: could not parse accuracy class "${diagnostic.accuracyClass}", using ${diagnostic.fallbackCompositeErrorPct}P${diagnostic.fallbackAccuracyLimitFactor}`;
    case "SENSOR_SATURATION":
      return `${diagnostic.sensor}: secondary current ${diagnostic.secondaryCurrent.toFixed(2)}A exceeds accuracy limit ${diagnostic.accuracyLimit.toFixed(2)}A - CT may saturate`;
    case "INTERRUPTING_RATING_EXCEEDED":
      return `${diagnostic.breaker}: fault current ${diagnostic.faultKa.toFixed(2)}kA exceeds interrupting rating ${diagnostic.ratingKa.toFixed(2)}kA`;
  }
}
