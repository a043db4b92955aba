/**
 * Current Sensor Module - Pure Transformations
 *
 * Ratio scaling and accuracy-limit checks. Saturation is diagnosed, never
 * modeled: scaled values are always the linear ones.
 */
import {
  type Diagnostic,
  type WithDiagnostics,
  withDiagnostics,
} from "../diagnostics.js";
import type {
  AccuracyClass,
  CurrentSensor,
  CurrentSensorSettings,
} from "./schema.js";

/**
 * Coefficients used when the IEC class string cannot be read.
 */
export const DEFAULT_ACCURACY_CLASS: AccuracyClass = {
  compositeErrorPct: 5,
  accuracyLimitFactor: 20,
};

const IEC_CLASS_PATTERN = /^\s*(\d+(?:\.\d+)?)P(\d+(?:\.\d+)?)\s*$/;

/**
 * Parse an IEC protection class such as "5P20" or "10P10".
 *
 * @returns The parsed class, or null if the string is malformed
 */
export function parseAccuracyClass(text: string): AccuracyClass | null {
  const match = IEC_CLASS_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const compositeErrorPct = Number(match[1]);
  const accuracyLimitFactor = Number(match[2]);
  if (accuracyLimitFactor <= 0) {
    return null;
  }

  return { compositeErrorPct, accuracyLimitFactor };
}

/**
 * Derive ratio and accuracy limit from validated settings.
 */
export function buildCurrentSensor(
  settings: CurrentSensorSettings,
): WithDiagnostics<CurrentSensor> {
  const parsed = parseAccuracyClass(settings.accuracyClassIec);
  const accuracy = parsed ?? DEFAULT_ACCURACY_CLASS;
  const diagnostics: Diagnostic[] = [];

  if (parsed === null) {
    diagnostics.push({
      type: "ACCURACY_CLASS_UNPARSEABLE",
      sensor: settings.name,
      accuracyClass: settings.accuracyClassIec,
      fallbackCompositeErrorPct: DEFAULT_ACCURACY_CLASS.compositeErrorPct,
      fallbackAccuracyLimitFactor: DEFAULT_ACCURACY_CLASS.accuracyLimitFactor,
    });
  }

  return withDiagnostics(
    {
      settings,
      ratio: settings.primaryRating / settings.secondaryRating,
      accuracy,
      accuracyLimit: settings.secondaryRating * accuracy.accuracyLimitFactor,
    },
    diagnostics,
  );
}

/**
 * Scale a primary current to the secondary side.
 * Flags SENSOR_SATURATION above the accuracy limit but does not clamp.
 */
export function secondaryCurrent(
  sensor: CurrentSensor,
  primary: number,
): WithDiagnostics<number> {
  const secondary = primary / sensor.ratio;

  if (secondary > sensor.accuracyLimit) {
    return withDiagnostics(secondary, [
      {
        type: "SENSOR_SATURATION",
        sensor: sensor.settings.name,
        secondaryCurrent: secondary,
        accuracyLimit: sensor.accuracyLimit,
      },
    ]);
  }

  return withDiagnostics(secondary);
}

/**
 * Scale a secondary current back to the primary side.
 */
export function primaryCurrent(
  sensor: CurrentSensor,
  secondary: number,
): number {
  return secondary * sensor.ratio;
}
