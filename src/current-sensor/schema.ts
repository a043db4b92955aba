/**
 * Current Sensor Module - Schemas and Types
 *
 * Current transformer ratings and accuracy class. Schemas are the source of
 * truth - types derived with z.infer<>.
 */
import { z } from "zod";

/**
 * CT construction types.
 */
export const SensorTypeSchema = z.enum(["WOUND", "BAR", "BUSHING", "WINDOW"]);

export type SensorType = z.infer<typeof SensorTypeSchema>;

/**
 * CT settings. Every field has a default, so `{}` is a valid 200/5 A 5P20 CT.
 */
export const CurrentSensorSettingsSchema = z.object({
  name: z.string().min(1).default("CT"),
  primaryRating: z
    .number()
    .positive()
    .finite()
    .default(200)
    .describe("Rated primary current (A)"),
  secondaryRating: z
    .number()
    .positive()
    .finite()
    .default(5)
    .describe("Rated secondary current (A), typically 1 or 5"),
  burdenVa: z
    .number()
    .nonnegative()
    .default(15)
    .describe("Connected burden including leads and relay (VA)"),
  accuracyClassIec: z
    .string()
    .default("5P20")
    .describe("IEC protection class <error%>P<accuracy limit factor>"),
  accuracyClassAnsi: z
    .string()
    .default("C100")
    .describe("ANSI class, secondary voltage before saturation"),
  sensorType: SensorTypeSchema.default("BAR"),
});

export type CurrentSensorInput = z.input<typeof CurrentSensorSettingsSchema>;
export type CurrentSensorSettings = z.infer<typeof CurrentSensorSettingsSchema>;

/**
 * Parsed IEC accuracy class, e.g. 5P20 → 5 % composite error up to 20 × In.
 */
export type AccuracyClass = Readonly<{
  compositeErrorPct: number;
  accuracyLimitFactor: number;
}>;

/**
 * A configured current transformer.
 */
export type CurrentSensor = Readonly<{
  settings: CurrentSensorSettings;
  /** primary / secondary */
  ratio: number;
  accuracy: AccuracyClass;
  /** Secondary current (A) above which the CT may saturate */
  accuracyLimit: number;
}>;
