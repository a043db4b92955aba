/**
 * Curve Module - Schemas and Types
 *
 * Standardized inverse time-current characteristics. Each curve is a closed
 * tagged variant on `family`, holding only the coefficients its formula uses.
 */
import { z } from "zod";

// =============================================================================
// Families and Standards
// =============================================================================

/**
 * Formula family:
 * - IEC:  t = TMS · k / (M^alpha − 1)
 * - IEEE: t = TMS · a / (M^p − b)
 */
export const CurveFamilySchema = z.enum(["IEC", "IEEE"]);

export type CurveFamily = z.infer<typeof CurveFamilySchema>;

export const CurveStandardSchema = z.enum([
  "IEC 60255",
  "IEEE C37.112",
  "ANSI C37.112",
  "IEC 61363",
]);

export type CurveStandard = z.infer<typeof CurveStandardSchema>;

// =============================================================================
// Coefficients
// =============================================================================

export const IecCoefficientsSchema = z.object({
  k: z.number().positive(),
  alpha: z.number().positive(),
});

/**
 * `b` stays below 1 so the denominator is positive for every M > 1.
 */
export const IeeeCoefficientsSchema = z.object({
  a: z.number().positive(),
  b: z.number().min(0).lt(1),
  p: z.number().positive(),
});

// =============================================================================
// Curve
// =============================================================================

const CurveBaseSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  standard: CurveStandardSchema,
  application: z.string().optional(),
});

export const CurveSchema = z.discriminatedUnion("family", [
  CurveBaseSchema.extend({
    family: z.literal("IEC"),
    coefficients: IecCoefficientsSchema,
  }),
  CurveBaseSchema.extend({
    family: z.literal("IEEE"),
    coefficients: IeeeCoefficientsSchema,
  }),
]);

export type Curve = z.infer<typeof CurveSchema>;
