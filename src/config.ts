/**
 * Typed configuration - parsed from the environment with Zod at load time.
 * The process exits immediately on invalid config - fail fast.
 *
 * Covers:
 * - Runtime and logging settings
 * - Breaker operating-time conversion (line frequency)
 * - Coordination defaults (selectivity margin, test currents)
 */
import { z } from "zod";

/**
 * Comma-separated list of positive currents, e.g. "100,200,500".
 * Empty entries are ignored.
 */
const currentList = (defaultValue: string) =>
  z
    .string()
    .default(defaultValue)
    .transform((val) =>
      val
        .split(",")
        .map((part) => part.trim())
        .filter((part) => part !== "")
        .map(Number),
    )
    .pipe(z.array(z.number().positive().finite()).min(1));

const ConfigSchema = z.object({
  // ==========================================================================
  // Runtime
  // ==========================================================================
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development")
    .describe("Runtime environment"),
  LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"])
    .default("info")
    .describe("Pino log level"),

  // ==========================================================================
  // Interrupting Devices
  // ==========================================================================
  LINE_FREQUENCY_HZ: z.coerce
    .number()
    .positive()
    .default(60)
    .describe("System frequency used to convert breaker cycles to seconds"),

  // ==========================================================================
  // Coordination Defaults
  // ==========================================================================
  MIN_SELECTIVITY_MARGIN_S: z.coerce
    .number()
    .nonnegative()
    .default(0.3)
    .describe("Minimum grading margin between successive relays (s)"),
  COORDINATION_TEST_CURRENTS: currentList("100,200,500,1000,2000,5000").describe(
    "Default fault currents (A primary) for coordination tables",
  ),
});

// Parse at load - exits immediately if invalid
const parsed = ConfigSchema.safeParse(process.env);

if (!parsed.success) {
  console.error("❌ Invalid configuration:");
  console.error(parsed.error.format());
  process.exit(1);
}

export const config = parsed.data;

// Type export for use elsewhere
export type Config = z.infer<typeof ConfigSchema>;
