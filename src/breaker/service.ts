/**
 * Breaker Service - builds devices and owns their open/closed state.
 *
 * State lives in each device's closure, so devices never share mutable data.
 */
import { type Result, err, ok } from "neverthrow";
import { config } from "../config.js";
import { createLogger } from "../logger.js";
import {
  type BreakerError,
  alreadyAssociated,
  validationError,
} from "./errors.js";
import {
  type BreakerInput,
  BreakerSettingsSchema,
  type BreakerState,
  type InterruptingDevice,
  type RelayLink,
} from "./schema.js";
import { operatingTimeSeconds } from "./transform.js";

const log = createLogger("breaker");

/**
 * Create a breaker from (partial) settings. Starts CLOSED with no relay.
 *
 * @param input - Breaker settings
 * @param lineFrequencyHz - Frequency for cycle conversion (defaults to config)
 */
export const createInterruptingDevice = (
  input: BreakerInput = {},
  lineFrequencyHz: number = config.LINE_FREQUENCY_HZ,
): Result<InterruptingDevice, BreakerError> => {
  const parsed = BreakerSettingsSchema.safeParse(input);
  if (!parsed.success) {
    log.warn(
      { operation: "createInterruptingDevice", issues: parsed.error.issues },
      "  ↳ Validation failed",
    );
    return err(validationError(parsed.error.issues));
  }

  const settings = parsed.data;
  const operatingTime = operatingTimeSeconds(settings, lineFrequencyHz);

  let state: BreakerState = "CLOSED";
  let linked: RelayLink | null = null;

  const transition = (next: BreakerState): void => {
    if (state === next) {
      return;
    }
    state = next;
    log.info({ breaker: settings.name, state }, `${settings.name} → ${state}`);
  };

  log.debug(
    { operation: "createInterruptingDevice", breaker: settings.name, operatingTime },
    "✓ Breaker configured",
  );

  return ok({
    settings,
    operatingTime,
    state: () => state,
    open: () => transition("OPEN"),
    close: () => transition("CLOSED"),
    relay: () => linked?.name ?? null,
    associateRelay: (link: RelayLink): Result<void, BreakerError> => {
      if (linked !== null && linked !== link) {
        return err(alreadyAssociated(settings.name, linked.name, link.name));
      }
      linked = link;
      return ok(undefined);
    },
  });
};
