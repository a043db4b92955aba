/**
 * Breaker Module - Public API
 */

// Types
export type {
  BreakerInput,
  BreakerSettings,
  BreakerState,
  BreakerType,
  InterruptingDevice,
  RelayLink,
} from "./schema.js";
export type { BreakerError } from "./errors.js";

// Schemas
export { BreakerSettingsSchema } from "./schema.js";

// Error utilities
export { formatBreakerError } from "./errors.js";

// Service functions
export { createInterruptingDevice } from "./service.js";

// Pure transformations
export {
  operatingTimeSeconds,
  totalClearingTime,
  checkInterruptingCapability,
} from "./transform.js";
