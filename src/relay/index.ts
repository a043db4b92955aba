/**
 * Relay Module - Public API
 */

// Types
export type {
  ClearingOutcome,
  FaultType,
  InstantaneousElementSettings,
  ProtectionElement,
  ProtectionRelay,
  RelayInput,
  RelaySettings,
  TccPoint,
  TimeElementSettings,
  TripOutcome,
} from "./schema.js";
export type { RelayError } from "./errors.js";

// Schemas and constants
export {
  ANSI_DEVICE_NUMBERS,
  FaultTypeSchema,
  ProtectionElementSchema,
  RelaySettingsSchema,
} from "./schema.js";

// Error utilities
export { formatRelayError } from "./errors.js";

// Service functions
export {
  createRelay,
  calculateTripTime,
  calculateClearingTime,
} from "./service.js";

// Pure transformations
export {
  NO_TRIP,
  armedElements,
  clearingOutcome,
  evaluateTrip,
  generateTccSeries,
  logSpacedCurrents,
  tripTimeOf,
} from "./transform.js";
