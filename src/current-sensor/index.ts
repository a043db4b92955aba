/**
 * Current Sensor Module - Public API
 */

// Types
export type {
  AccuracyClass,
  CurrentSensor,
  CurrentSensorInput,
  CurrentSensorSettings,
  SensorType,
} from "./schema.js";
export type { SensorError } from "./errors.js";

// Schemas
export { CurrentSensorSettingsSchema } from "./schema.js";

// Error utilities
export { formatSensorError } from "./errors.js";

// Service functions
export { createCurrentSensor } from "./service.js";

// Pure transformations
export {
  DEFAULT_ACCURACY_CLASS,
  parseAccuracyClass,
  buildCurrentSensor,
  secondaryCurrent,
  primaryCurrent,
} from "./transform.js";
