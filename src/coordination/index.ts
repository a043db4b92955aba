/**
 * Coordination Module - Public API
 */

// Types
export type {
  AdequacyEntry,
  BreakerSummary,
  CoordinationTable,
  ElementSummary,
  ProtectionSummary,
  RelaySummary,
  SelectivityEntry,
  SelectivityReport,
  SensorSummary,
  TableCell,
  TableColumn,
  TableRow,
} from "./schema.js";
export type { CoordinationError } from "./errors.js";

// Error utilities
export { formatCoordinationError } from "./errors.js";

// Service functions
export {
  buildCoordinationTable,
  checkSelectivity,
  checkBreakerAdequacy,
} from "./service.js";

// Pure transformations
export {
  MARGIN_TOLERANCE_S,
  rankSelectivity,
  summarizeProtection,
  tableColumns,
} from "./transform.js";
