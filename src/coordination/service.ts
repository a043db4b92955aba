/**
 * Coordination Service - runs studies over an explicit relay set.
 *
 * Each study validates its inputs, evaluates every relay through the relay
 * service and collects the diagnostics those evaluations raise.
 */
import { type Result, err, ok } from "neverthrow";
import {
  type InterruptingDevice,
  checkInterruptingCapability,
} from "../breaker/index.js";
import { config } from "../config.js";
import {
  type Diagnostic,
  type WithDiagnostics,
  formatDiagnostic,
  withDiagnostics,
} from "../diagnostics.js";
import {
  createLogger,
  logOperationComplete,
  logOperationFailed,
  logOperationStart,
} from "../logger.js";
import {
  type FaultType,
  type ProtectionRelay,
  type TripOutcome,
  calculateTripTime,
  clearingOutcome,
} from "../relay/index.js";
import {
  type CoordinationError,
  duplicateRelay,
  evaluationFailed,
  formatCoordinationError,
  validationError,
} from "./errors.js";
import {
  type AdequacyEntry,
  type CoordinationTable,
  FaultCurrentSchema,
  FaultCurrentsSchema,
  MinMarginSchema,
  type SelectivityReport,
  type TableCell,
  type TableRow,
} from "./schema.js";
import {
  clearingCell,
  findDuplicateRelay,
  rankSelectivity,
  tableColumns,
  tripCell,
} from "./transform.js";

const log = createLogger("coordination");

const fail = (
  operation: string,
  error: CoordinationError,
): Result<never, CoordinationError> => {
  logOperationFailed(log, operation, formatCoordinationError(error));
  return err(error);
};

const checkRelaySet = (
  relays: ReadonlyArray<ProtectionRelay>,
): CoordinationError | null => {
  const duplicate = findDuplicateRelay(relays);
  return duplicate === null ? null : duplicateRelay(duplicate);
};

type Evaluated = Readonly<{ relay: ProtectionRelay; outcome: TripOutcome }>;

/**
 * Trip outcome of every relay at one current, in relay order.
 * Diagnostics are appended to `diagnostics`.
 */
const evaluateAll = (
  relays: ReadonlyArray<ProtectionRelay>,
  current: number,
  faultType: FaultType,
  diagnostics: Diagnostic[],
): Result<ReadonlyArray<Evaluated>, CoordinationError> => {
  const evaluated: Evaluated[] = [];
  for (const relay of relays) {
    const result = calculateTripTime(relay, current, faultType);
    if (result.isErr()) {
      return err(evaluationFailed(relay.settings.name, current, result.error));
    }
    evaluated.push({ relay, outcome: result.value.value });
    diagnostics.push(...result.value.diagnostics);
  }
  return ok(evaluated);
};

// =============================================================================
// Coordination Table
// =============================================================================

/**
 * Trip-time table: one row per fault current (input order), one RELAY column
 * per relay plus a TOTAL column for relays with a breaker.
 */
export const buildCoordinationTable = (
  relays: ReadonlyArray<ProtectionRelay>,
  faultCurrents: ReadonlyArray<number> = config.COORDINATION_TEST_CURRENTS,
  faultType: FaultType = "phase",
): Result<WithDiagnostics<CoordinationTable>, CoordinationError> => {
  const operation = "buildCoordinationTable";
  const startTime = Date.now();
  logOperationStart(log, operation, {
    relays: relays.length,
    currents: faultCurrents.length,
    faultType,
  });

  const currents = FaultCurrentsSchema.safeParse(faultCurrents);
  if (!currents.success) {
    return fail(operation, validationError(currents.error.issues));
  }

  const setError = checkRelaySet(relays);
  if (setError !== null) {
    return fail(operation, setError);
  }

  const diagnostics: Diagnostic[] = [];
  const rows: TableRow[] = [];

  for (const current of currents.data) {
    const evaluated = evaluateAll(relays, current, faultType, diagnostics);
    if (evaluated.isErr()) {
      return fail(operation, evaluated.error);
    }

    const cells = evaluated.value.flatMap(({ relay, outcome }): TableCell[] =>
      relay.breaker === null
        ? [tripCell(outcome)]
        : [tripCell(outcome), clearingCell(clearingOutcome(outcome, relay.breaker))],
    );

    rows.push({ current, cells });
  }

  logOperationComplete(log, operation, startTime, {
    rows: rows.length,
    diagnostics: diagnostics.length,
  });

  return ok(
    withDiagnostics(
      { faultType, columns: tableColumns(relays), rows },
      diagnostics,
    ),
  );
};

// =============================================================================
// Selectivity
// =============================================================================

/**
 * Grade every tripping relay against the next-faster one at a single
 * fault current.
 */
export const checkSelectivity = (
  relays: ReadonlyArray<ProtectionRelay>,
  faultCurrent: number,
  faultType: FaultType = "phase",
  minMargin: number = config.MIN_SELECTIVITY_MARGIN_S,
): Result<WithDiagnostics<SelectivityReport>, CoordinationError> => {
  const operation = "checkSelectivity";
  const startTime = Date.now();
  logOperationStart(log, operation, { faultCurrent, faultType, minMargin });

  const current = FaultCurrentSchema.safeParse(faultCurrent);
  if (!current.success) {
    return fail(operation, validationError(current.error.issues));
  }
  const margin = MinMarginSchema.safeParse(minMargin);
  if (!margin.success) {
    return fail(operation, validationError(margin.error.issues));
  }

  const setError = checkRelaySet(relays);
  if (setError !== null) {
    return fail(operation, setError);
  }

  const diagnostics: Diagnostic[] = [];
  const evaluated = evaluateAll(relays, current.data, faultType, diagnostics);
  if (evaluated.isErr()) {
    return fail(operation, evaluated.error);
  }

  const entries = rankSelectivity(
    evaluated.value.map(({ relay, outcome }) => ({
      relay: relay.settings.name,
      outcome,
    })),
    margin.data,
  );
  const selective = entries.every((entry) => entry.selective);

  for (const entry of entries) {
    if (!entry.selective) {
      log.warn(
        { operation, relay: entry.relay, margin: entry.margin, minMargin },
        `  ↳ ${entry.relay} not selective`,
      );
    }
  }

  logOperationComplete(log, operation, startTime, {
    tripping: entries.length,
    selective,
  });

  return ok(
    withDiagnostics(
      {
        faultCurrent: current.data,
        faultType,
        minMargin: margin.data,
        entries,
        selective,
      },
      diagnostics,
    ),
  );
};

// =============================================================================
// Breaker Adequacy
// =============================================================================

/**
 * Compare each breaker's symmetrical rating with the fault level the
 * network solver reports at its location.
 */
export const checkBreakerAdequacy = (
  entries: ReadonlyArray<Readonly<{ device: InterruptingDevice; faultKa: number }>>,
): WithDiagnostics<ReadonlyArray<AdequacyEntry>> => {
  const diagnostics: Diagnostic[] = [];

  const results = entries.map(({ device, faultKa }): AdequacyEntry => {
    const check = checkInterruptingCapability(device, faultKa);
    for (const diagnostic of check.diagnostics) {
      log.warn(
        { operation: "checkBreakerAdequacy", diagnostic },
        formatDiagnostic(diagnostic),
      );
    }
    diagnostics.push(...check.diagnostics);

    return {
      breaker: device.settings.name,
      faultKa,
      ratingKa: device.settings.interruptingRatingKaSym,
      adequate: check.value,
    };
  });

  return withDiagnostics(results, diagnostics);
};
