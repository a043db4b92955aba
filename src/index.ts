/**
 * Protection coordination engine - public API.
 *
 * Consumers (report generators, plotting front ends, CLIs) import from here
 * only. Fault currents come from an external network solver; this package
 * turns them into trip times, clearing times and selectivity verdicts.
 */

export { config } from "./config.js";
export type { Config } from "./config.js";

export type { Diagnostic, WithDiagnostics } from "./diagnostics.js";
export { formatDiagnostic } from "./diagnostics.js";

export * from "./curves/index.js";
export * from "./current-sensor/index.js";
export * from "./breaker/index.js";
export * from "./relay/index.js";
export * from "./coordination/index.js";
