/**
 * Agent Runtime Telemetry
 *
 * Structured logging for the run engine.
 */

export * from "./logging";
