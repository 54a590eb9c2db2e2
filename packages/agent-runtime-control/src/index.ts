/**
 * Control Plane Module
 *
 * Shared key-value store, run response streaming, control signals and run
 * status bookkeeping.
 */

export * from "./events";
export * from "./status";
