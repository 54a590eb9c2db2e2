/**
 * Agent Runtime Persistence
 *
 * Run, thread and message storage contract with an in-memory backend.
 */

export * from "./persistence";
