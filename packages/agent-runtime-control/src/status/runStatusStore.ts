/**
 * Run Status Store
 *
 * Single writer for run status. Transitions for one run are applied in call
 * order; once a run is terminal its status never changes. Persistence and
 * signal publication are best effort: failures are logged, never rethrown.
 */

import {
  errorMessage,
  isTerminalRunStatus,
  PersistenceFailure,
  type RunStatus,
} from "@tasklane/agent-runtime-core";
import type { RunPatch, RunStore } from "@tasklane/agent-runtime-persistence";
import { createSubsystemLogger, type RuntimeLogger } from "@tasklane/agent-runtime-telemetry/logging";
import type { RunStreamBroker } from "../events/runStreamBroker";

export interface RunStatusStoreOptions {
  store: RunStore;
  /** When set, every transition is announced on the run's control channel */
  broker?: RunStreamBroker;
  logger?: RuntimeLogger;
  now?: () => number;
  /** Terminal statuses remembered locally; the oldest are forgotten first */
  terminalCacheSize?: number;
}

export interface StatusTransition {
  status: RunStatus;
  errorMessage?: string;
}

export interface RunStatusStoreStats {
  /** Runs with a transition still in flight */
  queuedRuns: number;
  terminalRuns: number;
}

const DEFAULT_TERMINAL_CACHE_SIZE = 1000;

export class RunStatusStore {
  private readonly store: RunStore;
  private readonly broker: RunStreamBroker | undefined;
  private readonly logger: RuntimeLogger;
  private readonly now: () => number;
  private readonly terminalCacheSize: number;
  /** Bounded best-effort mirror; the run store stays authoritative */
  private readonly terminal = new Map<string, RunStatus>();
  private readonly queues = new Map<string, Promise<boolean>>();

  constructor(options: RunStatusStoreOptions) {
    this.store = options.store;
    this.broker = options.broker;
    this.logger = options.logger ?? createSubsystemLogger("status-store");
    this.now = options.now ?? Date.now;
    this.terminalCacheSize = Math.max(1, options.terminalCacheSize ?? DEFAULT_TERMINAL_CACHE_SIZE);
  }

  /**
   * Apply a transition. Resolves false when the run was already terminal and
   * the transition was ignored.
   */
  transition(runId: string, next: StatusTransition): Promise<boolean> {
    const previous = this.queues.get(runId) ?? Promise.resolve(true);
    const current = previous.then(() => this.apply(runId, next));
    this.queues.set(runId, current);
    const release = () => {
      if (this.queues.get(runId) === current) {
        this.queues.delete(runId);
      }
    };
    void current.then(release, release);
    return current;
  }

  /** Terminal status recorded through this store, if any */
  terminalStatus(runId: string): RunStatus | undefined {
    return this.terminal.get(runId);
  }

  stats(): RunStatusStoreStats {
    return { queuedRuns: this.queues.size, terminalRuns: this.terminal.size };
  }

  private rememberTerminal(runId: string, status: RunStatus): void {
    this.terminal.delete(runId);
    this.terminal.set(runId, status);
    if (this.terminal.size > this.terminalCacheSize) {
      const oldest = this.terminal.keys().next();
      if (!oldest.done) {
        this.terminal.delete(oldest.value);
      }
    }
  }

  private async apply(runId: string, next: StatusTransition): Promise<boolean> {
    if (this.terminal.has(runId)) {
      this.logger.debug("Ignoring transition of terminal run", { runId, status: next.status });
      return false;
    }

    const persisted = await this.readStatus(runId);
    if (persisted && isTerminalRunStatus(persisted)) {
      this.rememberTerminal(runId, persisted);
      this.logger.debug("Ignoring transition of terminal run", { runId, status: next.status });
      return false;
    }

    if (isTerminalRunStatus(next.status)) {
      this.rememberTerminal(runId, next.status);
    }

    const patch: RunPatch = { status: next.status };
    if (next.errorMessage !== undefined) {
      patch.errorMessage = next.errorMessage;
    }
    if (isTerminalRunStatus(next.status)) {
      patch.completedAt = this.now();
    }

    try {
      await this.store.updateRun(runId, patch);
    } catch (error) {
      this.logger.error("Failed to persist run status", new PersistenceFailure("updateRun", error));
    }

    if (this.broker) {
      try {
        await this.broker.publishStatus(runId, next.status);
      } catch (error) {
        this.logger.error("Failed to publish run status", {
          runId,
          status: next.status,
          error: errorMessage(error),
        });
      }
    }
    return true;
  }

  private async readStatus(runId: string): Promise<RunStatus | null> {
    try {
      const run = await this.store.getRun(runId);
      return run?.status ?? null;
    } catch (error) {
      this.logger.error("Failed to read run status", new PersistenceFailure("getRun", error));
      return null;
    }
  }
}
