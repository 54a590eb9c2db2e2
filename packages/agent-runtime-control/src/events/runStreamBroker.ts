/**
 * Run Stream Broker
 *
 * Response streaming and the control plane for runs, built on a shared
 * key-value store. Messages live in an append-only list per run; the
 * notification channel only says that the list grew, and each subscriber's
 * cursor decides what it has yet to see.
 */

import {
  type ControlSignal,
  isControlSignal,
  MESSAGE_TYPES,
  type Message,
  type RunStatus,
} from "@tasklane/agent-runtime-core";
import { createSubsystemLogger, type RuntimeLogger } from "@tasklane/agent-runtime-telemetry/logging";
import { z } from "zod";
import { NEW_RESPONSE_TOKEN, runChannels, signalForStatus } from "./channels";
import type { KeyValueStore, KeyValueSubscription } from "./keyValueStore";

// ============================================================================
// Types
// ============================================================================

const contentPartSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("text"), text: z.string() }),
  z.object({ type: z.literal("image_url"), imageUrl: z.object({ url: z.string() }) }),
]);

export const streamedMessageSchema = z.object({
  id: z.string(),
  threadId: z.string(),
  type: z.enum(MESSAGE_TYPES),
  content: z.union([z.string(), z.array(contentPartSchema)]),
  isLlmMessage: z.boolean(),
  metadata: z.record(z.unknown()),
  createdAt: z.number(),
});

export type StreamHandler = (message: Message) => void | Promise<void>;

export interface StreamSubscription {
  readonly id: string;
  readonly runId: string;
  /** Number of list entries consumed so far */
  readonly lastDeliveredIndex: number;
  /** Resolves once every delivery scheduled so far has finished */
  settled(): Promise<void>;
  unsubscribe(): Promise<void>;
}

export interface ControlListenerOptions {
  runId: string;
  instanceId: string;
  /** Invoked on STOP from either control channel */
  onStop: () => void;
  /** Invoked for every recognised signal, STOP included */
  onSignal?: (signal: ControlSignal, channel: string) => void;
}

export interface ControlListener {
  unsubscribe(): Promise<void>;
}

export interface RunStreamBrokerOptions {
  logger?: RuntimeLogger;
  /** TTL applied to a run's response list on cleanup */
  responseListTtlSeconds?: number;
  /** TTL of the active-run marker */
  activeRunTtlSeconds?: number;
}

const DEFAULT_RESPONSE_TTL_SECONDS = 86400;

// ============================================================================
// RunStreamBroker
// ============================================================================

export class RunStreamBroker {
  private readonly logger: RuntimeLogger;
  private readonly responseListTtlSeconds: number;
  private readonly activeRunTtlSeconds: number;
  private subscriptionCounter = 0;

  constructor(
    private readonly store: KeyValueStore,
    options: RunStreamBrokerOptions = {}
  ) {
    this.logger = options.logger ?? createSubsystemLogger("stream-broker");
    this.responseListTtlSeconds = options.responseListTtlSeconds ?? DEFAULT_RESPONSE_TTL_SECONDS;
    this.activeRunTtlSeconds = options.activeRunTtlSeconds ?? DEFAULT_RESPONSE_TTL_SECONDS;
  }

  // --------------------------------------------------------------------------
  // Responses
  // --------------------------------------------------------------------------

  /** Append a message to the run's list, then announce it. */
  async publishResponse(runId: string, message: Message): Promise<void> {
    await this.store.rpush(runChannels.responses(runId), JSON.stringify(message));
    await this.store.publish(runChannels.newResponse(runId), NEW_RESPONSE_TOKEN);
  }

  /**
   * Deliver the run's existing messages, then every message appended later,
   * each exactly once and in list order.
   */
  async subscribe(runId: string, handler: StreamHandler): Promise<StreamSubscription> {
    this.subscriptionCounter++;
    const id = `stream-${this.subscriptionCounter}`;
    const listKey = runChannels.responses(runId);
    let cursor = 0;
    let active = true;
    let chain: Promise<void> = Promise.resolve();

    const drain = async (): Promise<void> => {
      if (!active) {
        return;
      }
      const entries = await this.store.lrange(listKey, cursor, -1);
      for (const entry of entries) {
        if (!active) {
          return;
        }
        cursor++;
        const message = this.decode(entry, runId, cursor - 1);
        if (message) {
          await handler(message);
        }
      }
    };

    // Every delivery runs on one chain so concurrent notifications never read
    // the same cursor twice.
    const schedule = (): Promise<void> => {
      chain = chain.then(drain).catch((error: unknown) => {
        this.logger.error("Stream delivery failed", {
          runId,
          subscriptionId: id,
          error: error instanceof Error ? error.message : String(error),
        });
      });
      return chain;
    };

    const channelSubscription = await this.store.subscribe(
      runChannels.newResponse(runId),
      (token) => {
        if (token === NEW_RESPONSE_TOKEN) {
          void schedule();
        }
      }
    );
    // Backfill goes first on the chain; notifications that raced it find the
    // cursor already advanced.
    await schedule();
    this.logger.debug("Stream subscribed", { runId, subscriptionId: id, backfilled: cursor });

    return {
      id,
      runId,
      get lastDeliveredIndex() {
        return cursor;
      },
      settled: () => chain,
      unsubscribe: async () => {
        active = false;
        await channelSubscription.unsubscribe();
        this.logger.debug("Stream unsubscribed", { runId, subscriptionId: id });
      },
    };
  }

  // --------------------------------------------------------------------------
  // Control plane
  // --------------------------------------------------------------------------

  /** Listen on the instance-scoped and run-global control channels together. */
  async listenForControl(options: ControlListenerOptions): Promise<ControlListener> {
    const { runId, instanceId, onStop, onSignal } = options;
    const handle = (payload: string, channel: string) => {
      if (!isControlSignal(payload)) {
        this.logger.warn("Ignoring unknown control payload", { runId, channel, payload });
        return;
      }
      onSignal?.(payload, channel);
      if (payload === "STOP") {
        this.logger.info("Stop signal received", { runId, channel });
        onStop();
      }
    };

    const subscriptions: KeyValueSubscription[] = [
      await this.store.subscribe(runChannels.instanceControl(runId, instanceId), handle),
      await this.store.subscribe(runChannels.globalControl(runId), handle),
    ];

    return {
      unsubscribe: async () => {
        for (const subscription of subscriptions) {
          await subscription.unsubscribe();
        }
      },
    };
  }

  /** Publish a signal on the run-global channel, and the instance channel when given. */
  async sendSignal(runId: string, signal: ControlSignal, instanceId?: string): Promise<void> {
    await this.store.publish(runChannels.globalControl(runId), signal);
    if (instanceId !== undefined) {
      await this.store.publish(runChannels.instanceControl(runId, instanceId), signal);
    }
  }

  async stopRun(runId: string, instanceId?: string): Promise<void> {
    await this.sendSignal(runId, "STOP", instanceId);
  }

  /** Announce a status transition; returns the signal sent, if any. */
  async publishStatus(runId: string, status: RunStatus): Promise<ControlSignal | null> {
    const signal = signalForStatus(status);
    if (signal) {
      await this.sendSignal(runId, signal);
    }
    return signal;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  async markActive(instanceId: string, runId: string): Promise<void> {
    await this.store.set(runChannels.activeRun(instanceId, runId), "running", this.activeRunTtlSeconds);
  }

  async isActive(instanceId: string, runId: string): Promise<boolean> {
    return (await this.store.get(runChannels.activeRun(instanceId, runId))) !== null;
  }

  /** Bound the lifetime of the response list and drop the active-run marker. */
  async cleanup(runId: string, instanceId: string): Promise<void> {
    await this.store.expire(runChannels.responses(runId), this.responseListTtlSeconds);
    await this.store.del(runChannels.activeRun(instanceId, runId));
    this.logger.debug("Run stream cleaned up", {
      runId,
      instanceId,
      ttlSeconds: this.responseListTtlSeconds,
    });
  }

  private decode(entry: string, runId: string, index: number): Message | null {
    let raw: unknown;
    try {
      raw = JSON.parse(entry);
    } catch (error) {
      this.logger.warn("Skipping corrupt stream entry", {
        runId,
        index,
        reason: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
    const parsed = streamedMessageSchema.safeParse(raw);
    if (!parsed.success) {
      this.logger.warn("Skipping corrupt stream entry", {
        runId,
        index,
        reason: parsed.error.issues.map((issue) => issue.message).join("; "),
      });
      return null;
    }
    return parsed.data;
  }
}
