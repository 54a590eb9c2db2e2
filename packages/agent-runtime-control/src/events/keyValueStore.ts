/**
 * Shared Key-Value Store
 *
 * The list, key and pub/sub primitives the stream broker runs on. Production
 * deployments back this with a shared server; the in-memory implementation
 * serves single-process runs and tests.
 */

import { createSubsystemLogger, type RuntimeLogger } from "@tasklane/agent-runtime-telemetry/logging";

// ============================================================================
// Types
// ============================================================================

export type ChannelHandler = (message: string, channel: string) => void | Promise<void>;

export interface KeyValueSubscription {
  readonly id: string;
  readonly channel: string;
  unsubscribe(): Promise<void>;
}

export interface KeyValueStore {
  /** Append to a list, returning its new length */
  rpush(key: string, value: string): Promise<number>;
  /** Inclusive range; negative indices count from the end */
  lrange(key: string, start: number, stop: number): Promise<string[]>;
  llen(key: string): Promise<number>;
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  /** False when the key does not exist */
  expire(key: string, ttlSeconds: number): Promise<boolean>;
  del(key: string): Promise<boolean>;
  /** Returns the number of handlers the message was delivered to */
  publish(channel: string, message: string): Promise<number>;
  subscribe(channel: string, handler: ChannelHandler): Promise<KeyValueSubscription>;
}

// ============================================================================
// InMemoryKeyValueStore
// ============================================================================

export interface InMemoryKeyValueStoreOptions {
  now?: () => number;
  logger?: RuntimeLogger;
}

/**
 * Process-local store. Expired keys are evicted when read and swept on every
 * write; channel delivery is asynchronous, one task per handler.
 */
export class InMemoryKeyValueStore implements KeyValueStore {
  private readonly lists = new Map<string, string[]>();
  private readonly values = new Map<string, string>();
  private readonly expiries = new Map<string, number>();
  private readonly subscriptions = new Map<string, Set<ChannelHandler>>();
  private readonly now: () => number;
  private readonly logger: RuntimeLogger;
  private subscriptionCounter = 0;

  constructor(options: InMemoryKeyValueStoreOptions = {}) {
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? createSubsystemLogger("kv-store");
  }

  async rpush(key: string, value: string): Promise<number> {
    this.sweepExpired();
    if (this.values.has(key)) {
      throw new Error(`Key "${key}" does not hold a list`);
    }
    const list = this.lists.get(key) ?? [];
    list.push(value);
    this.lists.set(key, list);
    return list.length;
  }

  async lrange(key: string, start: number, stop: number): Promise<string[]> {
    this.evictIfExpired(key);
    const list = this.lists.get(key) ?? [];
    const from = start < 0 ? Math.max(list.length + start, 0) : start;
    const to = stop < 0 ? list.length + stop : Math.min(stop, list.length - 1);
    if (from > to) {
      return [];
    }
    return list.slice(from, to + 1);
  }

  async llen(key: string): Promise<number> {
    this.evictIfExpired(key);
    return this.lists.get(key)?.length ?? 0;
  }

  async get(key: string): Promise<string | null> {
    this.evictIfExpired(key);
    return this.values.get(key) ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    this.sweepExpired();
    this.lists.delete(key);
    this.values.set(key, value);
    if (ttlSeconds === undefined) {
      this.expiries.delete(key);
    } else {
      this.expiries.set(key, this.now() + ttlSeconds * 1000);
    }
  }

  async expire(key: string, ttlSeconds: number): Promise<boolean> {
    this.sweepExpired();
    if (!this.exists(key)) {
      return false;
    }
    this.expiries.set(key, this.now() + ttlSeconds * 1000);
    return true;
  }

  async del(key: string): Promise<boolean> {
    this.sweepExpired();
    const existed = this.exists(key);
    this.lists.delete(key);
    this.values.delete(key);
    this.expiries.delete(key);
    return existed;
  }

  async publish(channel: string, message: string): Promise<number> {
    const handlers = this.subscriptions.get(channel);
    if (!handlers) {
      return 0;
    }
    for (const handler of handlers) {
      void Promise.resolve()
        .then(() => handler(message, channel))
        .catch((error: unknown) => {
          this.logger.error("Channel handler failed", {
            channel,
            error: error instanceof Error ? error.message : String(error),
          });
        });
    }
    return handlers.size;
  }

  async subscribe(channel: string, handler: ChannelHandler): Promise<KeyValueSubscription> {
    let handlers = this.subscriptions.get(channel);
    if (!handlers) {
      handlers = new Set();
      this.subscriptions.set(channel, handlers);
    }
    handlers.add(handler);

    this.subscriptionCounter++;
    return {
      id: `sub-${this.subscriptionCounter}`,
      channel,
      unsubscribe: async () => {
        const current = this.subscriptions.get(channel);
        if (current) {
          current.delete(handler);
          if (current.size === 0) {
            this.subscriptions.delete(channel);
          }
        }
      },
    };
  }

  /** Remaining time to live in milliseconds; null when the key has none or is missing. */
  ttl(key: string): number | null {
    this.evictIfExpired(key);
    const expiresAt = this.expiries.get(key);
    return expiresAt === undefined ? null : expiresAt - this.now();
  }

  /** Keys currently held, including expired ones not yet evicted */
  keyCount(): number {
    return this.lists.size + this.values.size;
  }

  subscriberCount(channel: string): number {
    return this.subscriptions.get(channel)?.size ?? 0;
  }

  private exists(key: string): boolean {
    return this.lists.has(key) || this.values.has(key);
  }

  private evictIfExpired(key: string): void {
    const expiresAt = this.expiries.get(key);
    if (expiresAt !== undefined && expiresAt <= this.now()) {
      this.evict(key);
    }
  }

  private sweepExpired(): void {
    const now = this.now();
    for (const [key, expiresAt] of this.expiries) {
      if (expiresAt <= now) {
        this.evict(key);
      }
    }
  }

  private evict(key: string): void {
    this.lists.delete(key);
    this.values.delete(key);
    this.expiries.delete(key);
  }
}
