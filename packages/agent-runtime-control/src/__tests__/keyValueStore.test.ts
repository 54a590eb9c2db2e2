import { createCaptureLogger } from "@tasklane/agent-runtime-telemetry/logging";
import { beforeEach, describe, expect, it } from "vitest";
import { InMemoryKeyValueStore } from "../events/keyValueStore";

const tick = () => new Promise<void>((resolve) => setTimeout(resolve, 0));

describe("InMemoryKeyValueStore", () => {
  let clock: number;
  let kv: InMemoryKeyValueStore;

  beforeEach(() => {
    clock = 0;
    kv = new InMemoryKeyValueStore({ now: () => clock, logger: createCaptureLogger().logger });
  });

  describe("lists", () => {
    beforeEach(async () => {
      for (const value of ["a", "b", "c", "d"]) {
        await kv.rpush("list", value);
      }
    });

    it("returns inclusive ranges with negative indices", async () => {
      expect(await kv.lrange("list", 0, -1)).toEqual(["a", "b", "c", "d"]);
      expect(await kv.lrange("list", 1, 2)).toEqual(["b", "c"]);
      expect(await kv.lrange("list", -2, -1)).toEqual(["c", "d"]);
      expect(await kv.lrange("list", 3, 100)).toEqual(["d"]);
      expect(await kv.lrange("list", 4, -1)).toEqual([]);
      expect(await kv.lrange("missing", 0, -1)).toEqual([]);
    });

    it("reports the new length on push", async () => {
      expect(await kv.rpush("list", "e")).toBe(5);
      expect(await kv.llen("list")).toBe(5);
    });

    it("refuses to push onto a plain value", async () => {
      await kv.set("plain", "x");
      await expect(kv.rpush("plain", "y")).rejects.toThrow('Key "plain" does not hold a list');
    });
  });

  describe("expiry", () => {
    it("evicts keys once their time to live has passed", async () => {
      await kv.rpush("list", "a");
      expect(await kv.expire("list", 10)).toBe(true);
      expect(kv.ttl("list")).toBe(10_000);

      clock = 9_999;
      expect(await kv.llen("list")).toBe(1);
      clock = 10_000;
      expect(await kv.llen("list")).toBe(0);
      expect(kv.ttl("list")).toBeNull();
    });

    it("reclaims expired keys on later writes without reading them", async () => {
      for (const runId of ["run-1", "run-2", "run-3"]) {
        await kv.rpush(`responses:${runId}`, "{}");
        await kv.expire(`responses:${runId}`, 1);
      }
      await kv.set("marker", "running", 60);
      expect(kv.keyCount()).toBe(4);

      clock = 10_000;
      await kv.rpush("responses:run-4", "{}");

      expect(kv.keyCount()).toBe(2);
      expect(kv.ttl("marker")).toBe(50_000);
    });

    it("does not set a time to live on a missing key", async () => {
      expect(await kv.expire("missing", 10)).toBe(false);
    });

    it("sets values with an optional time to live", async () => {
      await kv.set("marker", "running", 5);
      expect(await kv.get("marker")).toBe("running");
      clock = 5_000;
      expect(await kv.get("marker")).toBeNull();
    });

    it("deletes keys", async () => {
      await kv.set("marker", "running");
      expect(await kv.del("marker")).toBe(true);
      expect(await kv.del("marker")).toBe(false);
    });
  });

  describe("pub/sub", () => {
    it("delivers published messages asynchronously", async () => {
      const received: string[] = [];
      await kv.subscribe("updates", (message, channel) => {
        received.push(`${channel}:${message}`);
      });

      expect(await kv.publish("updates", "new")).toBe(1);
      expect(received).toEqual([]);
      await tick();
      expect(received).toEqual(["updates:new"]);
    });

    it("returns zero receivers for a channel nobody listens on", async () => {
      expect(await kv.publish("silence", "new")).toBe(0);
    });

    it("stops delivering after unsubscribe", async () => {
      const received: string[] = [];
      const subscription = await kv.subscribe("updates", (message) => {
        received.push(message);
      });
      await subscription.unsubscribe();

      await kv.publish("updates", "new");
      await tick();
      expect(received).toEqual([]);
      expect(kv.subscriberCount("updates")).toBe(0);
    });

    it("logs handler failures without affecting other subscribers", async () => {
      const capture = createCaptureLogger();
      const store = new InMemoryKeyValueStore({ logger: capture.logger });
      const received: string[] = [];
      await store.subscribe("updates", () => {
        throw new Error("handler broke");
      });
      await store.subscribe("updates", (message) => {
        received.push(message);
      });

      await store.publish("updates", "new");
      await tick();
      expect(received).toEqual(["new"]);
      expect(capture.warnings()).toEqual([
        expect.objectContaining({
          msg: "Channel handler failed",
          channel: "updates",
          error: "handler broke",
        }),
      ]);
    });
  });
});
