import type { ControlSignal, RunStatus } from "@tasklane/agent-runtime-core";
import { InMemoryRunStore } from "@tasklane/agent-runtime-persistence";
import { createCaptureLogger } from "@tasklane/agent-runtime-telemetry/logging";
import fc from "fast-check";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { InMemoryKeyValueStore } from "../events/keyValueStore";
import { RunStreamBroker } from "../events/runStreamBroker";
import { RunStatusStore } from "../status/runStatusStore";

const RUN = {
  id: "run-1",
  threadId: "thread-1",
  projectId: "project-1",
  status: "RUNNING" as const,
  startedAt: 1,
};

describe("RunStatusStore", () => {
  let store: InMemoryRunStore;
  let capture: ReturnType<typeof createCaptureLogger>;
  let statuses: RunStatusStore;

  beforeEach(async () => {
    store = new InMemoryRunStore();
    capture = createCaptureLogger();
    statuses = new RunStatusStore({ store, logger: capture.logger, now: () => 42 });
    await store.insertRun(RUN);
  });

  it("persists terminal transitions with their completion time", async () => {
    expect(await statuses.transition("run-1", { status: "FAILED", errorMessage: "boom" })).toBe(true);
    expect(await store.getRun("run-1")).toEqual({
      ...RUN,
      status: "FAILED",
      errorMessage: "boom",
      completedAt: 42,
    });
    expect(statuses.terminalStatus("run-1")).toBe("FAILED");
  });

  it("never changes a terminal status", async () => {
    await statuses.transition("run-1", { status: "COMPLETED" });
    expect(await statuses.transition("run-1", { status: "FAILED", errorMessage: "late" })).toBe(false);
    expect(await statuses.transition("run-1", { status: "RUNNING" })).toBe(false);
    expect((await store.getRun("run-1"))?.status).toBe("COMPLETED");
  });

  it("respects a terminal status written by another process", async () => {
    await store.updateRun("run-1", { status: "STOPPED" });
    expect(await statuses.transition("run-1", { status: "COMPLETED" })).toBe(false);
    expect((await store.getRun("run-1"))?.status).toBe("STOPPED");
  });

  it("applies concurrent transitions in call order", async () => {
    const results = await Promise.all([
      statuses.transition("run-1", { status: "STOPPED", errorMessage: "first" }),
      statuses.transition("run-1", { status: "COMPLETED" }),
    ]);
    expect(results).toEqual([true, false]);
    expect((await store.getRun("run-1"))?.errorMessage).toBe("first");
  });

  it("forgets finished runs beyond the terminal cache size", async () => {
    const bounded = new RunStatusStore({ store, logger: capture.logger, terminalCacheSize: 2 });
    const ids = ["run-a", "run-b", "run-c", "run-d", "run-e"];
    for (const id of ids) {
      await store.insertRun({ ...RUN, id });
      await bounded.transition(id, { status: "RUNNING" });
      await bounded.transition(id, { status: "COMPLETED" });
    }

    expect(bounded.stats()).toEqual({ queuedRuns: 0, terminalRuns: 2 });
    expect(bounded.terminalStatus("run-a")).toBeUndefined();
    expect(bounded.terminalStatus("run-e")).toBe("COMPLETED");
    expect(await bounded.transition("run-a", { status: "FAILED" })).toBe(false);
    expect((await store.getRun("run-a"))?.status).toBe("COMPLETED");
  });

  it("drops the transition queue once a run's transitions settle", async () => {
    const pending = Promise.all([
      statuses.transition("run-1", { status: "RUNNING" }),
      statuses.transition("run-1", { status: "COMPLETED" }),
    ]);
    expect(statuses.stats().queuedRuns).toBe(1);

    await pending;
    expect(statuses.stats()).toEqual({ queuedRuns: 0, terminalRuns: 1 });
  });

  it("keeps the first terminal status for any sequence of transitions", async () => {
    const status = fc.constantFrom<RunStatus>("RUNNING", "COMPLETED", "FAILED", "STOPPED");
    await fc.assert(
      fc.asyncProperty(fc.array(status, { minLength: 1, maxLength: 8 }), async (sequence) => {
        const runs = new InMemoryRunStore();
        await runs.insertRun(RUN);
        const tracker = new RunStatusStore({ store: runs, logger: createCaptureLogger("silent").logger });
        for (const next of sequence) {
          await tracker.transition("run-1", { status: next });
        }
        const firstTerminal = sequence.find((next) => next !== "RUNNING");
        expect((await runs.getRun("run-1"))?.status).toBe(firstTerminal ?? "RUNNING");
      })
    );
  });

  it("logs persistence failures without throwing", async () => {
    vi.spyOn(store, "updateRun").mockRejectedValue(new Error("disk full"));

    expect(await statuses.transition("run-1", { status: "FAILED" })).toBe(true);
    expect(capture.warnings()).toEqual([
      expect.objectContaining({
        msg: "Failed to persist run status",
        err: expect.objectContaining({
          message: "Persistence operation 'updateRun' failed: disk full",
        }),
      }),
    ]);
    expect(await statuses.transition("run-1", { status: "COMPLETED" })).toBe(false);
  });

  it("announces transitions on the control channel", async () => {
    const broker = new RunStreamBroker(new InMemoryKeyValueStore({ logger: capture.logger }), {
      logger: capture.logger,
    });
    const signals: ControlSignal[] = [];
    await broker.listenForControl({
      runId: "run-1",
      instanceId: "worker-1",
      onStop: () => undefined,
      onSignal: (signal) => signals.push(signal),
    });
    const announcing = new RunStatusStore({ store, broker, logger: capture.logger });

    await announcing.transition("run-1", { status: "RUNNING" });
    await announcing.transition("run-1", { status: "STOPPED", errorMessage: "Stopped by user" });
    await announcing.transition("run-1", { status: "FAILED" });
    await new Promise<void>((resolve) => setTimeout(resolve, 0));

    expect(signals).toEqual(["STOP"]);
  });
});
