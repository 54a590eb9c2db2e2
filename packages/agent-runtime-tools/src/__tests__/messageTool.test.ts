/**
 * MessageTool tests
 */

import { createCaptureLogger } from "@tasklane/agent-runtime-telemetry/logging";
import { describe, expect, it } from "vitest";
import { MessageTool, parseAttachments } from "../tools/core/message";
import { ToolRegistry } from "../tools/registry/toolRegistry";

function createRegistry(): ToolRegistry {
  const registry = new ToolRegistry({ logger: createCaptureLogger().logger });
  registry.register(new MessageTool());
  return registry;
}

describe("MessageTool", () => {
  it("exposes ask and complete as functions and all three as XML tags", () => {
    const registry = createRegistry();
    expect(registry.listFunctionSchemas().map((schema) => schema.name)).toEqual(["ask", "complete"]);
    expect(Object.keys(registry.listXmlExamples())).toEqual([
      "ask",
      "web-browser-takeover",
      "complete",
    ]);
  });

  it("marks hand-off operations as pauses and complete as completion", () => {
    const registry = createRegistry();
    expect(registry.terminalKind("ask")).toBe("pause");
    expect(registry.terminalKind("web-browser-takeover")).toBe("pause");
    expect(registry.terminalKind("complete")).toBe("complete");
  });

  it("returns the awaiting status with attachments", async () => {
    const registry = createRegistry();
    const result = await registry.invoke("ask", { text: "Proceed?", attachments: "a.md, b.md" });
    expect(result).toEqual({
      ok: true,
      value: {
        success: true,
        output: '{"status":"Awaiting user response...","attachments":["a.md","b.md"]}',
      },
    });
  });

  it("fails structurally when the question is missing", async () => {
    const registry = createRegistry();
    const result = await registry.invoke("web-browser-takeover", {});
    expect(result).toEqual({
      ok: true,
      value: { success: false, output: "Missing required argument: text" },
    });
  });

  it("reports completion", async () => {
    const registry = createRegistry();
    const result = await registry.invoke("complete", {});
    expect(result).toEqual({ ok: true, value: { success: true, output: '{"status":"complete"}' } });
  });
});

describe("parseAttachments", () => {
  it("splits and trims comma-separated entries", () => {
    expect(parseAttachments(" a.md , ,b.png")).toEqual(["a.md", "b.png"]);
    expect(parseAttachments(null)).toEqual([]);
  });
});
