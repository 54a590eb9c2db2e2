import {
  CancellationTokenSource,
  type Message,
  messageText,
  type NewMessage,
} from "@tasklane/agent-runtime-core";
import { InMemoryRunStore } from "@tasklane/agent-runtime-persistence";
import { createCaptureLogger } from "@tasklane/agent-runtime-telemetry/logging";
import {
  MessageTool,
  type OperationDeclarer,
  successResult,
  ToolCapability,
  ToolRegistry,
  xmlMapping,
} from "@tasklane/agent-runtime-tools";
import { beforeEach, describe, expect, it } from "vitest";
import { type IterationSettings, IterationProcessor, type MessageSink } from "../orchestrator/iterationProcessor";
import type { ModelRequest, ModelResponse } from "../llm/modelProvider";

class EchoTool extends ToolCapability {
  readonly name = "echo";

  protected declareOperations(declare: OperationDeclarer): void {
    declare
      .operation("echo", "Echo text back")
      .param({ name: "text", type: "string", required: true })
      .param({ name: "loud", type: "boolean" })
      .asFunction()
      .asXml("echo", { mappings: [xmlMapping("text", "content", ".", { required: true })] })
      .handle((params) => {
        const text = params.string("text") ?? "";
        return successResult(`echo:${params.boolean("loud") ? text.toUpperCase() : text}`);
      });
  }
}

const SETTINGS: IterationSettings = {
  toolExecutionStrategy: "sequential",
  xmlAddingStrategy: "assistant_message",
  maxXmlToolCalls: 0,
  xmlToolCalling: true,
  nativeToolCalling: true,
};

function statusOf(message: Message): unknown {
  return JSON.parse(messageText(message.content));
}

describe("IterationProcessor", () => {
  let store: InMemoryRunStore;
  let capture: ReturnType<typeof createCaptureLogger>;
  let registry: ToolRegistry;
  let emit: MessageSink;

  beforeEach(() => {
    let clock = 0;
    store = new InMemoryRunStore({ now: () => ++clock });
    capture = createCaptureLogger();
    registry = new ToolRegistry({ logger: capture.logger });
    registry.register(new MessageTool());
    registry.register(new EchoTool());
    emit = (draft: NewMessage) => store.insertMessage(draft);
  });

  function processorFor(
    respond: (request: ModelRequest) => Promise<ModelResponse>,
    settings: Partial<IterationSettings> = {}
  ): IterationProcessor {
    return new IterationProcessor({
      registry,
      provider: { call: respond },
      settings: { ...SETTINGS, ...settings },
      logger: capture.logger,
    });
  }

  function request(token = new CancellationTokenSource().token): ModelRequest {
    return {
      systemPrompt: "You are a test agent.",
      history: [],
      ephemeralContext: null,
      toolSchemas: registry.listFunctionSchemas(),
      xmlExamples: registry.listXmlExamples(),
      modelName: "test-model",
      sampling: { temperature: 0 },
      token,
    };
  }

  it("runs an XML tool call and records its lifecycle", async () => {
    const processor = processorFor(async () => ({
      messages: [{ kind: "text", content: "Working. <echo>hi</echo>" }],
    }));

    const outcome = await processor.process({
      runId: "run-1",
      threadId: "thread-1",
      request: request(),
      emit,
    });

    expect(outcome.hasError).toBe(false);
    expect(outcome.terminalTool).toBeNull();
    expect(outcome.assistantText).toBe("Working. <echo>hi</echo>");
    expect(outcome.messages.map((message) => message.type)).toEqual([
      "assistant",
      "status",
      "tool_result",
      "status",
    ]);

    const [assistant, started, result, completed] = outcome.messages;
    expect(statusOf(started)).toEqual({
      role: "assistant",
      function_name: "echo",
      xml_tag_name: "echo",
      tool_index: 0,
      status_type: "tool_started",
      message: "Starting execution of echo",
    });
    expect(result.content).toBe(
      "<tool_result> <echo> ToolResult(success=true, output=echo:hi) </echo> </tool_result>"
    );
    expect(result.metadata).toMatchObject({
      runId: "run-1",
      name: "echo",
      assistantMessageId: assistant.id,
      role: "assistant",
    });
    expect(statusOf(completed)).toMatchObject({
      status_type: "tool_completed",
      message: "Tool echo completed successfully",
    });
    expect(started.isLlmMessage).toBe(false);
    expect(await store.listMessages("thread-1")).toEqual(outcome.messages);
  });

  it("adds XML results as user messages under the user_message strategy", async () => {
    const processor = processorFor(
      async () => ({ messages: [{ kind: "text", content: "<echo>hi</echo>" }] }),
      { xmlAddingStrategy: "user_message" }
    );

    const outcome = await processor.process({
      runId: "run-1",
      threadId: "thread-1",
      request: request(),
      emit,
    });

    expect(outcome.messages[2].metadata.role).toBe("user");
  });

  it("answers native calls with tool-role results", async () => {
    const processor = processorFor(async () => ({
      messages: [],
      toolCalls: [{ id: "call-1", name: "echo", arguments: { text: "yo", loud: true } }],
    }));

    const outcome = await processor.process({
      runId: "run-1",
      threadId: "thread-1",
      request: request(),
      emit,
    });

    const [assistant, started, result] = outcome.messages;
    expect(assistant.content).toBe("");
    expect(assistant.metadata.toolCalls).toEqual([
      { id: "call-1", name: "echo", arguments: { text: "yo", loud: true } },
    ]);
    expect(statusOf(started)).toMatchObject({ tool_call_id: "call-1", xml_tag_name: null });
    expect(result.content).toBe("echo:YO");
    expect(result.metadata).toMatchObject({ role: "tool", toolCallId: "call-1", name: "echo" });
  });

  it("stops dispatching after a terminal tool in sequential mode", async () => {
    const processor = processorFor(async () => ({
      messages: [{ kind: "text", content: "<echo>a</echo><complete/><echo>b</echo>" }],
    }));

    const outcome = await processor.process({
      runId: "run-1",
      threadId: "thread-1",
      request: request(),
      emit,
    });

    expect(outcome.terminalTool).toEqual({ name: "complete", kind: "complete" });
    expect(outcome.messages.filter((message) => message.type === "tool_result")).toHaveLength(2);
  });

  it("starts every call before reporting results in parallel mode", async () => {
    const processor = processorFor(
      async () => ({ messages: [{ kind: "text", content: "<echo>a</echo> <echo>b</echo>" }] }),
      { toolExecutionStrategy: "parallel" }
    );

    const outcome = await processor.process({
      runId: "run-1",
      threadId: "thread-1",
      request: request(),
      emit,
    });

    const statuses = outcome.messages
      .filter((message) => message.type === "status")
      .map((message) => statusOf(message));
    expect(statuses).toEqual([
      expect.objectContaining({ status_type: "tool_started", tool_index: 0 }),
      expect.objectContaining({ status_type: "tool_started", tool_index: 1 }),
      expect.objectContaining({ status_type: "tool_completed", tool_index: 0 }),
      expect.objectContaining({ status_type: "tool_completed", tool_index: 1 }),
    ]);
    expect(
      outcome.messages.filter((message) => message.type === "tool_result").map((m) => m.content)
    ).toEqual([
      "<tool_result> <echo> ToolResult(success=true, output=echo:a) </echo> </tool_result>",
      "<tool_result> <echo> ToolResult(success=true, output=echo:b) </echo> </tool_result>",
    ]);
  });

  it("reports unknown tools as failed results", async () => {
    const processor = processorFor(async () => ({
      messages: [],
      toolCalls: [{ id: "call-9", name: "missing", arguments: {} }],
    }));

    const outcome = await processor.process({
      runId: "run-1",
      threadId: "thread-1",
      request: request(),
      emit,
    });

    const [, , result, failed] = outcome.messages;
    expect(result.content).toBe("Tool function 'missing' not found");
    expect(statusOf(failed)).toMatchObject({
      status_type: "tool_failed",
      message: "Tool missing failed",
    });
    expect(outcome.hasError).toBe(false);
  });

  it("skips tool calls once the run is cancelled", async () => {
    const source = new CancellationTokenSource();
    const processor = processorFor(async () => {
      source.cancel("stop requested");
      return { messages: [{ kind: "text", content: "<echo>a</echo>" }] };
    });

    const outcome = await processor.process({
      runId: "run-1",
      threadId: "thread-1",
      request: request(source.token),
      emit,
    });

    expect(outcome.messages.map((message) => message.type)).toEqual(["assistant"]);
  });

  it("turns a provider failure into an error status", async () => {
    const processor = processorFor(async () => {
      throw new Error("model offline");
    });

    const outcome = await processor.process({
      runId: "run-1",
      threadId: "thread-1",
      request: request(),
      emit,
    });

    expect(outcome.hasError).toBe(true);
    expect(outcome.errorMessage).toBe("model offline");
    expect(outcome.messages).toHaveLength(1);
    expect(statusOf(outcome.messages[0])).toEqual({ status_type: "error", message: "model offline" });
  });

  it("treats an error status from the model as a failed iteration", async () => {
    const processor = processorFor(async () => ({
      messages: [
        { kind: "text", content: "<echo>never</echo>" },
        { kind: "status", status: "error", message: "quota exceeded" },
      ],
    }));

    const outcome = await processor.process({
      runId: "run-1",
      threadId: "thread-1",
      request: request(),
      emit,
    });

    expect(outcome.hasError).toBe(true);
    expect(outcome.errorMessage).toBe("quota exceeded");
    expect(outcome.messages.some((message) => message.type === "tool_result")).toBe(false);
  });

  it("keeps going when a message cannot be stored", async () => {
    const processor = processorFor(async () => ({
      messages: [{ kind: "text", content: "<echo>hi</echo>" }],
    }));
    let calls = 0;
    const flaky: MessageSink = async (draft) => {
      calls++;
      return calls === 1 ? null : store.insertMessage(draft);
    };

    const outcome = await processor.process({
      runId: "run-1",
      threadId: "thread-1",
      request: request(),
      emit: flaky,
    });

    expect(calls).toBe(4);
    expect(outcome.messages.map((message) => message.type)).toEqual([
      "status",
      "tool_result",
      "status",
    ]);
    expect(outcome.messages[1].metadata.assistantMessageId).toBeUndefined();
  });
});
