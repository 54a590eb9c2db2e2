/**
 * Iteration Processor
 *
 * One model call and everything it causes: the assistant output, the tool
 * calls found in it (XML tags and native calls), their dispatch through the
 * run's registry, and the status and result messages around each call.
 * Messages go through the caller's sink one at a time, in production order.
 */

import {
  type CancellationToken,
  errorMessage,
  formatToolResult,
  type Message,
  messageText,
  type NewMessage,
  type TerminalKind,
  type ToolCall,
  type ToolResult,
} from "@tasklane/agent-runtime-core";
import { createSubsystemLogger, type RuntimeLogger } from "@tasklane/agent-runtime-telemetry/logging";
import {
  type ToolRegistry,
  type XmlParsingDetails,
  XmlToolCallParser,
} from "@tasklane/agent-runtime-tools";
import type { RuntimeConfig } from "../config/runtimeConfig";
import type { ModelProvider, ModelRequest, ModelResponse } from "../llm/modelProvider";

// ============================================================================
// Types
// ============================================================================

/** Persists and publishes one message; null when it could not be stored */
export type MessageSink = (draft: NewMessage) => Promise<Message | null>;

export type IterationSettings = Pick<
  RuntimeConfig,
  | "toolExecutionStrategy"
  | "xmlAddingStrategy"
  | "maxXmlToolCalls"
  | "xmlToolCalling"
  | "nativeToolCalling"
>;

export interface IterationProcessorOptions {
  registry: ToolRegistry;
  provider: ModelProvider;
  settings: IterationSettings;
  logger?: RuntimeLogger;
}

export interface IterationInput {
  runId: string;
  threadId: string;
  request: ModelRequest;
  emit: MessageSink;
}

export interface TerminalToolOutcome {
  name: string;
  kind: TerminalKind;
}

export interface IterationOutcome {
  /** Stored messages, in the order they were produced */
  messages: Message[];
  /** Text of every assistant output of this iteration */
  assistantText: string;
  terminalTool: TerminalToolOutcome | null;
  terminalSignal: TerminalKind | null;
  hasError: boolean;
  errorMessage?: string;
  /** Wall-clock time of the model call */
  modelDurationMs: number;
}

interface PendingCall {
  call: ToolCall;
  index: number;
  native: boolean;
  details?: XmlParsingDetails;
}

interface IterationScope {
  runId: string;
  threadId: string;
  token: CancellationToken;
  assistantMessageId: string | undefined;
  emit: MessageSink;
}

// ============================================================================
// IterationProcessor
// ============================================================================

export class IterationProcessor {
  private readonly registry: ToolRegistry;
  private readonly provider: ModelProvider;
  private readonly settings: IterationSettings;
  private readonly logger: RuntimeLogger;
  private readonly parser: XmlToolCallParser;

  constructor(options: IterationProcessorOptions) {
    this.registry = options.registry;
    this.provider = options.provider;
    this.settings = options.settings;
    this.logger = options.logger ?? createSubsystemLogger("iteration");
    this.parser = new XmlToolCallParser(this.registry, {
      maxCalls: this.settings.maxXmlToolCalls,
      logger: this.logger,
    });
  }

  async process(input: IterationInput): Promise<IterationOutcome> {
    const outcome: IterationOutcome = {
      messages: [],
      assistantText: "",
      terminalTool: null,
      terminalSignal: null,
      hasError: false,
      modelDurationMs: 0,
    };
    const emit: MessageSink = async (draft) => {
      const stored = await input.emit(draft);
      if (stored) {
        outcome.messages.push(stored);
      }
      return stored;
    };
    const scope: IterationScope = {
      runId: input.runId,
      threadId: input.threadId,
      token: input.request.token,
      assistantMessageId: undefined,
      emit,
    };

    const startedAt = Date.now();
    let response: ModelResponse;
    try {
      response = await this.provider.call(input.request);
    } catch (error) {
      outcome.modelDurationMs = Date.now() - startedAt;
      outcome.hasError = true;
      outcome.errorMessage = errorMessage(error);
      this.logger.error("Model call failed", { runId: input.runId, error: outcome.errorMessage });
      await emit(this.statusDraft(scope, { status_type: "error", message: outcome.errorMessage }));
      return outcome;
    }
    outcome.modelDurationMs = Date.now() - startedAt;
    outcome.terminalSignal = response.terminalSignal ?? null;

    const nativeCalls = this.settings.nativeToolCalling ? (response.toolCalls ?? []) : [];
    outcome.assistantText = await this.emitOutputs(scope, response, nativeCalls, outcome);
    if (outcome.hasError) {
      return outcome;
    }

    const pending = this.collectCalls(outcome.assistantText, nativeCalls);
    if (pending.length === 0) {
      return outcome;
    }

    outcome.terminalTool =
      this.settings.toolExecutionStrategy === "parallel"
        ? await this.dispatchParallel(scope, pending)
        : await this.dispatchSequential(scope, pending);
    return outcome;
  }

  // --------------------------------------------------------------------------
  // Model output
  // --------------------------------------------------------------------------

  private async emitOutputs(
    scope: IterationScope,
    response: ModelResponse,
    nativeCalls: ToolCall[],
    outcome: IterationOutcome
  ): Promise<string> {
    const texts: string[] = [];
    const textOutputs = response.messages.filter((output) => output.kind === "text").length;
    let textIndex = 0;

    for (const output of response.messages) {
      if (output.kind === "status") {
        await scope.emit(
          this.statusDraft(scope, { status_type: output.status, message: output.message ?? null })
        );
        if (output.status === "error") {
          outcome.hasError = true;
          outcome.errorMessage = output.message ?? "Model reported an error";
        }
        continue;
      }

      textIndex++;
      texts.push(messageText(output.content));
      const carriesCalls = textIndex === textOutputs && nativeCalls.length > 0;
      const stored = await scope.emit({
        threadId: scope.threadId,
        type: "assistant",
        content: output.content,
        isLlmMessage: true,
        metadata: carriesCalls
          ? { runId: scope.runId, toolCalls: nativeCalls }
          : { runId: scope.runId },
      });
      scope.assistantMessageId = stored?.id ?? scope.assistantMessageId;
    }

    if (textOutputs === 0 && nativeCalls.length > 0) {
      const stored = await scope.emit({
        threadId: scope.threadId,
        type: "assistant",
        content: "",
        isLlmMessage: true,
        metadata: { runId: scope.runId, toolCalls: nativeCalls },
      });
      scope.assistantMessageId = stored?.id;
    }
    return texts.join("\n");
  }

  private collectCalls(assistantText: string, nativeCalls: ToolCall[]): PendingCall[] {
    const pending: PendingCall[] = [];
    if (this.settings.xmlToolCalling && assistantText.length > 0) {
      for (const parsed of this.parser.parse(assistantText)) {
        pending.push({
          call: parsed.call,
          index: pending.length,
          native: false,
          details: parsed.details,
        });
      }
    }
    for (const call of nativeCalls) {
      pending.push({ call, index: pending.length, native: call.id !== undefined });
    }
    return pending;
  }

  // --------------------------------------------------------------------------
  // Dispatch
  // --------------------------------------------------------------------------

  private async dispatchSequential(
    scope: IterationScope,
    pending: PendingCall[]
  ): Promise<TerminalToolOutcome | null> {
    for (const entry of pending) {
      if (scope.token.isCancellationRequested) {
        this.logger.debug("Skipping remaining tool calls after cancellation", {
          runId: scope.runId,
          skipped: pending.length - entry.index,
        });
        return null;
      }
      await scope.emit(this.startedDraft(scope, entry));
      const result = await this.execute(entry, scope.token);
      await this.emitResult(scope, entry, result);

      const kind = this.registry.terminalKind(entry.call.name);
      if (kind) {
        const remaining = pending.length - entry.index - 1;
        if (remaining > 0) {
          this.logger.debug("Terminal tool ran; skipping remaining calls", {
            runId: scope.runId,
            tool: entry.call.name,
            skipped: remaining,
          });
        }
        return { name: entry.call.name, kind };
      }
    }
    return null;
  }

  private async dispatchParallel(
    scope: IterationScope,
    pending: PendingCall[]
  ): Promise<TerminalToolOutcome | null> {
    if (scope.token.isCancellationRequested) {
      this.logger.debug("Skipping tool calls after cancellation", {
        runId: scope.runId,
        skipped: pending.length,
      });
      return null;
    }
    for (const entry of pending) {
      await scope.emit(this.startedDraft(scope, entry));
    }
    const results = await Promise.all(pending.map((entry) => this.execute(entry, scope.token)));

    let terminal: TerminalToolOutcome | null = null;
    for (const [position, entry] of pending.entries()) {
      await this.emitResult(scope, entry, results[position]);
      const kind = this.registry.terminalKind(entry.call.name);
      if (kind && !terminal) {
        terminal = { name: entry.call.name, kind };
      }
    }
    return terminal;
  }

  private async execute(entry: PendingCall, token: CancellationToken): Promise<ToolResult> {
    const result = await this.registry.invoke(entry.call.name, entry.call.arguments, { token });
    if (result.ok) {
      return result.value;
    }
    return { success: false, output: result.error.message };
  }

  // --------------------------------------------------------------------------
  // Messages
  // --------------------------------------------------------------------------

  private async emitResult(
    scope: IterationScope,
    entry: PendingCall,
    result: ToolResult
  ): Promise<void> {
    await scope.emit(this.resultDraft(scope, entry, result));
    const displayName = entry.call.xmlTagName ?? entry.call.name;
    await scope.emit(
      this.statusDraft(scope, {
        ...this.callFields(entry),
        status_type: result.success ? "tool_completed" : "tool_failed",
        message: `Tool ${displayName} ${result.success ? "completed successfully" : "failed"}`,
      })
    );
  }

  private resultDraft(scope: IterationScope, entry: PendingCall, result: ToolResult): NewMessage {
    const { call } = entry;
    const metadata: Record<string, unknown> = {
      runId: scope.runId,
      name: call.name,
    };
    if (scope.assistantMessageId) {
      metadata.assistantMessageId = scope.assistantMessageId;
    }

    if (entry.native) {
      metadata.role = "tool";
      metadata.toolCallId = call.id;
      return {
        threadId: scope.threadId,
        type: "tool_result",
        content: result.output,
        isLlmMessage: true,
        metadata,
      };
    }

    metadata.role = this.settings.xmlAddingStrategy === "user_message" ? "user" : "assistant";
    if (entry.details) {
      metadata.parsingDetails = entry.details;
    }
    const content = call.xmlTagName
      ? `<tool_result> <${call.xmlTagName}> ${formatToolResult(result)} </${call.xmlTagName}> </tool_result>`
      : `Result for ${call.name}: ${formatToolResult(result)}`;
    return {
      threadId: scope.threadId,
      type: "tool_result",
      content,
      isLlmMessage: true,
      metadata,
    };
  }

  private startedDraft(scope: IterationScope, entry: PendingCall): NewMessage {
    return this.statusDraft(scope, {
      ...this.callFields(entry),
      status_type: "tool_started",
      message: `Starting execution of ${entry.call.xmlTagName ?? entry.call.name}`,
    });
  }

  private callFields(entry: PendingCall): Record<string, unknown> {
    const fields: Record<string, unknown> = {
      role: "assistant",
      function_name: entry.call.name,
      xml_tag_name: entry.call.xmlTagName ?? null,
      tool_index: entry.index,
    };
    if (entry.call.id !== undefined) {
      fields.tool_call_id = entry.call.id;
    }
    return fields;
  }

  private statusDraft(scope: IterationScope, content: Record<string, unknown>): NewMessage {
    return {
      threadId: scope.threadId,
      type: "status",
      content: JSON.stringify(content),
      isLlmMessage: false,
      metadata: { runId: scope.runId },
    };
  }
}
