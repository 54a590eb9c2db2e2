/**
 * Run Orchestrator
 *
 * Drives one run from start to its terminal status: model call, tool
 * dispatch, persistence and streaming, control markers, todo upkeep and
 * context-window management, once per iteration. Cancellation is cooperative
 * and observed at every suspension point of the loop.
 */

import { randomUUID } from "node:crypto";
import {
  type CancellationToken,
  CancellationTokenSource,
  errorMessage,
  type Message,
  PersistenceFailure,
  RunFailure,
  type RunStatus,
  sleep,
  type Workspace,
} from "@tasklane/agent-runtime-core";
import {
  ActiveRunTable,
  type ControlListener,
  RunStatusStore,
  type RunStreamBroker,
  type StatusTransition,
} from "@tasklane/agent-runtime-control";
import type { RunStore } from "@tasklane/agent-runtime-persistence";
import { createSubsystemLogger, type RuntimeLogger } from "@tasklane/agent-runtime-telemetry/logging";
import {
  MessageTool,
  TaskListTool,
  type ToolCapability,
  ToolRegistry,
} from "@tasklane/agent-runtime-tools";
import { loadRuntimeConfig, type RuntimeConfig } from "../config/runtimeConfig";
import { ContextWindowManager } from "../context/contextWindowManager";
import type { ModelProvider } from "../llm/modelProvider";
import { loadSystemPrompt } from "../prompts/systemPrompt";
import { detectControlMarker, extractTodoUpdate, formatTodoMessage } from "./controlMarkers";
import { buildEphemeralContext, consumeImageContext } from "./ephemeralContext";
import { type IterationOutcome, IterationProcessor, type MessageSink } from "./iterationProcessor";

// ============================================================================
// Types
// ============================================================================

export interface ToolFactoryContext {
  runId: string;
  threadId: string;
  projectId: string;
  workspace: Workspace;
}

/** Builds the run-specific tools; called once per run */
export type ToolFactory = (context: ToolFactoryContext) => ToolCapability[];

export interface RunOrchestratorOptions {
  store: RunStore;
  broker: RunStreamBroker;
  provider: ModelProvider;
  workspace: Workspace;
  config?: RuntimeConfig;
  statusStore?: RunStatusStore;
  activeRuns?: ActiveRunTable;
  /** Worker instance this orchestrator runs on */
  instanceId?: string;
  tools?: ToolFactory;
  /** Replaces the bundled system prompt */
  systemPrompt?: string;
  logger?: RuntimeLogger;
  now?: () => number;
  generateRunId?: () => string;
}

export interface StartRunRequest {
  threadId: string;
  projectId: string;
  runId?: string;
  /** Task text stored as the first user message */
  message?: string;
  /** Overrides the configured model */
  modelName?: string;
}

export interface RunOutcome {
  runId: string;
  threadId: string;
  status: RunStatus;
  errorMessage?: string;
  /** Iterations that reached the model call stage */
  iterations: number;
}

/** Mutable state of one run, owned by the orchestrator for its lifetime */
interface RunState {
  runId: string;
  threadId: string;
  projectId: string;
  status: RunStatus;
  errorMessage?: string;
  iterations: number;
  paused: boolean;
  /** Set once the run row exists; nothing is finalized before that */
  registered: boolean;
}

const STOP_REASON = "Stop signal received";

// ============================================================================
// RunOrchestrator
// ============================================================================

export class RunOrchestrator {
  private readonly store: RunStore;
  private readonly broker: RunStreamBroker;
  private readonly provider: ModelProvider;
  private readonly workspace: Workspace;
  private readonly config: RuntimeConfig;
  private readonly statusStore: RunStatusStore;
  private readonly activeRuns: ActiveRunTable;
  private readonly instanceId: string;
  private readonly tools: ToolFactory | undefined;
  private readonly logger: RuntimeLogger;
  private readonly now: () => number;
  private readonly generateRunId: () => string;
  private readonly cancellations = new Map<string, CancellationTokenSource>();
  private systemPrompt: string | undefined;

  constructor(options: RunOrchestratorOptions) {
    this.store = options.store;
    this.broker = options.broker;
    this.provider = options.provider;
    this.workspace = options.workspace;
    this.config = options.config ?? loadRuntimeConfig();
    this.logger = options.logger ?? createSubsystemLogger("orchestrator");
    this.statusStore =
      options.statusStore ??
      new RunStatusStore({ store: options.store, broker: options.broker, logger: this.logger });
    this.activeRuns = options.activeRuns ?? new ActiveRunTable();
    this.instanceId = options.instanceId ?? `instance-${process.pid}`;
    this.tools = options.tools;
    this.systemPrompt = options.systemPrompt;
    this.now = options.now ?? Date.now;
    this.generateRunId = options.generateRunId ?? randomUUID;
  }

  /** Request cooperative cancellation of a run executing here. */
  cancel(runId: string, reason = STOP_REASON): boolean {
    const source = this.cancellations.get(runId);
    if (!source) {
      return false;
    }
    source.cancel(reason);
    return true;
  }

  async run(request: StartRunRequest): Promise<RunOutcome> {
    const state: RunState = {
      runId: request.runId ?? this.generateRunId(),
      threadId: request.threadId,
      projectId: request.projectId,
      status: "RUNNING",
      iterations: 0,
      paused: false,
      registered: false,
    };
    const logger = this.logger.child({ runId: state.runId, threadId: state.threadId });
    const source = new CancellationTokenSource();
    if (!this.cancellations.has(state.runId)) {
      this.cancellations.set(state.runId, source);
    }
    let listener: ControlListener | null = null;

    try {
      await this.startRun(state, request, logger);
      listener = await this.broker.listenForControl({
        runId: state.runId,
        instanceId: this.instanceId,
        onStop: () => source.cancel(STOP_REASON),
      });
      await this.execute(state, request, source.token, logger);
    } catch (error) {
      state.status = "FAILED";
      state.errorMessage = errorMessage(error);
      logger.error("Run failed", new RunFailure(state.runId, state.errorMessage, error));
    } finally {
      await this.finishRun(state, listener, logger);
      if (this.cancellations.get(state.runId) === source) {
        this.cancellations.delete(state.runId);
      }
    }

    const outcome: RunOutcome = {
      runId: state.runId,
      threadId: state.threadId,
      status: state.status,
      iterations: state.iterations,
    };
    if (state.errorMessage !== undefined) {
      outcome.errorMessage = state.errorMessage;
    }
    return outcome;
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  private async startRun(
    state: RunState,
    request: StartRunRequest,
    logger: RuntimeLogger
  ): Promise<void> {
    const startedAt = this.now();
    if (!(await this.store.getThread(state.threadId))) {
      await this.store.insertThread({
        id: state.threadId,
        projectId: state.projectId,
        createdAt: startedAt,
      });
    }
    await this.store.insertRun({
      id: state.runId,
      threadId: state.threadId,
      projectId: state.projectId,
      status: "RUNNING",
      startedAt,
    });
    state.registered = true;
    this.activeRuns.insert({
      runId: state.runId,
      instanceId: this.instanceId,
      threadId: state.threadId,
      startedAt,
    });
    await this.broker.markActive(this.instanceId, state.runId);
    logger.info("Run started", { instanceId: this.instanceId });

    if (request.message) {
      await this.createSink(state, logger)({
        threadId: state.threadId,
        type: "user",
        content: request.message,
        isLlmMessage: true,
        metadata: { runId: state.runId },
      });
    }
  }

  private async finishRun(
    state: RunState,
    listener: ControlListener | null,
    logger: RuntimeLogger
  ): Promise<void> {
    if (!state.registered) {
      logger.warn("Run was never registered; nothing to finalize", {
        errorMessage: state.errorMessage,
      });
      return;
    }
    const transition: StatusTransition = { status: state.status };
    if (state.errorMessage !== undefined) {
      transition.errorMessage = state.errorMessage;
    }
    const applied = await this.statusStore.transition(state.runId, transition);
    if (!applied) {
      logger.warn("Run was already terminal; status left unchanged", { status: state.status });
    }

    try {
      if (state.paused && applied) {
        await this.broker.sendSignal(state.runId, "PAUSE");
      }
      await listener?.unsubscribe();
      await this.broker.cleanup(state.runId, this.instanceId);
    } catch (error) {
      logger.error("Failed to clean up run stream", { error: errorMessage(error) });
    }
    this.activeRuns.remove(state.runId);

    logger.info("Run finished", {
      status: state.status,
      iterations: state.iterations,
      errorMessage: state.errorMessage,
    });
  }

  // --------------------------------------------------------------------------
  // Iteration loop
  // --------------------------------------------------------------------------

  private async execute(
    state: RunState,
    request: StartRunRequest,
    token: CancellationToken,
    logger: RuntimeLogger
  ): Promise<void> {
    if (this.observeCancellation(state, token, logger, "start")) {
      return;
    }

    const modelName = request.modelName ?? this.config.modelName;
    if (this.observeCancellation(state, token, logger, "model resolution")) {
      return;
    }

    const systemPrompt = await this.resolveSystemPrompt();
    if (this.observeCancellation(state, token, logger, "tool registration")) {
      return;
    }

    const registry = this.buildRegistry(state, logger);
    const processor = new IterationProcessor({
      registry,
      provider: this.provider,
      settings: this.config,
      logger,
    });
    const contextWindow = new ContextWindowManager({
      store: this.store,
      logger,
      maxContextTokens: this.config.maxContextTokens,
      charsPerToken: this.config.charsPerToken,
      summaryLineChars: this.config.summaryLineChars,
      toolSummaryLineChars: this.config.toolSummaryLineChars,
    });
    const emit = this.createSink(state, logger);
    const maxIterations = this.config.maxIterations;

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      if (this.observeCancellation(state, token, logger, "iteration start")) {
        return;
      }
      logger.debug("Iteration started", { iteration });

      const todo = await this.readTodo();
      const ephemeralContext = await buildEphemeralContext(this.store, state.threadId, logger);
      const stored = await this.store.listMessages(state.threadId, { llmOnly: true });
      const { messages } = await contextWindow.applyContextWindowManagement(state.threadId, stored);
      const history = todo === null ? messages : [...messages, this.todoMessage(state, iteration, todo)];

      if (this.observeCancellation(state, token, logger, "model call")) {
        return;
      }
      state.iterations = iteration;
      const outcome = await processor.process({
        runId: state.runId,
        threadId: state.threadId,
        emit,
        request: {
          systemPrompt,
          history,
          ephemeralContext,
          toolSchemas: registry.listFunctionSchemas(),
          xmlExamples: registry.listXmlExamples(),
          modelName,
          sampling: { temperature: this.config.temperature },
          token,
        },
      });
      await consumeImageContext(this.store, state.threadId, logger);
      logger.debug("Iteration finished", {
        iteration,
        messages: outcome.messages.length,
        modelDurationMs: outcome.modelDurationMs,
      });

      if (await this.settleIteration(state, outcome)) {
        return;
      }
      if (this.observeCancellation(state, token, logger, "iteration end")) {
        return;
      }

      if (iteration < maxIterations) {
        const elapsed = await sleep(this.config.iterationDelayMs, token);
        if (!elapsed && this.observeCancellation(state, token, logger, "pacing delay")) {
          return;
        }
      }
    }

    state.status = "COMPLETED";
    state.errorMessage = `Reached maximum iterations (${maxIterations})`;
    logger.info("Iteration budget exhausted", { maxIterations });
  }

  /** Apply the iteration's effects; true when the run reached a terminal status. */
  private async settleIteration(state: RunState, outcome: IterationOutcome): Promise<boolean> {
    const marker = detectControlMarker(outcome.assistantText);

    const todoUpdate = extractTodoUpdate(outcome.assistantText);
    if (todoUpdate !== null) {
      await this.workspace.writeFile(this.config.todoFilePath, todoUpdate);
    }

    if (marker === "complete") {
      state.status = "COMPLETED";
      return true;
    }
    if (marker === "ask") {
      this.pause(state, outcome.terminalTool?.kind === "pause" ? outcome.terminalTool.name : "ask");
      return true;
    }
    if (outcome.hasError) {
      state.status = "FAILED";
      state.errorMessage = outcome.errorMessage ?? "Iteration failed";
      return true;
    }

    const terminal =
      outcome.terminalTool ??
      (outcome.terminalSignal ? { name: "model", kind: outcome.terminalSignal } : null);
    if (terminal?.kind === "complete") {
      state.status = "COMPLETED";
      return true;
    }
    if (terminal?.kind === "pause") {
      this.pause(state, terminal.name);
      return true;
    }
    return false;
  }

  private pause(state: RunState, reason: string): void {
    state.status = "STOPPED";
    state.errorMessage = `Awaiting user input for ${reason}`;
    state.paused = true;
  }

  private observeCancellation(
    state: RunState,
    token: CancellationToken,
    logger: RuntimeLogger,
    checkpoint: string
  ): boolean {
    if (!token.isCancellationRequested) {
      return false;
    }
    state.status = "STOPPED";
    state.errorMessage = token.reason ?? STOP_REASON;
    logger.info("Cancellation observed", { checkpoint, iterations: state.iterations });
    return true;
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private async resolveSystemPrompt(): Promise<string> {
    if (this.systemPrompt === undefined) {
      this.systemPrompt = await loadSystemPrompt();
    }
    return this.systemPrompt;
  }

  private buildRegistry(state: RunState, logger: RuntimeLogger): ToolRegistry {
    const registry = new ToolRegistry({ logger });
    registry.register(new MessageTool());
    registry.register(new TaskListTool(this.workspace, this.config.todoFilePath));
    const extra =
      this.tools?.({
        runId: state.runId,
        threadId: state.threadId,
        projectId: state.projectId,
        workspace: this.workspace,
      }) ?? [];
    for (const capability of extra) {
      registry.register(capability);
    }
    return registry;
  }

  private async readTodo(): Promise<string | null> {
    const content = await this.workspace.readFile(this.config.todoFilePath);
    return content !== null && content.trim().length > 0 ? content : null;
  }

  private todoMessage(state: RunState, iteration: number, content: string): Message {
    return {
      id: `todo-${state.runId}-${iteration}`,
      threadId: state.threadId,
      type: "user",
      content: formatTodoMessage(this.config.todoFilePath, content),
      isLlmMessage: true,
      metadata: { ephemeral: true },
      createdAt: this.now(),
    };
  }

  /** Persist first, then publish; either failure is logged and the run goes on. */
  private createSink(state: RunState, logger: RuntimeLogger): MessageSink {
    return async (draft) => {
      let stored: Message;
      try {
        stored = await this.store.insertMessage(draft);
      } catch (error) {
        logger.error("Failed to store message", new PersistenceFailure("insertMessage", error));
        return null;
      }
      try {
        await this.broker.publishResponse(state.runId, stored);
      } catch (error) {
        logger.error("Failed to publish message", {
          messageId: stored.id,
          error: errorMessage(error),
        });
      }
      return stored;
    };
  }
}
