/**
 * @tasklane/agent-runtime-execution
 *
 * Executes agent runs: configuration, context-window management, the model
 * provider contract and the orchestrator loop.
 *
 * @example
 * ```typescript
 * import { InMemoryKeyValueStore, RunStreamBroker } from "@tasklane/agent-runtime-control";
 * import { InMemoryRunStore } from "@tasklane/agent-runtime-persistence";
 * import { InMemoryWorkspace } from "@tasklane/agent-runtime-tools";
 * import { loadRuntimeConfig, RunOrchestrator } from "@tasklane/agent-runtime-execution";
 *
 * const orchestrator = new RunOrchestrator({
 *   store: new InMemoryRunStore(),
 *   broker: new RunStreamBroker(new InMemoryKeyValueStore()),
 *   provider,
 *   workspace: new InMemoryWorkspace(),
 *   config: loadRuntimeConfig(),
 * });
 *
 * const outcome = await orchestrator.run({ threadId: "thread-1", projectId: "project-1", message: "Plan the release" });
 * ```
 */

// ============================================================================
// Configuration
// ============================================================================
export {
  ENV_KEYS,
  loadRuntimeConfig,
  type RuntimeConfig,
  type RuntimeConfigOverrides,
  runtimeConfigSchema,
  TOOL_EXECUTION_STRATEGIES,
  XML_ADDING_STRATEGIES,
} from "./config/runtimeConfig";
// ============================================================================
// Context window
// ============================================================================
export {
  ContextWindowManager,
  type ContextWindowOptions,
  type ContextWindowResult,
  estimateTokens,
  SUMMARY_END_MARKER,
  summaryMessageId,
  truncateContent,
} from "./context/contextWindowManager";
// ============================================================================
// Model provider
// ============================================================================
export type {
  EphemeralContext,
  ModelOutput,
  ModelProvider,
  ModelRequest,
  ModelResponse,
  SamplingParams,
} from "./llm/modelProvider";
// ============================================================================
// Orchestration
// ============================================================================
export * from "./orchestrator";
export { DEFAULT_SYSTEM_PROMPT_URL, loadSystemPrompt } from "./prompts/systemPrompt";
