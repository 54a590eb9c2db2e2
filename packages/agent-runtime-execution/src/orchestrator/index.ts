/**
 * Orchestrator Module
 *
 * The per-run iteration loop and the pieces each iteration is made of.
 */

export {
  type ControlMarker,
  detectControlMarker,
  extractTodoUpdate,
  formatTodoMessage,
  todoLabel,
} from "./controlMarkers";
export {
  browserStateParts,
  buildEphemeralContext,
  consumeImageContext,
  imageContextParts,
} from "./ephemeralContext";
export {
  type IterationInput,
  type IterationOutcome,
  IterationProcessor,
  type IterationProcessorOptions,
  type IterationSettings,
  type MessageSink,
  type TerminalToolOutcome,
} from "./iterationProcessor";
export {
  RunOrchestrator,
  type RunOrchestratorOptions,
  type RunOutcome,
  type StartRunRequest,
  type ToolFactory,
  type ToolFactoryContext,
} from "./runOrchestrator";
