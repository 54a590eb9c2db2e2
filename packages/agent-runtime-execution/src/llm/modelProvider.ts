/**
 * Model Provider Interface
 *
 * Implement this to connect the run engine to a language model. The wire
 * format is the provider's concern; the engine hands it the conversation and
 * the tool surface and reads back outputs and native tool calls.
 */

import type {
  CancellationToken,
  ContentPart,
  Message,
  MessageContent,
  TerminalKind,
  ToolCall,
  ToolSchema,
} from "@tasklane/agent-runtime-core";

export interface SamplingParams {
  temperature: number;
  maxTokens?: number;
}

/** Non-persisted user-role context attached after the history */
export interface EphemeralContext {
  role: "user";
  content: ContentPart[];
}

export interface ModelRequest {
  systemPrompt: string;
  history: Message[];
  ephemeralContext: EphemeralContext | null;
  /** Function-style schemas for native tool calling */
  toolSchemas: ToolSchema[];
  /** Tag to usage example, for prompt construction */
  xmlExamples: Record<string, string>;
  modelName: string;
  sampling: SamplingParams;
  token: CancellationToken;
}

export type ModelOutput =
  | { kind: "text"; content: MessageContent }
  | { kind: "status"; status: "finish" | "error"; message?: string };

export interface ModelResponse {
  messages: ModelOutput[];
  toolCalls?: ToolCall[];
  /** Provider-level request to end the run */
  terminalSignal?: TerminalKind;
}

export interface ModelProvider {
  call(request: ModelRequest): Promise<ModelResponse>;
}
