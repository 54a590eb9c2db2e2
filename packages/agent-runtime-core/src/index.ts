/**
 * Agent Runtime Core Types
 *
 * Run, thread and message records, tool schema types and control-plane tokens
 * shared by every runtime package.
 */

export * from "./cancellation";
export * from "./errors";
export * from "./result";

// ============================================================================
// Run Lifecycle
// ============================================================================

/** Lifecycle status of a run */
export type RunStatus = "RUNNING" | "COMPLETED" | "FAILED" | "STOPPED";

export const TERMINAL_RUN_STATUSES: ReadonlySet<RunStatus> = new Set<RunStatus>([
  "COMPLETED",
  "FAILED",
  "STOPPED",
]);

export function isTerminalRunStatus(status: RunStatus): boolean {
  return TERMINAL_RUN_STATUSES.has(status);
}

export interface Run {
  id: string;
  threadId: string;
  projectId: string;
  status: RunStatus;
  errorMessage?: string;
  /** Epoch milliseconds */
  startedAt: number;
  completedAt?: number;
}

export interface Thread {
  id: string;
  projectId: string;
  createdAt: number;
}

// ============================================================================
// Messages
// ============================================================================

export const MESSAGE_TYPES = [
  "user",
  "assistant",
  "tool_result",
  "summary",
  "status",
  "browser_state",
  "image_context",
] as const;

export type MessageType = (typeof MESSAGE_TYPES)[number];

/** Multimodal content part */
export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image_url"; imageUrl: { url: string } };

export type MessageContent = string | ContentPart[];

export interface Message {
  id: string;
  threadId: string;
  type: MessageType;
  content: MessageContent;
  /** Whether the message is part of the model-visible conversation */
  isLlmMessage: boolean;
  metadata: Record<string, unknown>;
  createdAt: number;
}

/** Message draft before the store assigns identity and time */
export interface NewMessage {
  id?: string;
  threadId: string;
  type: MessageType;
  content: MessageContent;
  isLlmMessage: boolean;
  metadata?: Record<string, unknown>;
  createdAt?: number;
}

/** Flatten message content to the text the model reads. */
export function messageText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content
    .filter((part): part is Extract<ContentPart, { type: "text" }> => part.type === "text")
    .map((part) => part.text)
    .join("\n");
}

// ============================================================================
// Tool Schemas
// ============================================================================

/** JSON Schema subset for tool parameters */
export interface JSONSchema {
  type: "object" | "string" | "number" | "boolean" | "array";
  properties?: Record<string, JSONSchemaProperty>;
  additionalProperties?: boolean;
  required?: string[];
  description?: string;
}

export interface JSONSchemaProperty {
  type?: "string" | "number" | "integer" | "boolean" | "array" | "object";
  description?: string;
  enum?: string[];
  items?: JSONSchemaProperty;
  default?: unknown;
  properties?: Record<string, JSONSchemaProperty>;
  required?: string[];
}

export type CallingConvention = "FUNCTION" | "XML" | "CUSTOM";

export type XmlNodeType = "attribute" | "element" | "text" | "content" | "root";

export type XmlValueType = "string" | "int" | "float" | "boolean" | "json";

/** Maps one XML node of a tag-style call to an operation parameter */
export interface XmlNodeMapping {
  paramName: string;
  nodeType: XmlNodeType;
  /** Attribute or element name; "." for the root element */
  path: string;
  required: boolean;
  valueType: XmlValueType;
}

export interface XmlTagSpec {
  tagName: string;
  mappings: XmlNodeMapping[];
  example?: string;
}

export type ToolSchema =
  | {
      callingConvention: "FUNCTION";
      name: string;
      description: string;
      parameterSpec: JSONSchema;
    }
  | {
      callingConvention: "XML";
      name: string;
      description: string;
      parameterSpec: JSONSchema;
      xmlTag: XmlTagSpec;
    }
  | {
      callingConvention: "CUSTOM";
      name: string;
      description: string;
      parameterSpec: Record<string, unknown>;
    };

/** A call issued by the model, either natively or through an XML tag */
export interface ToolCall {
  /** Provider-assigned id for native calls */
  id?: string;
  name: string;
  arguments: Record<string, unknown>;
  xmlTagName?: string;
}

export interface ToolResult {
  success: boolean;
  output: string;
}

export function formatToolResult(result: ToolResult): string {
  return `ToolResult(success=${result.success}, output=${result.output})`;
}

/** How a terminating tool ends the run */
export type TerminalKind = "complete" | "pause";

// ============================================================================
// Control Plane
// ============================================================================

export type ControlSignal = "STOP" | "PAUSE" | "END_STREAM" | "ERROR";

export const CONTROL_SIGNALS: readonly ControlSignal[] = ["STOP", "PAUSE", "END_STREAM", "ERROR"];

export function isControlSignal(value: string): value is ControlSignal {
  return CONTROL_SIGNALS.some((signal) => signal === value);
}

// ============================================================================
// Workspace
// ============================================================================

/** File primitives of the sandbox a run operates in */
export interface Workspace {
  /** Null when the file does not exist */
  readFile(path: string): Promise<string | null>;
  writeFile(path: string, content: string): Promise<void>;
}
