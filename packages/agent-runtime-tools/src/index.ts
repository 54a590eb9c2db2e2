/**
 * Agent Runtime Tools
 *
 * Tool capabilities, the per-run registry and XML tool-call parsing.
 */

export {
  BoundParameters,
  type BindingOutcome,
  type BindingWarning,
  bindArguments,
  camelToSnake,
  convertValue,
  type ParameterSpec,
  type ParameterType,
  snakeToCamel,
} from "./tools/capability/binding";
export {
  failureResult,
  OperationBuilder,
  type OperationContext,
  type OperationDeclarer,
  type OperationDefinition,
  type OperationHandler,
  parametersToJsonSchema,
  type SchemaDeclaration,
  successResult,
  ToolCapability,
  xmlMapping,
} from "./tools/capability/toolCapability";
export { MessageTool, parseAttachments } from "./tools/core/message";
export {
  DEFAULT_TODO_PATH,
  renderTaskItem,
  type TaskItem,
  TaskListTool,
  taskItemSchema,
} from "./tools/core/taskList";
export {
  cleanToolName,
  type FallbackPrefix,
  generateFallbackName,
  isValidToolName,
  MAX_TOOL_NAME_LENGTH,
  type SanitizedName,
  type SanitizeOptions,
  sanitizeToolName,
  TOOL_NAME_PATTERN,
} from "./tools/naming";
export {
  type InvokeContext,
  type IToolRegistry,
  type RegisteredTool,
  ToolRegistry,
  type ToolRegistryOptions,
} from "./tools/registry/toolRegistry";
export {
  decodeEntities,
  extractXmlChunks,
  type ParsedXmlToolCall,
  type XmlChunk,
  type XmlParseOptions,
  type XmlParsingDetails,
  XmlToolCallParser,
  type XmlToolLookup,
} from "./tools/xml/xmlToolParser";
export { InMemoryWorkspace } from "./workspace/inMemoryWorkspace";
