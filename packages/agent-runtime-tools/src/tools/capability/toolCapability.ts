/**
 * Tool Capability
 *
 * Base class every tool implements. A capability enumerates its own
 * operations through a declaration builder; nothing is discovered by
 * introspection. Each operation carries typed parameter specs, a handler and
 * one or more schema declarations (function, XML tag, or custom).
 */

import type {
  CancellationToken,
  JSONSchema,
  JSONSchemaProperty,
  TerminalKind,
  ToolResult,
  XmlNodeMapping,
  XmlNodeType,
  XmlValueType,
} from "@tasklane/agent-runtime-core";
import type { RuntimeLogger } from "@tasklane/agent-runtime-telemetry/logging";
import type { BoundParameters, ParameterSpec, ParameterType } from "./binding";

// ============================================================================
// Declarations
// ============================================================================

export interface OperationContext {
  token: CancellationToken;
  logger: RuntimeLogger;
}

export type OperationHandler = (
  params: BoundParameters,
  context: OperationContext
) => ToolResult | Promise<ToolResult>;

export type SchemaDeclaration =
  | { kind: "FUNCTION"; name?: string; description?: string; parameterSpec?: JSONSchema }
  | {
      kind: "XML";
      tagName: string;
      mappings: XmlNodeMapping[];
      example?: string;
      description?: string;
    }
  | { kind: "CUSTOM"; name?: string; description?: string; spec: Record<string, unknown> };

export interface OperationDefinition {
  /** Declared name; sanitized by the registry before exposure */
  name: string;
  description: string;
  parameters: ParameterSpec[];
  schemas: SchemaDeclaration[];
  terminal?: TerminalKind;
  handler: OperationHandler;
}

// ============================================================================
// Builder
// ============================================================================

export class OperationBuilder {
  private readonly parameters: ParameterSpec[] = [];
  private readonly schemas: SchemaDeclaration[] = [];
  private terminalKind: TerminalKind | undefined;

  constructor(
    private readonly name: string,
    private readonly description: string,
    private readonly commit: (definition: OperationDefinition) => void
  ) {}

  param(spec: ParameterSpec): this {
    this.parameters.push(spec);
    return this;
  }

  /** Expose as a function-call schema; the parameter spec defaults to the declared params. */
  asFunction(overrides: { name?: string; description?: string; parameterSpec?: JSONSchema } = {}): this {
    this.schemas.push({ kind: "FUNCTION", ...overrides });
    return this;
  }

  asXml(tagName: string, options: { mappings?: XmlNodeMapping[]; example?: string } = {}): this {
    this.schemas.push({
      kind: "XML",
      tagName,
      mappings: options.mappings ?? [],
      example: options.example,
    });
    return this;
  }

  asCustom(spec: Record<string, unknown>, name?: string): this {
    this.schemas.push({ kind: "CUSTOM", name, spec });
    return this;
  }

  /** Running this operation ends the run */
  terminal(kind: TerminalKind): this {
    this.terminalKind = kind;
    return this;
  }

  handle(handler: OperationHandler): void {
    this.commit({
      name: this.name,
      description: this.description,
      parameters: [...this.parameters],
      schemas: [...this.schemas],
      terminal: this.terminalKind,
      handler,
    });
  }
}

export interface OperationDeclarer {
  operation(name: string, description: string): OperationBuilder;
}

// ============================================================================
// Base Class
// ============================================================================

export abstract class ToolCapability {
  abstract readonly name: string;

  private operations: Map<string, OperationDefinition> | null = null;

  /** Declare every operation this capability exposes. Called once, lazily. */
  protected abstract declareOperations(declare: OperationDeclarer): void;

  listOperations(): OperationDefinition[] {
    return Array.from(this.ensureDeclared().values());
  }

  getOperation(name: string): OperationDefinition | undefined {
    return this.ensureDeclared().get(name);
  }

  private ensureDeclared(): Map<string, OperationDefinition> {
    if (this.operations) {
      return this.operations;
    }
    const operations = new Map<string, OperationDefinition>();
    this.declareOperations({
      operation: (name, description) =>
        new OperationBuilder(name, description, (definition) => {
          operations.set(definition.name, definition);
        }),
    });
    this.operations = operations;
    return operations;
  }
}

// ============================================================================
// Helpers
// ============================================================================

export function successResult(output: unknown): ToolResult {
  return {
    success: true,
    output: typeof output === "string" ? output : JSON.stringify(output),
  };
}

export function failureResult(message: string): ToolResult {
  return { success: false, output: message };
}

export function xmlMapping(
  paramName: string,
  nodeType: XmlNodeType,
  path = ".",
  options: { required?: boolean; valueType?: XmlValueType } = {}
): XmlNodeMapping {
  return {
    paramName,
    nodeType,
    path,
    required: options.required ?? false,
    valueType: options.valueType ?? "string",
  };
}

const PROPERTY_TYPES: Record<ParameterType, JSONSchemaProperty["type"]> = {
  string: "string",
  char: "string",
  number: "number",
  integer: "integer",
  boolean: "boolean",
  array: "array",
  object: "object",
  structured: "object",
  any: undefined,
  bag: "object",
};

/** Derive a JSON Schema from declared parameters. */
export function parametersToJsonSchema(parameters: readonly ParameterSpec[]): JSONSchema {
  const properties: Record<string, JSONSchemaProperty> = {};
  const required: string[] = [];
  for (const parameter of parameters) {
    if (parameter.type === "bag") {
      continue;
    }
    const property: JSONSchemaProperty = {};
    const type = PROPERTY_TYPES[parameter.type];
    if (type) {
      property.type = type;
    }
    if (parameter.description) {
      property.description = parameter.description;
    }
    properties[parameter.name] = property;
    if (parameter.required) {
      required.push(parameter.name);
    }
  }
  const schema: JSONSchema = { type: "object", properties };
  if (required.length > 0) {
    schema.required = required;
  }
  return schema;
}
