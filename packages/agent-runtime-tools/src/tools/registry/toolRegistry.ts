/**
 * Tool Registry
 *
 * Per-run catalog of tool capabilities. Builds two lookup tables from each
 * capability's declared operations:
 * - call table: sanitized call name -> operation (function and custom schemas,
 *   plus the operation's own registration key)
 * - XML table: sanitized tag name -> operation
 *
 * Dispatch binds the model's argument bag to the operation's parameters and
 * never throws: failures come back as DispatchError results.
 */

import {
  type CancellationToken,
  DispatchError,
  err,
  NEVER_CANCELLED,
  ok,
  type Result,
  type TerminalKind,
  type ToolResult,
  type ToolSchema,
} from "@tasklane/agent-runtime-core";
import {
  createSubsystemLogger,
  type RuntimeLogger,
} from "@tasklane/agent-runtime-telemetry/logging";
import { bindArguments } from "../capability/binding";
import {
  type OperationDefinition,
  parametersToJsonSchema,
  type SchemaDeclaration,
  type ToolCapability,
} from "../capability/toolCapability";
import { type FallbackPrefix, isValidToolName, sanitizeToolName } from "../naming";

// ============================================================================
// Types
// ============================================================================

export interface RegisteredTool {
  registrationKey: string;
  capability: ToolCapability;
  operation: OperationDefinition;
  schemas: ToolSchema[];
}

export interface InvokeContext {
  token?: CancellationToken;
}

export interface ToolRegistryOptions {
  logger?: RuntimeLogger;
  /** Random suffix source for generated fallback names */
  randomSuffix?: () => string;
}

/** Registry interface consumed by the iteration processor */
export interface IToolRegistry {
  register(capability: ToolCapability, allowedOperationNames?: readonly string[]): void;
  invoke(
    name: string,
    args: Record<string, unknown>,
    context?: InvokeContext
  ): Promise<Result<ToolResult, DispatchError>>;
  listFunctionSchemas(): ToolSchema[];
  listXmlExamples(): Record<string, string>;
  getXmlTool(tagName: string): RegisteredTool | undefined;
  resolve(name: string): RegisteredTool | undefined;
  terminalKind(name: string): TerminalKind | undefined;
}

// ============================================================================
// Implementation
// ============================================================================

export class ToolRegistry implements IToolRegistry {
  private readonly callTable = new Map<string, RegisteredTool>();
  private readonly xmlTable = new Map<string, RegisteredTool>();
  private readonly logger: RuntimeLogger;
  private readonly randomSuffix?: () => string;

  constructor(options: ToolRegistryOptions = {}) {
    this.logger = options.logger ?? createSubsystemLogger("tool-registry");
    this.randomSuffix = options.randomSuffix;
  }

  register(capability: ToolCapability, allowedOperationNames?: readonly string[]): void {
    const allowed = allowedOperationNames ? new Set(allowedOperationNames) : null;

    for (const operation of capability.listOperations()) {
      if (allowed && !allowed.has(operation.name)) {
        continue;
      }
      this.registerOperation(capability, operation);
    }
  }

  private registerOperation(capability: ToolCapability, operation: OperationDefinition): void {
    const registrationKey = this.sanitize(operation.name, "toolfunc_", capability.name);
    this.removeKey(registrationKey);

    const entry: RegisteredTool = {
      registrationKey,
      capability,
      operation,
      schemas: [],
    };
    this.callTable.set(registrationKey, entry);

    const declarations: SchemaDeclaration[] =
      operation.schemas.length > 0 ? operation.schemas : [{ kind: "FUNCTION" }];

    for (const declaration of declarations) {
      const schema = this.buildSchema(entry, declaration);
      entry.schemas.push(schema);
      if (schema.callingConvention === "XML") {
        this.xmlTable.set(schema.xmlTag.tagName, entry);
      } else {
        this.callTable.set(schema.name, entry);
      }
    }

    this.logger.debug("Registered tool operation", {
      tool: capability.name,
      registrationKey,
      conventions: entry.schemas.map((schema) => schema.callingConvention),
    });
  }

  private buildSchema(entry: RegisteredTool, declaration: SchemaDeclaration): ToolSchema {
    const { operation, registrationKey } = entry;
    switch (declaration.kind) {
      case "FUNCTION":
        return {
          callingConvention: "FUNCTION",
          name: declaration.name
            ? this.sanitize(declaration.name, "openapi_", registrationKey)
            : registrationKey,
          description: declaration.description ?? operation.description,
          parameterSpec: declaration.parameterSpec ?? parametersToJsonSchema(operation.parameters),
        };
      case "XML":
        return {
          callingConvention: "XML",
          name: registrationKey,
          description: declaration.description ?? operation.description,
          parameterSpec: parametersToJsonSchema(operation.parameters),
          xmlTag: {
            tagName: this.sanitize(declaration.tagName, "xmltag_", `${operation.name}_tag`, true),
            mappings: declaration.mappings,
            example: declaration.example,
          },
        };
      case "CUSTOM":
        return {
          callingConvention: "CUSTOM",
          name: declaration.name
            ? this.sanitize(declaration.name, "customfunc_", registrationKey)
            : registrationKey,
          description: declaration.description ?? operation.description,
          parameterSpec: declaration.spec,
        };
    }
  }

  private sanitize(raw: string, prefix: FallbackPrefix, context: string, xml = false): string {
    const table = xml ? this.xmlTable : this.callTable;
    const result = sanitizeToolName(raw, {
      prefix,
      context,
      randomSuffix: this.randomSuffix,
      isTaken: (name) => table.has(name),
    });
    if (result.generated) {
      this.logger.warn("Generated fallback tool name", { declared: raw, generated: result.name });
    } else if (result.name !== raw) {
      this.logger.debug("Sanitized tool name", { declared: raw, sanitized: result.name });
    }
    return result.name;
  }

  /** Drop every table entry owned by a registration key (last writer wins). */
  private removeKey(registrationKey: string): void {
    for (const table of [this.callTable, this.xmlTable]) {
      for (const [name, entry] of table) {
        if (entry.registrationKey === registrationKey) {
          table.delete(name);
        }
      }
    }
  }

  // ==========================================================================
  // Lookup
  // ==========================================================================

  resolve(name: string): RegisteredTool | undefined {
    return this.callTable.get(name) ?? this.xmlTable.get(name);
  }

  getXmlTool(tagName: string): RegisteredTool | undefined {
    return this.xmlTable.get(tagName);
  }

  xmlTagNames(): string[] {
    return Array.from(this.xmlTable.keys());
  }

  terminalKind(name: string): TerminalKind | undefined {
    return this.resolve(name)?.operation.terminal;
  }

  // ==========================================================================
  // Dispatch
  // ==========================================================================

  async invoke(
    name: string,
    args: Record<string, unknown>,
    context: InvokeContext = {}
  ): Promise<Result<ToolResult, DispatchError>> {
    const entry = this.resolve(name);
    if (!entry) {
      this.logger.error("Tool not found", { tool: name });
      return err(DispatchError.notFound(name));
    }

    const { params, warnings } = bindArguments(entry.operation.parameters, args);
    for (const warning of warnings) {
      this.logger.warn("Parameter binding failed; passing null", {
        tool: name,
        parameter: warning.parameter,
        expected: warning.expected,
        received: warning.received,
        reason: warning.reason,
      });
    }

    try {
      const result = await entry.operation.handler(params, {
        token: context.token ?? NEVER_CANCELLED,
        logger: this.logger.child({ tool: entry.registrationKey }),
      });
      return ok(result);
    } catch (error) {
      const failure = DispatchError.executionFailed(name, error);
      this.logger.error("Tool execution failed", {
        tool: name,
        error: failure.message,
      });
      return err(failure);
    }
  }

  // ==========================================================================
  // Schema Export
  // ==========================================================================

  listSchemas(): ToolSchema[] {
    const seen = new Set<ToolSchema>();
    for (const entry of [...this.callTable.values(), ...this.xmlTable.values()]) {
      for (const schema of entry.schemas) {
        seen.add(schema);
      }
    }
    return Array.from(seen);
  }

  listFunctionSchemas(): ToolSchema[] {
    return this.listSchemas().filter((schema) => {
      if (schema.callingConvention !== "FUNCTION") {
        return false;
      }
      const name: unknown = schema.name;
      if (!isValidToolName(name)) {
        this.logger.warn("Dropping function schema with invalid name", { name: String(name) });
        return false;
      }
      return true;
    });
  }

  listXmlExamples(): Record<string, string> {
    const examples: Record<string, string> = {};
    for (const [tagName, entry] of this.xmlTable) {
      for (const schema of entry.schemas) {
        if (
          schema.callingConvention === "XML" &&
          schema.xmlTag.tagName === tagName &&
          schema.xmlTag.example
        ) {
          examples[tagName] = schema.xmlTag.example;
        }
      }
    }
    return examples;
  }
}
