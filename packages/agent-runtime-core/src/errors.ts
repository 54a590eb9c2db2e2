// ============================================================================
// Errors
// ============================================================================

export type DispatchErrorCode = "NOT_FOUND" | "EXECUTION_FAILED";

/**
 * Raised by tool dispatch. Returned inside a Result, never thrown across the
 * registry boundary.
 */
export class DispatchError extends Error {
  readonly code: DispatchErrorCode;
  readonly toolName: string;

  constructor(code: DispatchErrorCode, toolName: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "DispatchError";
    this.code = code;
    this.toolName = toolName;
  }

  static notFound(toolName: string): DispatchError {
    return new DispatchError("NOT_FOUND", toolName, `Tool function '${toolName}' not found`);
  }

  static executionFailed(toolName: string, cause: unknown): DispatchError {
    return new DispatchError(
      "EXECUTION_FAILED",
      toolName,
      `Error executing tool: ${errorMessage(cause)}`,
      cause
    );
  }
}

/** Uncaught failure inside the iteration loop. */
export class RunFailure extends Error {
  readonly code = "RUN_FAILED";
  readonly runId: string;

  constructor(runId: string, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "RunFailure";
    this.runId = runId;
  }
}

/** A status or message write that could not be stored. Logged, never escalated. */
export class PersistenceFailure extends Error {
  readonly code = "PERSISTENCE_FAILED";
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`Persistence operation '${operation}' failed: ${errorMessage(cause)}`, { cause });
    this.name = "PersistenceFailure";
    this.operation = operation;
  }
}

export class ConfigError extends Error {
  readonly code = "INVALID_CONFIG";
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid runtime configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
