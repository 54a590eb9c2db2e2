/**
 * Parameter Binding
 *
 * Binds a loosely-typed, model-issued argument bag to an operation's declared
 * parameters and coerces each value to the declared type. A value that cannot
 * be coerced becomes null and a warning is recorded; binding never fails the call.
 */

import type { z } from "zod";

export type ParameterType =
  | "string"
  | "char"
  | "number"
  | "integer"
  | "boolean"
  | "array"
  | "object"
  | "structured"
  | "any"
  /** Receives the whole argument bag unchanged */
  | "bag";

export interface ParameterSpec {
  name: string;
  type: ParameterType;
  description?: string;
  required?: boolean;
  /** Target shape for `structured` parameters */
  schema?: z.ZodTypeAny;
}

export interface BindingWarning {
  parameter: string;
  expected: ParameterType;
  received: string;
  reason: string;
}

export interface BindingOutcome {
  params: BoundParameters;
  warnings: BindingWarning[];
}

const CONTENT_KEYS = ["text", "content"] as const;

// ============================================================================
// Binding
// ============================================================================

export function bindArguments(
  parameters: readonly ParameterSpec[],
  bag: Record<string, unknown>
): BindingOutcome {
  const [single] = parameters;

  if (parameters.length === 1 && single.type === "bag") {
    return { params: new BoundParameters(new Map([[single.name, { ...bag }]]), bag), warnings: [] };
  }

  if (parameters.length === 1 && single.type === "string") {
    return {
      params: new BoundParameters(new Map([[single.name, JSON.stringify(bag)]]), bag),
      warnings: [],
    };
  }

  const values = new Map<string, unknown>();
  const warnings: BindingWarning[] = [];

  parameters.forEach((parameter, index) => {
    const raw = lookupArgument(parameter.name, bag, index === 0);
    if (raw === undefined || raw === null) {
      values.set(parameter.name, null);
      return;
    }
    const converted = convertValue(raw, parameter);
    if (converted.ok) {
      values.set(parameter.name, converted.value);
      return;
    }
    values.set(parameter.name, null);
    warnings.push({
      parameter: parameter.name,
      expected: parameter.type,
      received: describeValue(raw),
      reason: converted.reason,
    });
  });

  return { params: new BoundParameters(values, bag), warnings };
}

function lookupArgument(
  name: string,
  bag: Record<string, unknown>,
  isFirstParameter: boolean
): unknown {
  if (hasKey(bag, name)) {
    return bag[name];
  }
  const alternate = name.includes("_") ? snakeToCamel(name) : camelToSnake(name);
  if (hasKey(bag, alternate)) {
    return bag[alternate];
  }
  if (!isFirstParameter) {
    return undefined;
  }
  for (const key of CONTENT_KEYS) {
    if (hasKey(bag, key)) {
      return bag[key];
    }
  }
  const entries = Object.values(bag);
  return entries.length === 1 ? entries[0] : undefined;
}

function hasKey(bag: Record<string, unknown>, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(bag, key);
}

export function snakeToCamel(name: string): string {
  return name.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

export function camelToSnake(name: string): string {
  return name.replace(/([a-z0-9])([A-Z])/g, "$1_$2").toLowerCase();
}

// ============================================================================
// Coercion
// ============================================================================

type Conversion = { ok: true; value: unknown } | { ok: false; reason: string };

const accept = (value: unknown): Conversion => ({ ok: true, value });
const reject = (reason: string): Conversion => ({ ok: false, reason });

export function convertValue(value: unknown, parameter: ParameterSpec): Conversion {
  switch (parameter.type) {
    case "any":
    case "bag":
      return accept(value);
    case "string":
      return toStringValue(value);
    case "char":
      return toChar(value);
    case "number":
      return toNumber(value);
    case "integer":
      return toInteger(value);
    case "boolean":
      return toBoolean(value);
    case "array":
      return toArray(value);
    case "object":
      return toRecord(value);
    case "structured":
      return toStructured(value, parameter.schema);
  }
}

function toStringValue(value: unknown): Conversion {
  if (typeof value === "string") {
    return accept(value);
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return accept(String(value));
  }
  return accept(JSON.stringify(value));
}

function toChar(value: unknown): Conversion {
  if (typeof value === "string") {
    return value.length > 0 ? accept(value.charAt(0)) : reject("empty string");
  }
  if (typeof value === "number" && Number.isInteger(value) && value >= 0) {
    return accept(String.fromCharCode(value));
  }
  return reject("not convertible to a character");
}

function toNumber(value: unknown): Conversion {
  if (typeof value === "number") {
    return Number.isFinite(value) ? accept(value) : reject("not a finite number");
  }
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? accept(parsed) : reject("not a numeric string");
  }
  return reject("not convertible to a number");
}

function toInteger(value: unknown): Conversion {
  if (typeof value === "number") {
    return Number.isFinite(value) ? accept(Math.trunc(value)) : reject("not a finite number");
  }
  if (typeof value === "string" && /^[+-]?\d+$/.test(value.trim())) {
    return accept(Number.parseInt(value.trim(), 10));
  }
  return reject("not convertible to an integer");
}

function toBoolean(value: unknown): Conversion {
  if (typeof value === "boolean") {
    return accept(value);
  }
  if (typeof value === "number") {
    return accept(value !== 0);
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (normalized === "true") {
      return accept(true);
    }
    if (normalized === "false") {
      return accept(false);
    }
  }
  return reject("not convertible to a boolean");
}

function toArray(value: unknown): Conversion {
  if (Array.isArray(value)) {
    return accept(value);
  }
  const parsed = parseJson(value);
  return Array.isArray(parsed) ? accept(parsed) : reject("not an array");
}

function toRecord(value: unknown): Conversion {
  if (isRecord(value)) {
    return accept(value);
  }
  const parsed = parseJson(value);
  return isRecord(parsed) ? accept(parsed) : reject("not an object");
}

function toStructured(value: unknown, schema: z.ZodTypeAny | undefined): Conversion {
  const candidate = typeof value === "string" ? parseJson(value) : value;
  if (!schema) {
    return isRecord(candidate) ? accept(candidate) : reject("not an object");
  }
  const parsed = schema.safeParse(candidate);
  if (parsed.success) {
    return accept(parsed.data);
  }
  return reject(parsed.error.issues.map((issue) => issue.message).join("; "));
}

function parseJson(value: unknown): unknown {
  if (typeof value !== "string") {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(value);
    return parsed;
  } catch {
    return undefined;
  }
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) {
    return "array";
  }
  return value === null ? "null" : typeof value;
}

// ============================================================================
// Bound Parameters
// ============================================================================

/**
 * Typed view over bound values. Getters return null for a missing or
 * unconvertible argument; handlers validate their own required inputs.
 */
export class BoundParameters {
  constructor(
    private readonly values: ReadonlyMap<string, unknown>,
    private readonly source: Readonly<Record<string, unknown>>
  ) {}

  get(name: string): unknown {
    return this.values.get(name) ?? null;
  }

  string(name: string): string | null {
    const value = this.values.get(name);
    return typeof value === "string" ? value : null;
  }

  number(name: string): number | null {
    const value = this.values.get(name);
    return typeof value === "number" ? value : null;
  }

  boolean(name: string): boolean | null {
    const value = this.values.get(name);
    return typeof value === "boolean" ? value : null;
  }

  array(name: string): unknown[] | null {
    const value = this.values.get(name);
    return Array.isArray(value) ? value : null;
  }

  record(name: string): Record<string, unknown> | null {
    const value = this.values.get(name);
    return isRecord(value) ? value : null;
  }

  structured<S extends z.ZodTypeAny>(name: string, schema: S): z.infer<S> | null {
    const value = this.values.get(name);
    if (value === undefined || value === null) {
      return null;
    }
    const parsed = schema.safeParse(value);
    return parsed.success ? parsed.data : null;
  }

  /** The argument bag exactly as the model sent it */
  raw(): Readonly<Record<string, unknown>> {
    return this.source;
  }

  names(): string[] {
    return Array.from(this.values.keys());
  }
}
