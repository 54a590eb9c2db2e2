/**
 * Tool Name Sanitization
 *
 * Every externally visible tool identifier must satisfy the provider
 * constraint `^[A-Za-z0-9_-]{1,64}$`. Non-conforming declared names are
 * cleaned; names that clean to nothing are replaced by a generated fallback.
 */

import { randomUUID } from "node:crypto";

export const MAX_TOOL_NAME_LENGTH = 64;

export const TOOL_NAME_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** Prefix chosen by where the fallback is needed */
export type FallbackPrefix = "toolfunc_" | "xmltag_" | "openapi_" | "customfunc_";

const MAX_CONTEXT_LENGTH = 20;
const MAX_FALLBACK_ATTEMPTS = 8;
const LAST_RESORT_NAME = "tool_name";

export interface SanitizeOptions {
  prefix: FallbackPrefix;
  /** Identifier folded into a generated fallback, e.g. the operation name */
  context?: string;
  /** Short random suffix source */
  randomSuffix?: () => string;
  /** Reports whether a generated name is already in use */
  isTaken?: (name: string) => boolean;
}

export interface SanitizedName {
  name: string;
  /** True when the declared name could not be used and a fallback was generated */
  generated: boolean;
}

export function isValidToolName(value: unknown): value is string {
  return typeof value === "string" && TOOL_NAME_PATTERN.test(value);
}

/** trim, whitespace runs to `_`, strip anything outside [A-Za-z0-9_-] */
export function cleanToolName(raw: string): string {
  return raw
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9_-]/g, "");
}

export function defaultRandomSuffix(): string {
  return randomUUID().replace(/-/g, "").slice(0, 8);
}

export function sanitizeToolName(raw: string | undefined, options: SanitizeOptions): SanitizedName {
  const cleaned = cleanToolName(raw ?? "").slice(0, MAX_TOOL_NAME_LENGTH);
  if (cleaned.length > 0) {
    return { name: cleaned, generated: false };
  }
  return { name: generateFallbackName(options), generated: true };
}

export function generateFallbackName(options: SanitizeOptions): string {
  const randomSuffix = options.randomSuffix ?? defaultRandomSuffix;
  const contextPart = cleanToolName(options.context ?? "").slice(0, MAX_CONTEXT_LENGTH);

  for (let attempt = 0; attempt < MAX_FALLBACK_ATTEMPTS; attempt++) {
    const candidate = buildFallback(options.prefix, contextPart, randomSuffix());
    if (!options.isTaken?.(candidate)) {
      return candidate;
    }
  }

  // Suffix source keeps colliding; disambiguate with a counter.
  const base = buildFallback(options.prefix, contextPart, randomSuffix()).slice(
    0,
    MAX_TOOL_NAME_LENGTH - 4
  );
  let counter = 2;
  let candidate = `${base}_${counter}`;
  while (options.isTaken?.(candidate)) {
    counter++;
    candidate = `${base}_${counter}`;
  }
  return candidate;
}

function buildFallback(prefix: FallbackPrefix, contextPart: string, suffix: string): string {
  const joined = contextPart ? `${prefix}${contextPart}_${suffix}` : `${prefix}${suffix}`;
  const cleaned = cleanToolName(joined).slice(0, MAX_TOOL_NAME_LENGTH);
  return cleaned.length > 0 ? cleaned : LAST_RESORT_NAME;
}
