/**
 * XML Tool-Call Parser
 *
 * Extracts tag-style tool calls from assistant text. Only top-level elements
 * whose tag is registered in the XML table are treated as calls; everything
 * else is prose. Arguments are read through each tag's node mappings.
 */

import type { ToolCall, XmlNodeMapping, XmlValueType } from "@tasklane/agent-runtime-core";
import {
  createSubsystemLogger,
  type RuntimeLogger,
} from "@tasklane/agent-runtime-telemetry/logging";
import type { RegisteredTool } from "../registry/toolRegistry";

export interface XmlParsingDetails {
  attributes: Record<string, string>;
  elements: Record<string, string>;
  textContent: string | null;
  rawChunk: string;
}

export interface ParsedXmlToolCall {
  call: ToolCall;
  details: XmlParsingDetails;
}

export interface XmlToolLookup {
  getXmlTool(tagName: string): RegisteredTool | undefined;
}

export interface XmlParseOptions {
  /** 0 means no limit */
  maxCalls?: number;
  logger?: RuntimeLogger;
}

export interface XmlChunk {
  tagName: string;
  attributes: Record<string, string>;
  inner: string;
  raw: string;
  start: number;
  end: number;
}

const OPEN_TAG = /<([A-Za-z_][\w.-]*)((?:\s+[^\s=>\/]+(?:\s*=\s*(?:"[^"]*"|'[^']*'|[^\s>"']+))?)*)\s*(\/?)>/g;
const ATTRIBUTE = /([^\s=]+)\s*=\s*(?:"([^"]*)"|'([^']*)'|([^\s"'>]+))/g;
const COMMENT = /<!--[\s\S]*?-->/g;
const ANY_TAG = /<\/?[A-Za-z_][^>]*>/g;

// ============================================================================
// Chunk extraction
// ============================================================================

/** Find complete top-level elements for the given tag names, in order. */
export function extractXmlChunks(text: string, tagNames: ReadonlySet<string>): XmlChunk[] {
  const chunks: XmlChunk[] = [];
  const source = text.replace(COMMENT, (comment) => " ".repeat(comment.length));
  const opener = new RegExp(OPEN_TAG.source, "g");

  let match = opener.exec(source);
  while (match) {
    const [openTag, tagName, attributeText, selfClosing] = match;
    const start = match.index;
    const openEnd = start + openTag.length;

    if (!tagNames.has(tagName)) {
      match = opener.exec(source);
      continue;
    }

    if (selfClosing === "/") {
      chunks.push({
        tagName,
        attributes: parseAttributes(attributeText),
        inner: "",
        raw: text.slice(start, openEnd),
        start,
        end: openEnd,
      });
      match = opener.exec(source);
      continue;
    }

    const close = findClosingTag(source, tagName, openEnd);
    if (close === null) {
      match = opener.exec(source);
      continue;
    }

    chunks.push({
      tagName,
      attributes: parseAttributes(attributeText),
      inner: text.slice(openEnd, close.start),
      raw: text.slice(start, close.end),
      start,
      end: close.end,
    });
    opener.lastIndex = close.end;
    match = opener.exec(source);
  }

  return chunks;
}

function findClosingTag(
  source: string,
  tagName: string,
  from: number
): { start: number; end: number } | null {
  const escaped = tagName.replace(/[.*+?^${}()|[\]\\-]/g, "\\$&");
  const pattern = new RegExp(`<(/?)${escaped}(?=[\\s/>])[^>]*?(/?)>`, "g");
  pattern.lastIndex = from;
  let depth = 1;
  let match = pattern.exec(source);
  while (match) {
    const [tag, closing, selfClosing] = match;
    if (closing === "/") {
      depth--;
      if (depth === 0) {
        return { start: match.index, end: match.index + tag.length };
      }
    } else if (selfClosing !== "/") {
      depth++;
    }
    match = pattern.exec(source);
  }
  return null;
}

function parseAttributes(text: string): Record<string, string> {
  const attributes: Record<string, string> = {};
  const pattern = new RegExp(ATTRIBUTE.source, "g");
  let match = pattern.exec(text);
  while (match) {
    const [, name, doubleQuoted, singleQuoted, bare] = match;
    attributes[name] = decodeEntities(doubleQuoted ?? singleQuoted ?? bare ?? "");
    match = pattern.exec(text);
  }
  return attributes;
}

export function decodeEntities(text: string): string {
  return text
    .replace(/&#x([0-9a-fA-F]+);/g, (_m, hex: string) => String.fromCodePoint(Number.parseInt(hex, 16)))
    .replace(/&#(\d+);/g, (_m, dec: string) => String.fromCodePoint(Number.parseInt(dec, 10)))
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&apos;/g, "'")
    .replace(/&amp;/g, "&");
}

/** Inner text with comments and child tags removed. */
export function textContent(inner: string): string {
  return decodeEntities(inner.replace(COMMENT, "").replace(ANY_TAG, ""));
}

function firstElementText(inner: string, name: string): string | null {
  const escaped = name.replace(/[.*+?^${}()|[\]\\-]/g, "\\$&");
  const pattern = new RegExp(`<${escaped}(?:\\s[^>]*)?>([\\s\\S]*?)</${escaped}>`);
  const match = pattern.exec(inner);
  return match ? textContent(match[1]) : null;
}

// ============================================================================
// Value conversion
// ============================================================================

type Converted = { ok: true; value: unknown } | { ok: false };

export function convertXmlValue(value: string, valueType: XmlValueType): Converted {
  switch (valueType) {
    case "string":
      return { ok: true, value };
    case "int": {
      const trimmed = value.trim();
      return /^[+-]?\d+$/.test(trimmed)
        ? { ok: true, value: Number.parseInt(trimmed, 10) }
        : { ok: false };
    }
    case "float": {
      const parsed = Number(value.trim());
      return value.trim() !== "" && Number.isFinite(parsed)
        ? { ok: true, value: parsed }
        : { ok: false };
    }
    case "boolean":
      return { ok: true, value: value.trim().toLowerCase() === "true" };
    case "json":
      try {
        const parsed: unknown = JSON.parse(value);
        return { ok: true, value: parsed };
      } catch {
        return { ok: false };
      }
  }
}

// ============================================================================
// Parsing
// ============================================================================

export class XmlToolCallParser {
  private readonly logger: RuntimeLogger;

  constructor(
    private readonly lookup: XmlToolLookup & { xmlTagNames(): string[] },
    private readonly options: XmlParseOptions = {}
  ) {
    this.logger = options.logger ?? createSubsystemLogger("xml-parser");
  }

  parse(text: string): ParsedXmlToolCall[] {
    const tagNames = new Set(this.lookup.xmlTagNames());
    if (tagNames.size === 0) {
      return [];
    }

    const parsed: ParsedXmlToolCall[] = [];
    for (const chunk of extractXmlChunks(text, tagNames)) {
      const call = this.parseChunk(chunk);
      if (call) {
        parsed.push(call);
      }
    }

    const maxCalls = this.options.maxCalls ?? 0;
    if (maxCalls > 0 && parsed.length > maxCalls) {
      this.logger.debug("XML tool call limit reached", { limit: maxCalls, found: parsed.length });
      return parsed.slice(0, maxCalls);
    }
    return parsed;
  }

  parseChunk(chunk: XmlChunk): ParsedXmlToolCall | null {
    const tool = this.lookup.getXmlTool(chunk.tagName);
    const schema = tool?.schemas.find(
      (candidate) =>
        candidate.callingConvention === "XML" && candidate.xmlTag.tagName === chunk.tagName
    );
    if (!tool || !schema || schema.callingConvention !== "XML") {
      this.logger.warn("No XML schema registered for tag", { tag: chunk.tagName });
      return null;
    }

    const args: Record<string, unknown> = {};
    const details: XmlParsingDetails = {
      attributes: {},
      elements: {},
      textContent: null,
      rawChunk: chunk.raw,
    };

    for (const mapping of schema.xmlTag.mappings) {
      const value = this.readMapping(chunk, mapping, details);
      if (value === null) {
        continue;
      }
      args[mapping.paramName] = this.convert(chunk.tagName, mapping, value);
    }

    if (Object.keys(args).length === 0 && details.textContent === null) {
      const text = textContent(chunk.inner).trim();
      if (text) {
        args.text = text;
        details.textContent = text;
      }
    }

    return {
      call: {
        name: tool.registrationKey,
        arguments: args,
        xmlTagName: chunk.tagName,
      },
      details,
    };
  }

  private readMapping(
    chunk: XmlChunk,
    mapping: XmlNodeMapping,
    details: XmlParsingDetails
  ): string | null {
    switch (mapping.nodeType) {
      case "attribute": {
        const value = chunk.attributes[mapping.path];
        if (value === undefined || value === "") {
          return null;
        }
        details.attributes[mapping.path] = value;
        return value;
      }
      case "element": {
        const value = firstElementText(chunk.inner, mapping.path);
        if (value === null) {
          return null;
        }
        details.elements[mapping.path] = value;
        return value;
      }
      case "text":
      case "content": {
        const value = textContent(chunk.inner).trim();
        details.textContent = value;
        return value;
      }
      case "root":
        return chunk.raw;
    }
  }

  private convert(tagName: string, mapping: XmlNodeMapping, value: string): unknown {
    const converted = convertXmlValue(value, mapping.valueType);
    if (converted.ok) {
      return converted.value;
    }
    this.logger.warn("XML value conversion failed; keeping raw text", {
      tag: tagName,
      parameter: mapping.paramName,
      valueType: mapping.valueType,
    });
    return value;
  }
}
