/**
 * Tool Name Sanitization Tests
 */

import fc from "fast-check";
import { describe, expect, it } from "vitest";
import {
  cleanToolName,
  generateFallbackName,
  sanitizeToolName,
  TOOL_NAME_PATTERN,
} from "../tools/naming";

const fixedSuffix = () => "abcd1234";

describe("sanitizeToolName", () => {
  it("keeps valid names unchanged", () => {
    expect(sanitizeToolName("web-browser-takeover", { prefix: "xmltag_" })).toEqual({
      name: "web-browser-takeover",
      generated: false,
    });
  });

  it("trims and collapses whitespace to underscores", () => {
    expect(sanitizeToolName("  read   file ", { prefix: "toolfunc_" }).name).toBe("read_file");
  });

  it("strips characters outside the allowed set", () => {
    expect(cleanToolName("tool.name!(v2)")).toBe("toolnamev2");
  });

  it("truncates to 64 characters", () => {
    expect(sanitizeToolName("a".repeat(100), { prefix: "toolfunc_" }).name).toBe("a".repeat(64));
  });

  it("generates a fallback for names that clean to nothing", () => {
    expect(
      sanitizeToolName("!!!", { prefix: "toolfunc_", context: "ask", randomSuffix: fixedSuffix })
    ).toEqual({ name: "toolfunc_ask_abcd1234", generated: true });
  });

  it("caps the context part of a fallback at 20 characters", () => {
    const result = sanitizeToolName(undefined, {
      prefix: "xmltag_",
      context: "a very long context identifier here",
      randomSuffix: fixedSuffix,
    });
    expect(result.name).toBe("xmltag_a_very_long_context__abcd1234");
  });

  it("omits an empty context from the fallback", () => {
    expect(generateFallbackName({ prefix: "openapi_", context: "***", randomSuffix: fixedSuffix })).toBe(
      "openapi_abcd1234"
    );
  });

  it("regenerates fallbacks that are already taken", () => {
    const suffixes = ["dup00001", "dup00001", "fresh002"];
    const taken = new Set(["customfunc_dup00001"]);
    const name = generateFallbackName({
      prefix: "customfunc_",
      randomSuffix: () => suffixes.shift() ?? "unused00",
      isTaken: (candidate) => taken.has(candidate),
    });
    expect(name).toBe("customfunc_fresh002");
  });

  it("falls back to a counter when the suffix source keeps colliding", () => {
    const taken = new Set(["toolfunc_same0000", "toolfunc_same0000_2"]);
    const name = generateFallbackName({
      prefix: "toolfunc_",
      randomSuffix: () => "same0000",
      isTaken: (candidate) => taken.has(candidate),
    });
    expect(name).toBe("toolfunc_same0000_3");
  });

  it("always yields a provider-valid name", () => {
    fc.assert(
      fc.property(fc.string({ maxLength: 200 }), fc.string({ maxLength: 40 }), (raw, context) => {
        const { name } = sanitizeToolName(raw, { prefix: "toolfunc_", context });
        expect(name).toMatch(TOOL_NAME_PATTERN);
      })
    );
  });
});
