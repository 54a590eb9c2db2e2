import { describe, expect, it } from "vitest";
import {
  detectControlMarker,
  extractTodoUpdate,
  formatTodoMessage,
  todoLabel,
} from "../orchestrator/controlMarkers";

describe("detectControlMarker", () => {
  it("recognizes completion and hand-off tags", () => {
    expect(detectControlMarker("All done. <complete/>")).toBe("complete");
    expect(detectControlMarker("<ask>Which format?</ask>")).toBe("ask");
    expect(detectControlMarker("<web-browser-takeover>Enter the code</web-browser-takeover>")).toBe(
      "ask"
    );
  });

  it("prefers completion when both appear", () => {
    expect(detectControlMarker("<ask>Anything else?</ask> <complete></complete>")).toBe("complete");
  });

  it("ignores look-alike tags and plain text", () => {
    expect(detectControlMarker("<completed>not a marker</completed>")).toBeNull();
    expect(detectControlMarker("I will ask later")).toBeNull();
  });

  it("does not treat a tool name in prose as a marker", () => {
    expect(
      detectControlMarker("I can finish without web-browser-takeover; continuing.")
    ).toBeNull();
    expect(detectControlMarker("Done with the form.</web-browser-takeover>")).toBe("ask");
  });
});

describe("extractTodoUpdate", () => {
  it("takes the last block, trimmed", () => {
    const text = "<todo_update>\n- [ ] a\n</todo_update> then <todo_update> - [x] b </todo_update>";
    expect(extractTodoUpdate(text)).toBe("- [x] b");
  });

  it("returns null without a block", () => {
    expect(extractTodoUpdate("<todo_update>unterminated")).toBeNull();
  });
});

describe("formatTodoMessage", () => {
  it("labels the content with the file name", () => {
    expect(todoLabel("/workspace/todo.md")).toBe("todo.md");
    expect(formatTodoMessage("/workspace/todo.md", "- [ ] a")).toBe(
      "Current todo.md:\n```\n- [ ] a\n```"
    );
  });
});
