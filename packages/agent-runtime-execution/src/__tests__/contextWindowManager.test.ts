import type { Message, MessageType, NewMessage } from "@tasklane/agent-runtime-core";
import { InMemoryRunStore } from "@tasklane/agent-runtime-persistence";
import { createCaptureLogger } from "@tasklane/agent-runtime-telemetry/logging";
import { beforeEach, describe, expect, it } from "vitest";
import {
  ContextWindowManager,
  estimateTokens,
  summaryMessageId,
  truncateContent,
} from "../context/contextWindowManager";

function message(id: string, type: MessageType, content: Message["content"], createdAt: number): Message {
  return { id, threadId: "thread-1", type, content, isLlmMessage: true, metadata: {}, createdAt };
}

describe("estimateTokens", () => {
  it("counts a quarter token per character with a floor of one", () => {
    expect(estimateTokens("")).toBe(0);
    expect(estimateTokens("abc")).toBe(1);
    expect(estimateTokens("abcdefgh")).toBe(2);
    expect(estimateTokens("abcdef", 2)).toBe(3);
  });
});

describe("truncateContent", () => {
  it("leaves short content alone", () => {
    expect(truncateContent("hello world", 20)).toBe("hello world");
  });

  it("backs up to the last space when the cut falls inside a word", () => {
    expect(truncateContent("hello world", 8)).toBe("hello...");
  });

  it("keeps a cut that lands on a word boundary", () => {
    expect(truncateContent("hello world", 5)).toBe("hello...");
  });

  it("cuts mid-word when there is no space to back up to", () => {
    expect(truncateContent("abcdefgh", 3)).toBe("abc...");
  });
});

describe("ContextWindowManager", () => {
  let store: InMemoryRunStore;
  let capture: ReturnType<typeof createCaptureLogger>;
  let manager: ContextWindowManager;

  const m1 = message("m1", "user", "alpha beta gamma delta", 1);
  const m2 = message("m2", "tool_result", `output${"!".repeat(158)}`, 2);
  const m3 = message("m3", "assistant", "x".repeat(120), 3);
  const m4 = message("m4", "user", "y".repeat(120), 4);

  beforeEach(() => {
    store = new InMemoryRunStore();
    capture = createCaptureLogger();
    manager = new ContextWindowManager({
      store,
      logger: capture.logger,
      maxContextTokens: 100,
      charsPerToken: 4,
      summaryLineChars: 10,
      toolSummaryLineChars: 5,
    });
  });

  it("returns the history untouched when it fits", async () => {
    const history = [m1, m3];
    const result = await manager.applyContextWindowManagement("thread-1", history);
    expect(result.messages).toBe(history);
    expect(result.summary).toBeNull();
    expect(await store.listMessages("thread-1")).toEqual([]);
  });

  it("forwards a ten-message history that fits as-is", async () => {
    const history = Array.from({ length: 10 }, (_, index) =>
      message(`h${index}`, index % 2 === 0 ? "user" : "assistant", `turn ${index}`, index)
    );
    const result = await manager.applyContextWindowManagement("thread-1", history);
    expect(result.messages).toEqual(history);
    expect(result.summary).toBeNull();
  });

  it("counts image references alongside text", () => {
    const multimodal = message(
      "m5",
      "user",
      [
        { type: "text", text: "abcd" },
        { type: "image_url", imageUrl: { url: "data:xx" } },
      ],
      5
    );
    expect(manager.messageTokens(multimodal)).toBe(2);
  });

  it("folds older messages into a stored summary", async () => {
    const result = await manager.applyContextWindowManagement("thread-1", [m1, m2, m3, m4]);

    const expected: Message = {
      id: summaryMessageId("thread-1", [m1, m2]),
      threadId: "thread-1",
      type: "summary",
      content:
        "CONVERSATION SUMMARY:\n" +
        "This is a summary of 2 earlier messages in this conversation.\n\n" +
        "User: alpha beta...\n" +
        "Tool Result: outpu...\n" +
        "\n--- END SUMMARY ---\n",
      isLlmMessage: false,
      metadata: { tokenCount: 37, compactedCount: 2, compactedFrom: "m1", compactedTo: "m2" },
      createdAt: 1,
    };
    expect(result.summary).toEqual(expected);
    expect(result.messages).toEqual([expected, m3, m4]);
    expect(await store.getMessage(expected.id)).toEqual(expected);
    expect(capture.warnings()).toEqual([]);
  });

  it("stores one summary per compacted range", async () => {
    await manager.applyContextWindowManagement("thread-1", [m1, m2, m3, m4]);
    const again = await manager.applyContextWindowManagement("thread-1", [m1, m2, m3, m4]);

    expect(again.summary?.id).toBe(summaryMessageId("thread-1", [m1, m2]));
    expect(await store.listMessages("thread-1", { types: ["summary"] })).toHaveLength(1);
    expect(capture.records().map((record) => record.msg)).toContain("Summary already stored");
  });

  it("skips non-conversational messages in summary lines", async () => {
    const status = { ...message("s1", "status", '{"status_type":"finish"}', 1), isLlmMessage: false };
    const result = await manager.applyContextWindowManagement("thread-1", [status, m1, m2, m3, m4]);
    expect(result.summary?.content).toBe(
      "CONVERSATION SUMMARY:\n" +
        "This is a summary of 3 earlier messages in this conversation.\n\n" +
        "User: alpha beta...\n" +
        "Tool Result: outpu...\n" +
        "\n--- END SUMMARY ---\n"
    );
  });

  it("truncates a summary to the chars that remain in the budget", async () => {
    const tight = new ContextWindowManager({
      store,
      logger: capture.logger,
      maxContextTokens: 12,
      charsPerToken: 4,
    });
    const big = message("b1", "user", "a".repeat(40), 1);
    const small = message("b2", "assistant", "b".repeat(40), 2);

    const result = await tight.applyContextWindowManagement("thread-1", [big, small]);

    expect(result.messages.map((entry) => entry.id)).toEqual([result.summary?.id, "b2"]);
    expect(result.summary?.content).toBe("CONVE...");
    expect(result.summary?.metadata.tokenCount).toBe(2);
    const [warning] = capture.warnings();
    expect(warning).toMatchObject({
      msg: "Summary exceeds remaining context budget; truncating",
      threadId: "thread-1",
      compactedCount: 1,
      summaryTokens: 38,
      budgetChars: 8,
    });
  });

  it("drops the summary when no budget remains for it", async () => {
    const tight = new ContextWindowManager({
      store,
      logger: capture.logger,
      maxContextTokens: 10,
      charsPerToken: 4,
    });
    const big = message("b1", "user", "a".repeat(40), 1);
    const small = message("b2", "assistant", "b".repeat(40), 2);

    const result = await tight.applyContextWindowManagement("thread-1", [big, small]);

    expect(result).toEqual({ messages: [small], summary: null });
    expect(await store.listMessages("thread-1", { types: ["summary"] })).toEqual([]);
    const [warning] = capture.warnings();
    expect(warning).toMatchObject({
      msg: "Summary does not fit the remaining context budget; dropping",
      summaryTokens: 38,
      budgetChars: 0,
    });
  });

  it("logs and continues when the summary cannot be stored", async () => {
    class FailingStore extends InMemoryRunStore {
      async insertMessage(_draft: NewMessage): Promise<Message> {
        throw new Error("disk full");
      }
    }
    const failing = new ContextWindowManager({
      store: new FailingStore(),
      logger: capture.logger,
      maxContextTokens: 100,
      summaryLineChars: 10,
      toolSummaryLineChars: 5,
    });

    const result = await failing.applyContextWindowManagement("thread-1", [m1, m2, m3, m4]);

    expect(result.messages).toHaveLength(3);
    const [error] = capture.warnings();
    expect(error.msg).toBe("Failed to store summary");
    expect(error.level).toBe(50);
  });
});
