/**
 * Context Window Manager
 *
 * Keeps the history handed to the model under a token cap. The newest
 * messages are kept verbatim; everything older is folded into one summary
 * message that is stored once per compacted range.
 */

import { createHash } from "node:crypto";
import {
  type Message,
  type MessageContent,
  messageText,
  PersistenceFailure,
} from "@tasklane/agent-runtime-core";
import type { RunStore } from "@tasklane/agent-runtime-persistence";
import { createSubsystemLogger, type RuntimeLogger } from "@tasklane/agent-runtime-telemetry/logging";

export const SUMMARY_END_MARKER = "\n--- END SUMMARY ---\n";
const ELLIPSIS = "...";

export interface ContextWindowOptions {
  store: RunStore;
  logger?: RuntimeLogger;
  maxContextTokens?: number;
  charsPerToken?: number;
  summaryLineChars?: number;
  toolSummaryLineChars?: number;
}

export interface ContextWindowResult {
  messages: Message[];
  summary: Message | null;
}

// ============================================================================
// Estimation and truncation
// ============================================================================

export function estimateTokens(text: string, charsPerToken = 4): number {
  if (text.length === 0) {
    return 0;
  }
  return Math.max(1, Math.floor(text.length / charsPerToken));
}

function countedText(content: MessageContent): string {
  if (typeof content === "string") {
    return content;
  }
  return content.map((part) => (part.type === "text" ? part.text : part.imageUrl.url)).join("");
}

/**
 * Cut to `maxLength` characters and append "...". A cut inside a word backs
 * up to the last space of the kept text.
 */
export function truncateContent(content: string, maxLength: number): string {
  if (content.length <= maxLength) {
    return content;
  }
  let truncated = content.slice(0, maxLength);
  if (!/\s/.test(content.charAt(maxLength))) {
    const lastSpace = truncated.lastIndexOf(" ");
    if (lastSpace !== -1) {
      truncated = truncated.slice(0, lastSpace);
    }
  }
  return `${truncated}${ELLIPSIS}`;
}

/** Stable id of the summary covering one compacted range of a thread */
export function summaryMessageId(threadId: string, compacted: readonly Message[]): string {
  const first = compacted[0]?.id ?? "";
  const last = compacted[compacted.length - 1]?.id ?? "";
  const digest = createHash("sha256")
    .update(`${threadId}\u0000${first}\u0000${last}\u0000${compacted.length}`)
    .digest("hex")
    .slice(0, 16);
  return `summary-${digest}`;
}

// ============================================================================
// ContextWindowManager
// ============================================================================

export class ContextWindowManager {
  private readonly store: RunStore;
  private readonly logger: RuntimeLogger;
  private readonly maxContextTokens: number;
  private readonly charsPerToken: number;
  private readonly summaryLineChars: number;
  private readonly toolSummaryLineChars: number;

  constructor(options: ContextWindowOptions) {
    this.store = options.store;
    this.logger = options.logger ?? createSubsystemLogger("context-window");
    this.maxContextTokens = options.maxContextTokens ?? 8000;
    this.charsPerToken = options.charsPerToken ?? 4;
    this.summaryLineChars = options.summaryLineChars ?? 100;
    this.toolSummaryLineChars = options.toolSummaryLineChars ?? 50;
  }

  messageTokens(message: Message): number {
    return estimateTokens(countedText(message.content), this.charsPerToken);
  }

  /**
   * Fit a chronologically ordered history into the token cap. Returns the
   * history untouched when it already fits, otherwise `[summary, ...recent]`.
   */
  async applyContextWindowManagement(
    threadId: string,
    history: Message[]
  ): Promise<ContextWindowResult> {
    let currentTokens = 0;
    let splitIndex = history.length;
    for (let index = history.length - 1; index >= 0; index--) {
      const tokens = this.messageTokens(history[index]);
      if (currentTokens + tokens > this.maxContextTokens) {
        break;
      }
      currentTokens += tokens;
      splitIndex = index;
    }

    if (splitIndex === 0) {
      this.logger.debug("History fits context window", {
        threadId,
        messages: history.length,
        tokens: currentTokens,
      });
      return { messages: history, summary: null };
    }

    const compacted = history.slice(0, splitIndex);
    const recent = history.slice(splitIndex);
    const summary = this.buildSummary(threadId, compacted, currentTokens);
    if (summary === null) {
      return { messages: recent, summary: null };
    }
    await this.persistSummary(summary);

    this.logger.info("Summarized older messages", {
      threadId,
      compactedCount: compacted.length,
      summaryId: summary.id,
    });
    return { messages: [summary, ...recent], summary };
  }

  /** Null when not even a truncated summary fits beside the recent messages. */
  private buildSummary(
    threadId: string,
    compacted: Message[],
    recentTokens: number
  ): Message | null {
    let text = "CONVERSATION SUMMARY:\n";
    text += `This is a summary of ${compacted.length} earlier messages in this conversation.\n\n`;
    for (const message of compacted) {
      const line = this.summaryLine(message);
      if (line !== null) {
        text += `${line}\n`;
      }
    }
    text += SUMMARY_END_MARKER;

    const summaryTokens = estimateTokens(text, this.charsPerToken);
    if (recentTokens + summaryTokens > this.maxContextTokens) {
      const budgetChars = Math.max(0, this.maxContextTokens - recentTokens) * this.charsPerToken;
      const fields = { threadId, compactedCount: compacted.length, summaryTokens, budgetChars };
      if (budgetChars <= ELLIPSIS.length) {
        this.logger.warn("Summary does not fit the remaining context budget; dropping", fields);
        return null;
      }
      this.logger.warn("Summary exceeds remaining context budget; truncating", fields);
      text = truncateContent(text, budgetChars - ELLIPSIS.length);
    }

    return {
      id: summaryMessageId(threadId, compacted),
      threadId,
      type: "summary",
      content: text,
      isLlmMessage: false,
      metadata: {
        tokenCount: estimateTokens(text, this.charsPerToken),
        compactedCount: compacted.length,
        compactedFrom: compacted[0].id,
        compactedTo: compacted[compacted.length - 1].id,
      },
      createdAt: compacted[0].createdAt,
    };
  }

  private summaryLine(message: Message): string | null {
    const text = messageText(message.content);
    if (message.type === "user") {
      return `User: ${truncateContent(text, this.summaryLineChars)}`;
    }
    if (message.type === "tool_result") {
      return `Tool Result: ${truncateContent(text, this.toolSummaryLineChars)}`;
    }
    if (message.type === "assistant" || message.isLlmMessage) {
      return `Assistant: ${truncateContent(text, this.summaryLineChars)}`;
    }
    return null;
  }

  private async persistSummary(summary: Message): Promise<void> {
    try {
      if (await this.store.getMessage(summary.id)) {
        this.logger.debug("Summary already stored", { summaryId: summary.id });
        return;
      }
      await this.store.insertMessage(summary);
    } catch (error) {
      this.logger.error("Failed to store summary", new PersistenceFailure("insertMessage", error));
    }
  }
}
