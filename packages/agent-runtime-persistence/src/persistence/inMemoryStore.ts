import type { Message, MessageType, NewMessage, Run, Thread } from "@tasklane/agent-runtime-core";
import type { MessageFilter, RunPatch, RunStore } from "./types";

export interface InMemoryRunStoreOptions {
  now?: () => number;
}

type StoredMessage = { message: Message; sequence: number };

export class InMemoryRunStore implements RunStore {
  private readonly threads = new Map<string, Thread>();
  private readonly runs = new Map<string, Run>();
  private readonly messages = new Map<string, StoredMessage>();
  private readonly now: () => number;
  private sequence = 0;

  constructor(options: InMemoryRunStoreOptions = {}) {
    this.now = options.now ?? Date.now;
  }

  async insertThread(thread: Thread): Promise<void> {
    this.threads.set(thread.id, { ...thread });
  }

  async getThread(threadId: string): Promise<Thread | null> {
    const thread = this.threads.get(threadId);
    return thread ? { ...thread } : null;
  }

  async insertRun(run: Run): Promise<void> {
    if (this.runs.has(run.id)) {
      throw new Error(`Run "${run.id}" already exists`);
    }
    this.runs.set(run.id, { ...run });
  }

  async updateRun(runId: string, patch: RunPatch): Promise<void> {
    const existing = this.runs.get(runId);
    if (!existing) {
      throw new Error(`Run "${runId}" not found`);
    }
    this.runs.set(runId, { ...existing, ...patch });
  }

  async getRun(runId: string): Promise<Run | null> {
    const run = this.runs.get(runId);
    return run ? { ...run } : null;
  }

  async insertMessage(draft: NewMessage): Promise<Message> {
    this.sequence++;
    const id = draft.id ?? this.generateMessageId();
    if (this.messages.has(id)) {
      throw new Error(`Message "${id}" already exists`);
    }
    const message: Message = {
      id,
      threadId: draft.threadId,
      type: draft.type,
      content: draft.content,
      isLlmMessage: draft.isLlmMessage,
      metadata: { ...(draft.metadata ?? {}) },
      createdAt: draft.createdAt ?? this.now(),
    };
    this.messages.set(id, { message, sequence: this.sequence });
    return copyMessage(message);
  }

  async getMessage(messageId: string): Promise<Message | null> {
    const stored = this.messages.get(messageId);
    return stored ? copyMessage(stored.message) : null;
  }

  async listMessages(threadId: string, filter: MessageFilter = {}): Promise<Message[]> {
    const types = filter.types ? new Set(filter.types) : null;
    return this.ordered(threadId)
      .filter((message) => !types || types.has(message.type))
      .filter((message) => !filter.llmOnly || message.isLlmMessage)
      .map(copyMessage);
  }

  async latestMessage(threadId: string, type: MessageType): Promise<Message | null> {
    const matches = this.ordered(threadId).filter((message) => message.type === type);
    const latest = matches[matches.length - 1];
    return latest ? copyMessage(latest) : null;
  }

  async deleteMessages(threadId: string, type: MessageType): Promise<number> {
    let deleted = 0;
    for (const [id, stored] of this.messages) {
      if (stored.message.threadId === threadId && stored.message.type === type) {
        this.messages.delete(id);
        deleted++;
      }
    }
    return deleted;
  }

  private ordered(threadId: string): Message[] {
    return Array.from(this.messages.values())
      .filter((stored) => stored.message.threadId === threadId)
      .sort((a, b) => a.message.createdAt - b.message.createdAt || a.sequence - b.sequence)
      .map((stored) => stored.message);
  }

  private generateMessageId(): string {
    return `msg-${this.now().toString(36)}-${this.sequence}`;
  }
}

function copyMessage(message: Message): Message {
  return {
    ...message,
    content: typeof message.content === "string" ? message.content : [...message.content],
    metadata: { ...message.metadata },
  };
}
