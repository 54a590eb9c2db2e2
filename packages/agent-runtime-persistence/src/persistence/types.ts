import type {
  Message,
  MessageType,
  NewMessage,
  Run,
  RunStatus,
  Thread,
} from "@tasklane/agent-runtime-core";

export type RunPatch = {
  status?: RunStatus;
  errorMessage?: string;
  completedAt?: number;
};

export type MessageFilter = {
  types?: MessageType[];
  /** Only messages that are part of the model-visible conversation */
  llmOnly?: boolean;
};

/**
 * Storage collaborator for runs, threads and messages. The engine depends on
 * this shape only; the storage engine behind it is not its concern.
 */
export type RunStore = {
  insertThread: (thread: Thread) => Promise<void>;
  getThread: (threadId: string) => Promise<Thread | null>;
  insertRun: (run: Run) => Promise<void>;
  updateRun: (runId: string, patch: RunPatch) => Promise<void>;
  getRun: (runId: string) => Promise<Run | null>;
  /** Assigns id and creation time when the draft has none */
  insertMessage: (message: NewMessage) => Promise<Message>;
  getMessage: (messageId: string) => Promise<Message | null>;
  /** Messages of a thread in creation order */
  listMessages: (threadId: string, filter?: MessageFilter) => Promise<Message[]>;
  latestMessage: (threadId: string, type: MessageType) => Promise<Message | null>;
  /** Returns the number of deleted messages */
  deleteMessages: (threadId: string, type: MessageType) => Promise<number>;
};
