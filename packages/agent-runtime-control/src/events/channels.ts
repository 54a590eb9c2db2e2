import type { ControlSignal, RunStatus } from "@tasklane/agent-runtime-core";

/** Notification token published after every append to a response list */
export const NEW_RESPONSE_TOKEN = "new";

export const runChannels = {
  instanceControl: (runId: string, instanceId: string) => `run:${runId}:control:${instanceId}`,
  globalControl: (runId: string) => `run:${runId}:control`,
  newResponse: (runId: string) => `run:${runId}:new_response`,
  responses: (runId: string) => `run:${runId}:responses`,
  activeRun: (instanceId: string, runId: string) => `active_run:${instanceId}:${runId}`,
} as const;

/** Control signal announcing a status transition; null for non-terminal statuses. */
export function signalForStatus(status: RunStatus): ControlSignal | null {
  switch (status) {
    case "COMPLETED":
      return "END_STREAM";
    case "FAILED":
      return "ERROR";
    case "STOPPED":
      return "STOP";
    default:
      return null;
  }
}
