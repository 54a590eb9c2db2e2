// ============================================================================
// Control markers in assistant output
// ============================================================================

export type ControlMarker = "complete" | "ask";

const COMPLETE_PATTERN = /<\/?complete\b/;
const ASK_PATTERN = /<\/?(?:ask|web-browser-takeover)\b/;
const TODO_UPDATE_PATTERN = /<todo_update>([\s\S]*?)<\/todo_update>/g;

/** Completion wins when both markers appear. */
export function detectControlMarker(text: string): ControlMarker | null {
  if (COMPLETE_PATTERN.test(text)) {
    return "complete";
  }
  if (ASK_PATTERN.test(text)) {
    return "ask";
  }
  return null;
}

/** Trimmed content of the last todo update block, if any. */
export function extractTodoUpdate(text: string): string | null {
  let last: string | null = null;
  for (const match of text.matchAll(TODO_UPDATE_PATTERN)) {
    last = match[1].trim();
  }
  return last;
}

/** File name shown in the todo header */
export function todoLabel(path: string): string {
  const segments = path.split("/").filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? path;
}

export function formatTodoMessage(path: string, content: string): string {
  return `Current ${todoLabel(path)}:\n\`\`\`\n${content}\n\`\`\``;
}
