/**
 * Ephemeral Context
 *
 * Builds the per-iteration user-role message carrying the latest browser
 * state and image context. Nothing here is persisted. Image context is
 * deleted by `consumeImageContext` once the model call that carried it has
 * been made, so it is attached only once.
 */

import { type ContentPart, type Message, messageText } from "@tasklane/agent-runtime-core";
import type { RunStore } from "@tasklane/agent-runtime-persistence";
import type { RuntimeLogger } from "@tasklane/agent-runtime-telemetry/logging";
import { z } from "zod";
import type { EphemeralContext } from "../llm/modelProvider";

const BINARY_FIELDS = new Set(["screenshot_base64", "screenshot_url", "image_url"]);

const browserStateSchema = z.record(z.unknown());

const imageContextSchema = z.object({
  file_path: z.string(),
  mime_type: z.string(),
  base64: z.string(),
});

function parseJson(message: Message, logger: RuntimeLogger): unknown {
  try {
    return JSON.parse(messageText(message.content));
  } catch (error) {
    logger.warn("Ignoring unreadable context message", {
      messageId: message.id,
      type: message.type,
      reason: error instanceof Error ? error.message : String(error),
    });
    return undefined;
  }
}

function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

/** Browser state as text plus at most one image reference. */
export function browserStateParts(state: Record<string, unknown>): ContentPart[] {
  const visible: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(state)) {
    if (!BINARY_FIELDS.has(key)) {
      visible[key] = value;
    }
  }

  const parts: ContentPart[] = [
    { type: "text", text: `Current browser state:\n${JSON.stringify(visible, null, 2)}` },
  ];

  const screenshotUrl = stringField(state, "screenshot_url");
  const imageUrl = stringField(state, "image_url");
  const screenshotBase64 = stringField(state, "screenshot_base64");
  const url =
    screenshotUrl ??
    imageUrl ??
    (screenshotBase64 ? `data:image/jpeg;base64,${screenshotBase64}` : undefined);
  if (url) {
    parts.push({ type: "image_url", imageUrl: { url } });
  }
  return parts;
}

export function imageContextParts(image: z.infer<typeof imageContextSchema>): ContentPart[] {
  return [
    { type: "text", text: `Image context for '${image.file_path}':` },
    { type: "image_url", imageUrl: { url: `data:${image.mime_type};base64,${image.base64}` } },
  ];
}

/**
 * Collect the latest browser state and image context of a thread. Returns
 * null when neither contributes anything.
 */
export async function buildEphemeralContext(
  store: RunStore,
  threadId: string,
  logger: RuntimeLogger
): Promise<EphemeralContext | null> {
  const parts: ContentPart[] = [];

  const browserState = await store.latestMessage(threadId, "browser_state");
  if (browserState) {
    const parsed = browserStateSchema.safeParse(parseJson(browserState, logger));
    if (parsed.success) {
      parts.push(...browserStateParts(parsed.data));
    }
  }

  const imageContext = await store.latestMessage(threadId, "image_context");
  if (imageContext) {
    const parsed = imageContextSchema.safeParse(parseJson(imageContext, logger));
    if (parsed.success) {
      parts.push(...imageContextParts(parsed.data));
    } else {
      logger.warn("Ignoring malformed image context", { messageId: imageContext.id });
    }
  }

  return parts.length > 0 ? { role: "user", content: parts } : null;
}

/** Delete the thread's image context after it has reached the model. */
export async function consumeImageContext(
  store: RunStore,
  threadId: string,
  logger: RuntimeLogger
): Promise<number> {
  const deleted = await store.deleteMessages(threadId, "image_context");
  if (deleted > 0) {
    logger.debug("Consumed image context", { threadId, deleted });
  }
  return deleted;
}
