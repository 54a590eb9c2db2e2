import { readFile } from "node:fs/promises";

export const DEFAULT_SYSTEM_PROMPT_URL = new URL("./system.md", import.meta.url);

/** Read a system prompt resource, the bundled one by default. */
export async function loadSystemPrompt(source: string | URL = DEFAULT_SYSTEM_PROMPT_URL): Promise<string> {
  const text = await readFile(source, "utf8");
  return text.trim();
}
