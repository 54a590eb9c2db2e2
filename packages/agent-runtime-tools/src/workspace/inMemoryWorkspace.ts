import type { Workspace } from "@tasklane/agent-runtime-core";

/** Map-backed workspace used when no sandbox is attached. */
export class InMemoryWorkspace implements Workspace {
  private readonly files = new Map<string, string>();

  constructor(initial: Record<string, string> = {}) {
    for (const [path, content] of Object.entries(initial)) {
      this.files.set(path, content);
    }
  }

  async readFile(path: string): Promise<string | null> {
    return this.files.get(path) ?? null;
  }

  async writeFile(path: string, content: string): Promise<void> {
    this.files.set(path, content);
  }

  snapshot(): Record<string, string> {
    return Object.fromEntries(this.files);
  }
}
