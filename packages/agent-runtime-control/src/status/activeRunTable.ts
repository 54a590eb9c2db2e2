/**
 * Runs executing in this process, keyed by run id. Inserted when a run
 * starts and removed on its terminal transition; `sweep` clears entries left
 * behind by runs that died without one.
 */

export interface ActiveRunEntry {
  runId: string;
  instanceId: string;
  threadId: string;
  startedAt: number;
}

export class ActiveRunTable {
  private readonly entries = new Map<string, ActiveRunEntry>();

  insert(entry: ActiveRunEntry): void {
    this.entries.set(entry.runId, { ...entry });
  }

  remove(runId: string): boolean {
    return this.entries.delete(runId);
  }

  get(runId: string): ActiveRunEntry | undefined {
    const entry = this.entries.get(runId);
    return entry ? { ...entry } : undefined;
  }

  has(runId: string): boolean {
    return this.entries.has(runId);
  }

  list(): ActiveRunEntry[] {
    return Array.from(this.entries.values(), (entry) => ({ ...entry }));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Remove and return every entry matching the predicate. */
  sweep(predicate: (entry: ActiveRunEntry) => boolean): ActiveRunEntry[] {
    const removed: ActiveRunEntry[] = [];
    for (const [runId, entry] of this.entries) {
      if (predicate(entry)) {
        this.entries.delete(runId);
        removed.push({ ...entry });
      }
    }
    return removed;
  }
}
