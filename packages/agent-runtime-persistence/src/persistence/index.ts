export { InMemoryRunStore, type InMemoryRunStoreOptions } from "./inMemoryStore";
export type { MessageFilter, RunPatch, RunStore } from "./types";
