export { type ActiveRunEntry, ActiveRunTable } from "./activeRunTable";
export {
  RunStatusStore,
  type RunStatusStoreOptions,
  type RunStatusStoreStats,
  type StatusTransition,
} from "./runStatusStore";
