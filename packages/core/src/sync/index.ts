export type { CycleResult, SyncStatus, SyncError } from "./types.js";
export { runCycle, type SyncCycleDeps } from "./cycle.js";
export {
  createSyncManager,
  type SyncManager,
  type SyncManagerOptions,
} from "./engine/sync-manager.js";
