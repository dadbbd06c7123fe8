export { toCalendarDate, parseCalendarDate } from "./dates.js";
export { sha256OfFile } from "./hash.js";
export { initializeArchiveDatabase } from "./schema.js";
export {
  createArchiveStore,
  type ArchiveStore,
  type ArchiveRecord,
} from "./store.js";
export {
  createWaybackClient,
  type ArchiveClient,
  type WaybackClientOptions,
} from "./wayback.js";
export {
  ArchiveStateMachine,
  type ArchiveState,
  type ArchiveTransitionEvent,
  type ArchiveTransitionListener,
} from "./state-machine.js";
export {
  archiveFile,
  isArchiveDue,
  pickDelayMinutes,
  type ArchiveThrottlerDeps,
  type ArchiveDelayWindow,
  type ArchiveFileTarget,
  type ArchiveOutcome,
} from "./throttler.js";
export {
  createArchiveQueue,
  type ArchiveQueue,
  type ArchiveQueueOptions,
  type EnqueueResult,
} from "./queue.js";
