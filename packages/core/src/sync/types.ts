/** Outcome of one pass over the catalog */
export type CycleResult =
  | {
      status: "aborted";
      startedAt: string; // ISO 8601
      finishedAt: string;
      error: string;
    }
  | {
      status: "completed";
      startedAt: string;
      finishedAt: string;
      /** Entities whose URL was new or changed this cycle */
      changed: string[];
      /** Entities with at least one export format written */
      downloaded: string[];
      /** Files handed to the archive queue */
      queued: number;
      errors: SyncError[];
    };

/** Sync engine status for GET /v1/sync/status */
export interface SyncStatus {
  enabled: boolean;
  running: boolean;
  lastSync: string | null; // ISO 8601
  lastResult: CycleResult | null;
  archive: {
    enabled: boolean;
    active: number;
    pending: number;
  };
  errors: SyncError[];
}

export interface SyncError {
  entity: string | null;
  message: string;
  timestamp: string;
}
