import { errorMessage } from "../../errors/catalog.js";
import { runCycle, type SyncCycleDeps } from "../cycle.js";
import type { CycleResult, SyncStatus, SyncError } from "../types.js";

export interface SyncManagerOptions {
  /** Pause between the end of one cycle and the start of the next */
  intervalMs: number;
  /** Reported in status; a disabled manager still runs triggered cycles */
  enabled?: boolean;
}

export interface SyncManager {
  /** Run a cycle now, then keep running one every interval */
  start(): void;

  /** Stop scheduling and wait for an in-flight cycle */
  stop(): Promise<void>;

  /** Run a cycle immediately, or join the one in flight */
  trigger(): Promise<CycleResult>;

  getStatus(): SyncStatus;

  readonly running: boolean;
}

const MAX_ERRORS = 10;

export function createSyncManager(
  deps: SyncCycleDeps,
  options: SyncManagerOptions,
): SyncManager {
  const { logger } = deps;
  const enabled = options.enabled ?? true;

  let timer: ReturnType<typeof setTimeout> | null = null;
  let isRunning = false;
  let lastSync: string | null = null;
  let lastResult: CycleResult | null = null;
  let errors: SyncError[] = [];
  let cycleInFlight: Promise<CycleResult> | null = null;

  function pushError(error: SyncError): void {
    errors.push(error);
    if (errors.length > MAX_ERRORS) {
      errors = errors.slice(-MAX_ERRORS);
    }
  }

  async function execute(): Promise<CycleResult> {
    const startedAt = new Date().toISOString();
    let result: CycleResult;
    try {
      result = await runCycle(deps);
    } catch (err) {
      result = {
        status: "aborted",
        startedAt,
        finishedAt: new Date().toISOString(),
        error: errorMessage(err),
      };
      logger.error({ err }, "Sync cycle crashed");
    }

    if (result.status === "aborted") {
      pushError({ entity: null, message: result.error, timestamp: result.finishedAt });
    } else {
      for (const error of result.errors) pushError(error);
    }
    lastResult = result;
    lastSync = result.finishedAt;
    return result;
  }

  async function runGuarded(): Promise<CycleResult> {
    // Cycles never overlap
    if (cycleInFlight) {
      return cycleInFlight;
    }

    cycleInFlight = execute();
    try {
      return await cycleInFlight;
    } finally {
      cycleInFlight = null;
    }
  }

  function clearTimer(): void {
    if (timer !== null) {
      clearTimeout(timer);
      timer = null;
    }
  }

  function schedule(): void {
    if (!isRunning || timer !== null) return;
    timer = setTimeout(() => {
      timer = null;
      runAndReschedule().catch((err: unknown) => {
        logger.error({ err }, "Scheduled sync cycle failed");
      });
    }, options.intervalMs);
  }

  async function runAndReschedule(): Promise<CycleResult> {
    clearTimer();
    try {
      return await runGuarded();
    } finally {
      schedule();
    }
  }

  return {
    get running() {
      return isRunning;
    },

    start() {
      if (isRunning) return; // Idempotent
      isRunning = true;
      logger.info({ intervalMs: options.intervalMs }, "Sync manager started");

      runAndReschedule().catch((err: unknown) => {
        logger.error({ err }, "Initial sync cycle failed");
      });
    },

    async stop() {
      isRunning = false;
      clearTimer();

      if (cycleInFlight) {
        await cycleInFlight;
      }
      logger.info("Sync manager stopped");
    },

    trigger() {
      return runAndReschedule();
    },

    getStatus(): SyncStatus {
      const queue = deps.archive?.queue;
      return {
        enabled,
        running: isRunning,
        lastSync,
        lastResult,
        archive: {
          enabled: queue !== undefined,
          active: queue?.active ?? 0,
          pending: queue?.pending ?? 0,
        },
        errors: [...errors],
      };
    },
  };
}
