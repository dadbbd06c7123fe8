import type { Logger } from "pino";

export interface ArchiveQueueOptions {
  /** Maximum number of tasks running at once */
  concurrency: number;
  logger: Logger;
}

export type EnqueueResult = "queued" | "duplicate" | "closed";

export interface ArchiveQueue {
  /**
   * Schedule a task. A label already pending or running is not queued
   * twice. Never waits for the task and never sees its failure.
   */
  enqueue(label: string, task: () => Promise<unknown>): EnqueueResult;

  /** Tasks waiting for a free slot */
  readonly pending: number;

  /** Tasks currently running */
  readonly active: number;

  /** Resolves once nothing is pending or running */
  drain(): Promise<void>;

  /** Stop accepting work and drop everything not yet started */
  close(): number;
}

interface QueuedTask {
  label: string;
  task: () => Promise<unknown>;
}

/**
 * Bounded in-process worker pool for archival tasks. Each task is isolated:
 * a rejection is logged and the pool moves on.
 */
export function createArchiveQueue(options: ArchiveQueueOptions): ArchiveQueue {
  const { concurrency, logger } = options;
  const queued: QueuedTask[] = [];
  const labels = new Set<string>();
  let active = 0;
  let closed = false;
  let idleWaiters: Array<() => void> = [];

  function notifyIfIdle(): void {
    if (active === 0 && queued.length === 0 && idleWaiters.length > 0) {
      const waiters = idleWaiters;
      idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  async function run(job: QueuedTask): Promise<void> {
    try {
      await job.task();
    } catch (err) {
      logger.error({ task: job.label, err }, "Archive task failed");
    } finally {
      labels.delete(job.label);
      active--;
      pump();
      notifyIfIdle();
    }
  }

  function pump(): void {
    while (!closed && active < concurrency && queued.length > 0) {
      const job = queued.shift();
      if (!job) break;
      active++;
      void run(job);
    }
  }

  return {
    get pending() {
      return queued.length;
    },

    get active() {
      return active;
    },

    enqueue(label, task) {
      if (closed) {
        logger.warn({ task: label }, "Archive queue closed, dropping task");
        return "closed";
      }
      if (labels.has(label)) {
        logger.debug({ task: label }, "Archive task already queued");
        return "duplicate";
      }
      labels.add(label);
      queued.push({ label, task });
      pump();
      return "queued";
    },

    drain() {
      if (active === 0 && queued.length === 0) {
        return Promise.resolve();
      }
      return new Promise<void>((resolve) => {
        idleWaiters.push(resolve);
      });
    },

    close() {
      closed = true;
      const dropped = queued.length;
      for (const job of queued) labels.delete(job.label);
      queued.length = 0;
      if (dropped > 0) {
        logger.warn({ dropped }, "Archive queue closed with unstarted tasks");
      }
      notifyIfIdle();
      return dropped;
    },
  };
}
