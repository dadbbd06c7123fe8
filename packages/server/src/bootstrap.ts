import { mkdir } from "node:fs/promises";
import { createRequire } from "node:module";
import type { TrackerConfig } from "@export-tracker/core/schemas";
import {
  resolveTrackerPaths,
  type TrackerPaths,
} from "@export-tracker/core/config";
import { createLogger, type Logger } from "@export-tracker/core/logger";
import {
  createArchiveQueue,
  createArchiveStore,
  createWaybackClient,
  initializeArchiveDatabase,
  type ArchiveQueue,
  type ArchiveStore,
} from "@export-tracker/core/archive";
import {
  createCatalogFetcher,
  createCatalogStore,
} from "@export-tracker/core/catalog";
import { createDownHostLog } from "@export-tracker/core/failures";
import {
  createSyncManager,
  type SyncCycleDeps,
  type SyncManager,
} from "@export-tracker/core/sync";
import type { Hono } from "hono";
import { createApp } from "./app.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

export interface ServerContext {
  app: Hono;
  logger: Logger;
  config: TrackerConfig;
  paths: TrackerPaths;
  startedAt: Date;
  syncManager: SyncManager;
  archiveQueue: ArchiveQueue | null;
  startBackgroundServices: () => void;
  cleanup: () => Promise<void>;
}

export interface CreateServerOptions {
  rootPath?: string;
}

export async function createServer(
  config: TrackerConfig,
  options?: CreateServerOptions,
): Promise<ServerContext> {
  const logger = createLogger(config.logging);
  const startedAt = new Date();
  const paths = resolveTrackerPaths(options?.rootPath);

  await mkdir(paths.exportDir, { recursive: true });

  const downHostLog = createDownHostLog(paths.downHostLogPath);

  let archiveStore: ArchiveStore | null = null;
  let archiveQueue: ArchiveQueue | null = null;
  let archive: SyncCycleDeps["archive"];
  if (config.archive.enabled) {
    archiveStore = createArchiveStore(
      initializeArchiveDatabase(paths.archiveDbPath),
    );
    archiveQueue = createArchiveQueue({
      concurrency: config.archive.concurrency,
      logger: logger.child({ component: "archive-queue" }),
    });
    archive = {
      queue: archiveQueue,
      throttler: {
        store: archiveStore,
        client: createWaybackClient({
          saveEndpoint: config.archive.saveEndpoint,
          userAgent: config.archive.userAgent,
        }),
        delay: {
          minMinutes: config.archive.minDelayMinutes,
          maxMinutes: config.archive.maxDelayMinutes,
        },
        logger: logger.child({ component: "archive" }),
      },
    };
  } else {
    logger.info("Archiving disabled");
  }

  const syncManager = createSyncManager(
    {
      fetcher: createCatalogFetcher({
        url: config.catalog.url,
        columns: config.catalog.columns,
        logger: logger.child({ component: "catalog" }),
      }),
      catalogStore: createCatalogStore(paths.catalogPath),
      downloader: {
        exportDir: paths.exportDir,
        baseUrl: config.exports.baseUrl,
        downHostLog,
        logger: logger.child({ component: "exports" }),
      },
      publicBaseUrl: config.exports.publicBaseUrl,
      archive,
      logger: logger.child({ component: "sync" }),
    },
    {
      intervalMs: config.sync.intervalMinutes * 60_000,
      enabled: config.sync.enabled,
    },
  );

  const app = createApp({
    logger,
    version: pkg.version,
    startedAt,
    exportDir: paths.exportDir,
    downHostLog,
    syncManager,
  });

  const startBackgroundServices = () => {
    if (config.sync.enabled) {
      syncManager.start();
    } else {
      logger.info("Scheduled sync disabled; use POST /v1/sync/trigger");
    }
  };

  const cleanup = async () => {
    await syncManager.stop();
    if (archiveQueue) {
      // Tasks sleeping out their delay are abandoned with the process
      const dropped = archiveQueue.close();
      logger.info(
        { dropped, active: archiveQueue.active },
        "Archive queue closed",
      );
    }
    archiveStore?.close();
  };

  return {
    app,
    logger,
    config,
    paths,
    startedAt,
    syncManager,
    archiveQueue,
    startBackgroundServices,
    cleanup,
  };
}
