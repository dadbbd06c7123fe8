import type { Logger } from "pino";
import type { ArchiveQueue } from "../archive/queue.js";
import { archiveFile, type ArchiveThrottlerDeps } from "../archive/throttler.js";
import type { CatalogFetcher } from "../catalog/fetcher.js";
import type { CatalogStore } from "../catalog/store.js";
import { diffCatalog } from "../catalog/diff.js";
import { extractDocumentId } from "../catalog/url.js";
import type { Catalog } from "../catalog/types.js";
import { errorMessage } from "../errors/catalog.js";
import {
  downloadExports,
  type ExportDownloaderDeps,
} from "../exports/downloader.js";
import {
  listMaterializedFiles,
  type MaterializedFile,
} from "../exports/files.js";
import type { CycleResult, SyncError } from "./types.js";

export interface SyncCycleDeps {
  fetcher: CatalogFetcher;
  catalogStore: CatalogStore;
  downloader: ExportDownloaderDeps;
  /** Base of the URLs under which downloaded files are served publicly */
  publicBaseUrl: string;
  /** Omitted when archiving is disabled */
  archive?: {
    queue: ArchiveQueue;
    throttler: ArchiveThrottlerDeps;
  };
  logger: Logger;
}

/**
 * One sync pass: fetch the catalog, download exports for every new or
 * changed entity, queue their files for archiving, then persist the
 * fetched catalog. The saved catalog is left alone when the fetch fails.
 */
export async function runCycle(deps: SyncCycleDeps): Promise<CycleResult> {
  const { logger } = deps;
  const startedAt = new Date().toISOString();
  const errors: SyncError[] = [];

  const fail = (entity: string | null, message: string): void => {
    errors.push({ entity, message, timestamp: new Date().toISOString() });
  };

  let remote: Catalog;
  let cached: Catalog;
  try {
    remote = await deps.fetcher.fetch();
    cached = await deps.catalogStore.load();
  } catch (err) {
    logger.error({ err }, "Catalog unavailable, cycle aborted");
    return {
      status: "aborted",
      startedAt,
      finishedAt: new Date().toISOString(),
      error: errorMessage(err),
    };
  }

  const changed = diffCatalog(remote, cached);
  logger.info(
    { remote: remote.size, cached: cached.size, changed: changed.size },
    "Catalog compared",
  );

  const downloaded: string[] = [];
  const files: MaterializedFile[] = [];

  for (const [entity, url] of changed) {
    const documentId = extractDocumentId(url);
    if (!documentId) {
      logger.warn({ entity, url }, "No document id in catalog URL, skipping");
      fail(entity, `No document id in ${url}`);
      continue;
    }

    try {
      const result = await downloadExports(deps.downloader, { entity, documentId });
      for (const outcome of [result.xlsx, result.zip]) {
        if (outcome.status === "failed") {
          fail(entity, outcome.error);
        }
      }
      if (result.xlsx.status === "downloaded" || result.zip.status === "downloaded") {
        downloaded.push(entity);
      }

      files.push(
        ...(await listMaterializedFiles(
          { exportDir: deps.downloader.exportDir, publicBaseUrl: deps.publicBaseUrl },
          entity,
        )),
      );
    } catch (err) {
      logger.error({ entity, err }, "Entity sync failed");
      fail(entity, errorMessage(err));
    }
  }

  let queued = 0;
  if (deps.archive) {
    const { queue, throttler } = deps.archive;
    for (const file of files) {
      if (queue.enqueue(file.path, () => archiveFile(throttler, file)) === "queued") {
        queued++;
      }
    }
    logger.info({ files: files.length, queued }, "Files queued for archiving");
  }

  try {
    await deps.catalogStore.save(remote);
  } catch (err) {
    logger.error({ err }, "Failed to save catalog");
    fail(null, `Failed to save catalog: ${errorMessage(err)}`);
  }

  const finishedAt = new Date().toISOString();
  logger.info(
    { changed: changed.size, downloaded: downloaded.length, queued, errors: errors.length },
    "Sync cycle complete",
  );

  return {
    status: "completed",
    startedAt,
    finishedAt,
    changed: [...changed.keys()],
    downloaded,
    queued,
    errors,
  };
}
