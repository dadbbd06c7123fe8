import { mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { Logger } from "pino";
import type { DownHostLog } from "../failures/down-host-log.js";
import {
  AuthorizationError,
  TransportError,
  errorMessage,
  httpError,
} from "../errors/catalog.js";
import { extractZip } from "./extract.js";
import { writeFileAtomic } from "./files.js";
import { buildEntityDir, buildExportUrl, type ExportFormat } from "./paths.js";

export interface ExportDownloaderDeps {
  exportDir: string;
  /** e.g. "https://docs.google.com/spreadsheets/d" */
  baseUrl: string;
  downHostLog: DownHostLog;
  logger: Logger;
}

export interface ExportTarget {
  entity: string;
  documentId: string;
}

export type FormatOutcome =
  | { status: "downloaded"; url: string; path: string; sizeBytes: number }
  | { status: "failed"; url: string; error: string; unauthorized: boolean };

export interface ExportResult {
  entity: string;
  dir: string;
  xlsx: FormatOutcome;
  zip: FormatOutcome;
  /** Sanitized names of the ZIP members written this run */
  extracted: string[];
}

const FILE_NAMES: Record<ExportFormat, string> = {
  xlsx: "spreadsheet.xlsx",
  zip: "spreadsheet.zip",
};

async function fetchExport(url: string): Promise<Uint8Array> {
  let res: Response;
  try {
    res = await fetch(url);
  } catch (err) {
    throw new TransportError(url, undefined, { cause: err });
  }
  if (!res.ok) {
    await res.body?.cancel();
    throw httpError(url, res);
  }
  return new Uint8Array(await res.arrayBuffer());
}

/**
 * Download both export formats of one document into the entity's
 * directory. The two formats are attempted independently: a failure in
 * one is logged (and, for 401, appended to the down-host log) and the
 * other still runs. Never throws for transport or content failures.
 */
export async function downloadExports(
  deps: ExportDownloaderDeps,
  target: ExportTarget,
): Promise<ExportResult> {
  const { logger } = deps;
  const dir = buildEntityDir(deps.exportDir, target.entity);
  await mkdir(dir, { recursive: true });

  logger.info(
    { entity: target.entity, documentId: target.documentId, dir },
    "Starting export download",
  );

  const extracted: string[] = [];

  const attempt = async (
    format: ExportFormat,
    afterWrite?: (data: Uint8Array) => Promise<void>,
  ): Promise<FormatOutcome> => {
    const url = buildExportUrl(deps.baseUrl, target.documentId, format);
    const path = join(dir, FILE_NAMES[format]);
    try {
      logger.debug({ entity: target.entity, format, url }, "Requesting export");
      const data = await fetchExport(url);
      await writeFileAtomic(path, data);
      logger.info(
        { entity: target.entity, format, path, sizeBytes: data.byteLength },
        "Export downloaded",
      );
      if (afterWrite) {
        await afterWrite(data);
      }
      return { status: "downloaded", url, path, sizeBytes: data.byteLength };
    } catch (err) {
      const unauthorized = err instanceof AuthorizationError;
      logger.warn(
        { entity: target.entity, format, url, err },
        "Export download failed",
      );
      if (unauthorized) {
        await recordDownHost(deps, url);
      }
      return { status: "failed", url, error: errorMessage(err), unauthorized };
    }
  };

  const xlsx = await attempt("xlsx");
  const zip = await attempt("zip", async (data) => {
    const result = await extractZip(data, dir, logger);
    extracted.push(...result.extracted);
    logger.info(
      {
        entity: target.entity,
        extracted: result.extracted.length,
        failed: result.failures.length,
      },
      "ZIP extraction complete",
    );
  });

  return { entity: target.entity, dir, xlsx, zip, extracted };
}

async function recordDownHost(
  deps: ExportDownloaderDeps,
  url: string,
): Promise<void> {
  try {
    await deps.downHostLog.append(url);
  } catch (err) {
    deps.logger.error({ url, err }, "Failed to append to down-host log");
  }
}
