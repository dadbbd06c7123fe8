import type { Logger } from "pino";
import { errorMessage } from "../errors/catalog.js";
import type { MaterializedFile } from "../exports/files.js";
import type { ArchiveClient } from "./wayback.js";
import type { ArchiveRecord, ArchiveStore } from "./store.js";
import { ArchiveStateMachine, type ArchiveState } from "./state-machine.js";
import { parseCalendarDate, toCalendarDate } from "./dates.js";
import { sha256OfFile } from "./hash.js";

export interface ArchiveDelayWindow {
  minMinutes: number;
  maxMinutes: number;
}

export interface ArchiveThrottlerDeps {
  store: ArchiveStore;
  client: ArchiveClient;
  delay: ArchiveDelayWindow;
  logger: Logger;
  now?: () => Date;
  /** Uniform in [0, 1) */
  random?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

export type ArchiveFileTarget = Pick<MaterializedFile, "path" | "publicUrl">;

export interface ArchiveOutcome {
  path: string;
  publicUrl: string;
  state: Extract<ArchiveState, "skipped" | "recorded" | "failed">;
  archiveUrl?: string;
  sha256?: string;
  delayMinutes?: number;
  error?: string;
}

function defaultSleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Whole minutes, uniform over [minMinutes, maxMinutes] */
export function pickDelayMinutes(
  window: ArchiveDelayWindow,
  random: () => number = Math.random,
): number {
  const span = window.maxMinutes - window.minMinutes + 1;
  return window.minMinutes + Math.floor(random() * span);
}

/**
 * True unless `lastArchive` is a valid date on or after today. Missing or
 * unparseable dates count as never archived.
 */
export function isArchiveDue(
  lastArchive: string | undefined,
  today: string,
): boolean {
  const last = parseCalendarDate(lastArchive);
  if (!last) return true;
  // "YYYY-MM-DD" strings order the same as the dates they name
  return today > last;
}

/**
 * Run one file through the archival state machine:
 *   eligible → skipped
 *   eligible → waiting → submitting → recorded | failed
 *
 * Gating is by calendar date only; the content hash is recorded for
 * bookkeeping but never consulted. Never throws.
 */
export async function archiveFile(
  deps: ArchiveThrottlerDeps,
  file: ArchiveFileTarget,
): Promise<ArchiveOutcome> {
  const now = deps.now ?? (() => new Date());
  const sleep = deps.sleep ?? defaultSleep;
  const logger = deps.logger.child({ path: file.path });

  const machine = new ArchiveStateMachine(file.path);
  machine.onTransition((event) => {
    logger.debug(
      { from: event.from, to: event.to, reason: event.reason },
      "Archive state transition",
    );
  });

  const base = { path: file.path, publicUrl: file.publicUrl };

  let record: ArchiveRecord | undefined;
  try {
    record = deps.store.get(file.path);
  } catch (err) {
    machine.transition("failed", "store read failed");
    logger.error({ err }, "Failed to read archive record");
    return { ...base, state: "failed", error: errorMessage(err) };
  }

  if (!isArchiveDue(record?.lastArchive, toCalendarDate(now()))) {
    machine.transition("skipped", `archived on ${record?.lastArchive}`);
    logger.info("Skipping archive (already done today)");
    return { ...base, state: "skipped" };
  }

  let sha256: string;
  try {
    sha256 = await sha256OfFile(file.path);
  } catch (err) {
    machine.transition("failed", "hash failed");
    logger.warn({ err }, "Cannot hash file, not archiving");
    return { ...base, state: "failed", error: errorMessage(err) };
  }

  const delayMinutes = pickDelayMinutes(deps.delay, deps.random);
  machine.transition("waiting", `${delayMinutes} min delay`);
  logger.info({ delayMinutes }, "Waiting before archiving");
  await sleep(delayMinutes * 60_000);

  machine.transition("submitting");
  logger.info({ publicUrl: file.publicUrl }, "Archiving");

  let archiveUrl: string;
  try {
    archiveUrl = await deps.client.submit(file.publicUrl);
  } catch (err) {
    machine.transition("failed", "submission failed");
    logger.warn(
      { publicUrl: file.publicUrl, error: errorMessage(err) },
      "Archiving failed",
    );
    return {
      ...base,
      state: "failed",
      sha256,
      delayMinutes,
      error: errorMessage(err),
    };
  }

  try {
    deps.store.put({
      path: file.path,
      sha256,
      lastArchive: toCalendarDate(now()),
      archiveUrl,
    });
  } catch (err) {
    machine.transition("failed", "store write failed");
    logger.error({ err, archiveUrl }, "Archived but failed to save record");
    return {
      ...base,
      state: "failed",
      archiveUrl,
      sha256,
      delayMinutes,
      error: errorMessage(err),
    };
  }

  machine.transition("recorded");
  logger.info({ archiveUrl }, "Archived");
  return { ...base, state: "recorded", archiveUrl, sha256, delayMinutes };
}
