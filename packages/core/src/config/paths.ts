import { homedir } from "node:os";
import { join, resolve } from "node:path";
import { DEFAULT_ROOT_PATH } from "./defaults.js";

/**
 * Expands a leading "~" to the current user's home directory.
 */
export function expandHomePath(input: string): string {
  if (input === "~") {
    return homedir();
  }
  if (input.startsWith("~/")) {
    return resolve(homedir(), input.slice(2));
  }
  return input;
}

/**
 * Resolves the configured root path (or default) to an absolute path.
 */
export function resolveRootPath(input?: string): string {
  return resolve(expandHomePath(input ?? DEFAULT_ROOT_PATH));
}

/** Every on-disk location the tracker reads or writes, derived from one root. */
export interface TrackerPaths {
  rootPath: string;
  configPath: string;
  /** Per-entity export directories live here */
  exportDir: string;
  /** Last successfully synced catalog (artist,url CSV) */
  catalogPath: string;
  /** Append-only list of export URLs that answered 401 */
  downHostLogPath: string;
  /** SQLite store of per-file archive records */
  archiveDbPath: string;
}

export function resolveTrackerPaths(rootPath?: string): TrackerPaths {
  const root = resolveRootPath(rootPath);
  return {
    rootPath: root,
    configPath: join(root, "config.json"),
    exportDir: join(root, "downloads"),
    catalogPath: join(root, "last_artists.csv"),
    downHostLogPath: join(root, "host", "down.txt"),
    archiveDbPath: join(root, "archive.db"),
  };
}
