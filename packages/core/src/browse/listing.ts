import type { Dirent } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { join, relative, resolve, sep, isAbsolute } from "node:path";
import { sha256OfFile } from "../archive/hash.js";
import { isTempName } from "../exports/paths.js";

export interface EntityFileEntry {
  name: string;
  /** Local time, "YYYY-MM-DD HH:MM:SS" */
  modified: string;
  sizeBytes: number;
  sha256: string;
}

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

export function formatModified(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

async function readEntries(dir: string): Promise<Dirent[] | null> {
  try {
    return await readdir(dir, { withFileTypes: true });
  } catch (err: unknown) {
    const code = (err as NodeJS.ErrnoException).code;
    if (code === "ENOENT" || code === "ENOTDIR") {
      return null;
    }
    throw err;
  }
}

/** A single path segment that stays inside its parent directory */
function isSafeSegment(segment: string): boolean {
  return (
    segment.length > 0 &&
    segment !== "." &&
    segment !== ".." &&
    !/[/\\\0]/.test(segment)
  );
}

/**
 * Absolute path of `<exportDir>/<entity>/<fileName>`, or null when either
 * segment would leave the export directory.
 */
export function resolveExportPath(
  exportDir: string,
  entity: string,
  fileName?: string,
): string | null {
  const segments = fileName === undefined ? [entity] : [entity, fileName];
  if (!segments.every(isSafeSegment)) {
    return null;
  }

  const root = resolve(exportDir);
  const target = resolve(root, ...segments);
  const rel = relative(root, target);
  if (rel === "" || rel.startsWith(".." + sep) || rel === ".." || isAbsolute(rel)) {
    return null;
  }
  return target;
}

/** Entity directory names, sorted. Empty when the export dir is missing. */
export async function listEntities(exportDir: string): Promise<string[]> {
  const entries = await readEntries(exportDir);
  if (!entries) return [];
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * Files of one entity, sorted by name, with modification time and content
 * hash. Null when the entity has no directory.
 */
export async function listEntityFiles(
  exportDir: string,
  entity: string,
): Promise<EntityFileEntry[] | null> {
  const dir = resolveExportPath(exportDir, entity);
  if (!dir) return null;

  const entries = await readEntries(dir);
  if (!entries) return null;

  const names = entries
    .filter((entry) => entry.isFile() && !isTempName(entry.name))
    .map((entry) => entry.name)
    .sort();

  const files: EntityFileEntry[] = [];
  for (const name of names) {
    const path = join(dir, name);
    try {
      const info = await stat(path);
      files.push({
        name,
        modified: formatModified(info.mtime),
        sizeBytes: info.size,
        sha256: await sha256OfFile(path),
      });
    } catch (err: unknown) {
      // Replaced or removed while listing
      if ((err as NodeJS.ErrnoException).code === "ENOENT") continue;
      throw err;
    }
  }
  return files;
}
