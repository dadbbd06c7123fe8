import type { Dirent } from "node:fs";
import { readdir, rename, unlink, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { buildEntityDir, buildPublicUrl, buildTempPath, isTempName } from "./paths.js";

/** A file written under an entity's export directory */
export interface MaterializedFile {
  entity: string;
  fileName: string;
  path: string;
  publicUrl: string;
}

export interface ExportLocation {
  exportDir: string;
  publicBaseUrl: string;
}

/** Write temp file then rename, so readers never see a half-written file */
export async function writeFileAtomic(
  filePath: string,
  data: Uint8Array,
): Promise<void> {
  const tempPath = buildTempPath(filePath);
  try {
    await writeFile(tempPath, data);
    await rename(tempPath, filePath);
  } catch (err) {
    await unlink(tempPath).catch(() => undefined);
    throw err;
  }
}

/**
 * Every regular file currently in the entity's directory, sorted by name.
 * Empty when the directory does not exist.
 */
export async function listMaterializedFiles(
  location: ExportLocation,
  entity: string,
): Promise<MaterializedFile[]> {
  const dir = buildEntityDir(location.exportDir, entity);

  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (err: unknown) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      return [];
    }
    throw err;
  }

  return entries
    .filter((entry) => entry.isFile() && !isTempName(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((fileName) => ({
      entity,
      fileName,
      path: join(dir, fileName),
      publicUrl: buildPublicUrl(location.publicBaseUrl, entity, fileName),
    }));
}
