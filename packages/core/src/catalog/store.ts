import { mkdir, readFile, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { randomUUID } from "node:crypto";
import { stringify } from "csv-stringify/sync";
import { z } from "zod";
import { parseCsvRecords } from "./parse.js";
import type { Catalog } from "./types.js";

const StoredRowSchema = z.object({
  artist: z.string().min(1),
  url: z.string().min(1),
});

export interface CatalogStore {
  /** Last saved catalog; empty when nothing was saved yet */
  load(): Promise<Catalog>;

  /** Replace the saved catalog with exactly `catalog` */
  save(catalog: Catalog): Promise<void>;
}

/**
 * Persists the catalog as a two-column CSV (header "artist,url").
 * Saves go through a temp file and a rename so a crash never leaves a
 * half-written catalog behind.
 */
export function createCatalogStore(filePath: string): CatalogStore {
  return {
    async load() {
      let text: string;
      try {
        text = await readFile(filePath, "utf-8");
      } catch (err: unknown) {
        if ((err as NodeJS.ErrnoException).code === "ENOENT") {
          return new Map();
        }
        throw err;
      }

      const catalog: Catalog = new Map();
      for (const record of parseCsvRecords(text)) {
        const row = StoredRowSchema.safeParse(record);
        if (row.success) {
          catalog.set(row.data.artist, row.data.url);
        }
      }
      return catalog;
    },

    async save(catalog) {
      const content = stringify(
        [...catalog].map(([artist, url]) => ({ artist, url })),
        { header: true, columns: ["artist", "url"] },
      );

      await mkdir(dirname(filePath), { recursive: true });
      const tempPath = filePath + ".tmp." + randomUUID();
      await writeFile(tempPath, content, "utf-8");
      await rename(tempPath, filePath);
    },
  };
}
