import type { Catalog } from "./types.js";

/**
 * Entries of `remote` that are new or whose URL changed (exact string
 * comparison). Entries that disappeared upstream are not reported.
 */
export function diffCatalog(remote: Catalog, cached: Catalog): Catalog {
  const changed: Catalog = new Map();
  for (const [name, url] of remote) {
    if (cached.get(name) !== url) {
      changed.set(name, url);
    }
  }
  return changed;
}
