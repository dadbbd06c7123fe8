import type { Logger } from "pino";
import { TransportError, httpError } from "../errors/catalog.js";
import type { CatalogColumns } from "../schemas/tracker-config.js";
import { parseCatalogCsv } from "./parse.js";
import type { Catalog } from "./types.js";

export interface CatalogFetcherOptions {
  url: string;
  columns: CatalogColumns;
  logger: Logger;
}

export interface CatalogFetcher {
  /**
   * Download and parse the remote catalog. Rejects with TransportError
   * (AuthorizationError on 401) or ParseError; callers must not touch
   * persisted state when this rejects.
   */
  fetch(): Promise<Catalog>;
}

export function createCatalogFetcher(
  options: CatalogFetcherOptions,
): CatalogFetcher {
  const { url, columns, logger } = options;

  return {
    async fetch() {
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

      const text = await res.text();
      const { catalog, rejected } = parseCatalogCsv(text, columns);

      for (const entry of rejected) {
        logger.debug(entry, "Skipped catalog row");
      }
      logger.debug(
        { entries: catalog.size, rejected: rejected.length },
        "Remote catalog parsed",
      );

      return catalog;
    },
  };
}
