export type {
  Catalog,
  CatalogParseResult,
  RejectedRow,
  RejectionReason,
} from "./types.js";
export { cleanCanonicalUrl, extractDocumentId } from "./url.js";
export { parseCatalogCsv, parseCsvRecords } from "./parse.js";
export {
  createCatalogFetcher,
  type CatalogFetcher,
  type CatalogFetcherOptions,
} from "./fetcher.js";
export { createCatalogStore, type CatalogStore } from "./store.js";
export { diffCatalog } from "./diff.js";
