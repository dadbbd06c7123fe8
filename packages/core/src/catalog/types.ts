/** normalizedName → canonicalUrl. Row order carries no meaning. */
export type Catalog = Map<string, string>;

/** Why a selected catalog row was left out of the result */
export type RejectionReason = "malformed-row" | "invalid-url" | "empty-name";

export interface RejectedRow {
  /** 1-based data row number (header excluded); absent when the CSV record itself was unreadable */
  row?: number;
  reason: RejectionReason;
  error?: string;
  name?: string;
  url?: string;
}

export interface CatalogParseResult {
  catalog: Catalog;
  rejected: RejectedRow[];
}
