import { parse as parseCSV } from "csv-parse/sync";
import { z } from "zod";
import { ParseError, errorMessage } from "../errors/catalog.js";
import { normalizeEntityName } from "../names/normalize.js";
import type { CatalogColumns } from "../schemas/tracker-config.js";
import { DEFAULTS } from "../schemas/tracker-config.js";
import type { Catalog, CatalogParseResult, RejectedRow } from "./types.js";
import { cleanCanonicalUrl } from "./url.js";

const RowSchema = z.record(z.string(), z.string());

/**
 * Parse CSV text with a header row into raw string records. Stray quotes
 * inside unquoted cells are kept as text; a record that still cannot be
 * read is dropped and reported through `onSkip`. Throws ParseError when
 * the payload is not CSV at all.
 */
export function parseCsvRecords(
  text: string,
  onSkip?: (message: string) => void,
): unknown[] {
  let records: unknown;
  try {
    records = parseCSV(text, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
      relax_quotes: true,
      skip_records_with_error: true,
      on_skip: (err) => {
        onSkip?.(err ? err.message : "unreadable record");
        return undefined;
      },
    });
  } catch (err) {
    throw new ParseError(`Malformed CSV: ${errorMessage(err)}`, undefined, err);
  }
  if (!Array.isArray(records)) {
    throw new ParseError("CSV parser returned no rows");
  }
  return records;
}

/**
 * Turn the remote catalog CSV into a Catalog.
 *
 * A row counts only when its selection column reads "yes" (trimmed,
 * case-insensitive). Selected rows with an unusable URL or name are
 * reported in `rejected`. When two rows normalize to the same name the
 * later one wins.
 */
export function parseCatalogCsv(
  text: string,
  columns: CatalogColumns = DEFAULTS.catalog.columns,
): CatalogParseResult {
  const catalog: Catalog = new Map();
  const rejected: RejectedRow[] = [];
  const records = parseCsvRecords(text, (error) => {
    rejected.push({ reason: "malformed-row", error });
  });

  records.forEach((record, index) => {
    const row = index + 1;
    const parsed = RowSchema.safeParse(record);
    if (!parsed.success) {
      rejected.push({ row, reason: "malformed-row" });
      return;
    }

    const fields = parsed.data;
    const selection = fields[columns.selection] ?? "";
    if (selection.trim().toLowerCase() !== "yes") {
      return;
    }

    const name = fields[columns.name] ?? "";
    const url = fields[columns.url] ?? "";

    const canonicalUrl = cleanCanonicalUrl(url);
    if (!canonicalUrl) {
      rejected.push({ row, reason: "invalid-url", name, url });
      return;
    }

    const normalizedName = normalizeEntityName(name);
    if (!normalizedName) {
      rejected.push({ row, reason: "empty-name", name, url });
      return;
    }

    catalog.set(normalizedName, canonicalUrl);
  });

  return { catalog, rejected };
}
