/**
 * Catalog key for an entity name. "$" reads as "s" so stylized names
 * ("J$ Smith") land on the same key as their plain spelling.
 */
export function normalizeEntityName(raw: string): string {
  return raw.toLowerCase().replace(/\$/g, "s").replace(/[^a-z0-9]/g, "");
}

/**
 * Safe on-disk name for an extracted archive member. May return "" for
 * names made only of stripped characters; callers skip those.
 */
export function sanitizeFilename(raw: string): string {
  return raw
    .replace(/\$/g, "s")
    .replace(/ /g, "")
    .replace(/[^A-Za-z0-9_.-]/g, "");
}
