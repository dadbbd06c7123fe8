const DOCUMENT_URL_PATTERN =
  /https:\/\/docs\.google\.com\/spreadsheets\/d\/([a-zA-Z0-9_-]{44})/;
const DOCUMENT_ID_SEGMENT = /\/d\/([a-zA-Z0-9_-]{44})\//;

/**
 * "https://docs.google.com/spreadsheets/d/<id>/edit#gid=0"
 *   → "https://docs.google.com/spreadsheets/d/<id>/"
 *
 * Returns null unless the URL carries a 44-character document id.
 */
export function cleanCanonicalUrl(raw: string): string | null {
  const match = DOCUMENT_URL_PATTERN.exec(raw);
  return match ? `https://docs.google.com/spreadsheets/d/${match[1]}/` : null;
}

/** Document id from a canonical URL's "/d/<id>/" segment */
export function extractDocumentId(canonicalUrl: string): string | null {
  const match = DOCUMENT_ID_SEGMENT.exec(canonicalUrl);
  return match ? match[1] : null;
}
