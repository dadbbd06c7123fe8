import { extname } from "node:path";

const CONTENT_TYPES: Record<string, string> = {
  ".xlsx": "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
  ".html": "text/html; charset=utf-8",
  ".htm": "text/html; charset=utf-8",
};

const FALLBACK_CONTENT_TYPE = "application/octet-stream";

/** Content-Type for a served export file, chosen by extension only */
export function contentTypeFor(fileName: string): string {
  return CONTENT_TYPES[extname(fileName).toLowerCase()] ?? FALLBACK_CONTENT_TYPE;
}
