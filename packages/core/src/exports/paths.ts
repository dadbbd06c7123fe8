import { join } from "node:path";
import { randomUUID } from "node:crypto";

export type ExportFormat = "xlsx" | "zip";

/** Marker that no sanitized filename can contain */
const TEMP_MARKER = "~";

/** "<baseUrl>/<documentId>/export?format=<format>" */
export function buildExportUrl(
  baseUrl: string,
  documentId: string,
  format: ExportFormat,
): string {
  return `${baseUrl.replace(/\/+$/, "")}/${documentId}/export?format=${format}`;
}

export function buildEntityDir(exportDir: string, entity: string): string {
  return join(exportDir, entity);
}

/** URL at which the browsing server exposes an exported file */
export function buildPublicUrl(
  publicBaseUrl: string,
  entity: string,
  fileName: string,
): string {
  const base = publicBaseUrl.replace(/\/+$/, "");
  return `${base}/${encodeURIComponent(entity)}/${encodeURIComponent(fileName)}`;
}

/** Sibling path used while a file is being written, renamed into place after */
export function buildTempPath(filePath: string): string {
  return `${filePath}${TEMP_MARKER}${randomUUID()}`;
}

export function isTempName(fileName: string): boolean {
  return fileName.includes(TEMP_MARKER);
}
