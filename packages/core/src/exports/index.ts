export {
  buildExportUrl,
  buildEntityDir,
  buildPublicUrl,
  isTempName,
  type ExportFormat,
} from "./paths.js";
export {
  listMaterializedFiles,
  writeFileAtomic,
  type MaterializedFile,
  type ExportLocation,
} from "./files.js";
export { extractZip, type ExtractResult } from "./extract.js";
export {
  downloadExports,
  type ExportDownloaderDeps,
  type ExportTarget,
  type ExportResult,
  type FormatOutcome,
} from "./downloader.js";
