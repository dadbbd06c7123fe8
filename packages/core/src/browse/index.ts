export { contentTypeFor } from "./content-type.js";
export {
  formatModified,
  listEntities,
  listEntityFiles,
  resolveExportPath,
  type EntityFileEntry,
} from "./listing.js";
