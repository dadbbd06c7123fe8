export {
  DEFAULTS,
  TrackerConfigSchema,
  type TrackerConfig,
  type LoggingConfig,
  type CatalogColumns,
  type ArchiveConfig,
} from "./tracker-config.js";
