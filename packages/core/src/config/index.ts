export {
  DEFAULT_ROOT_PATH,
  ROOT_PATH_ENV,
} from "./defaults.js";
export { loadConfig, type LoadConfigOptions } from "./loader.js";
export {
  expandHomePath,
  resolveRootPath,
  resolveTrackerPaths,
  type TrackerPaths,
} from "./paths.js";
