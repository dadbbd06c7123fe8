import { join } from "node:path";
import { homedir } from "node:os";

export const DEFAULT_ROOT_PATH = join(homedir(), "export-tracker");

/** Environment variable that overrides the root path. */
export const ROOT_PATH_ENV = "EXPORT_TRACKER_ROOT_PATH";
