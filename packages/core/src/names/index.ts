export { normalizeEntityName, sanitizeFilename } from "./normalize.js";
