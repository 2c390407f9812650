/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, DEFAULT_SOURCES, deepMerge } from "./defaults";
// Loader
export {
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
} from "./loader";
// Resolver
export { resolvePaths, resolveRoot } from "./resolver";
// Validator
export { normalizeMaxBackups, validateConfig } from "./validator";
