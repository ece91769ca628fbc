/**
 * Configuration module exports
 */

// Defaults
export { DEFAULT_CONFIG, DEFAULT_SECRETS_PATH, deepMerge } from "./defaults";
// Loader
export {
  CONFIG_NAMES,
  ConfigError,
  findAndLoadConfig,
  findConfigFile,
  loadConfig,
  parseConfig,
  userConfigDir,
} from "./loader";
// Resolver
export { buildRunConfiguration, findProfile, resolvePaths, resolveProfile } from "./resolver";
// Validator
export { validateConfig } from "./validator";
