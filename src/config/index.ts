export {
  CONFIG_FILE_NAMES,
  DEFAULT_CONFIG,
  loadConfig,
  loadConfigFile,
  mergeConfig,
  resolveConfigPath,
} from "./config-loader.js";
export { validateConfig } from "./config-validator.js";
export type { ConfigOverrides, ReleaseConfig } from "./types.js";
