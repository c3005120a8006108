export { DEFAULT_CONFIG, DEFAULT_SQLITE_PATH, CONFIG_FILE_NAMES } from './defaults.js';
export {
  loadConfig,
  loadConfigFile,
  findConfigFile,
  configFileToConfig,
  mergeConfig,
  validateConfig,
  type ConfigFile,
  type CliOptions,
  type LoadedConfig,
} from './loader.js';
export {
  ConfigWatcher,
  pickReloadable,
  type ConfigWatcherOptions,
  type ConfigWatcherState,
  type ReloadableConfig,
} from './hot-reload.js';
