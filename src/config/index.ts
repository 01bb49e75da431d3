/**
 * Configuration Module Index
 */

export {
  ConfigurationManager,
  ConfigurationError,
  parseRuntime,
  CONFIG_FILE_NAME,
  ENV_HOME,
  ENV_RUNS_DIR,
  ENV_LOG_LEVEL,
  SEARCH_PATH_ENV,
  INSTALL_ROOT,
  OP_MAIN,
  type Configuration,
  type RuntimeConfig,
} from './configuration-manager';

export {
  ConfiguredStorageProvider,
  safeEnvironment,
  type IStorageProvider,
} from './storage-provider';
