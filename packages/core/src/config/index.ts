export {
  loadConfig,
  mergeConfig,
  DEFAULT_CONFIG,
  CONFIG_DIR,
  CONFIG_FILE,
  MEMORY_DATABASE,
} from './ConfigLoader.js';
export type {
  RosterConfig,
  RuntimeMode,
  ServerConfig,
  DatabaseConfig,
  LoggingConfig,
  PartialRosterConfig,
} from './ConfigLoader.js';
