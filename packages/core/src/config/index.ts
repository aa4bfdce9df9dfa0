export {
  loadQueueConfig,
  parseQueueConfig,
  queueFromEnv,
  ConfigError,
  QUEUE_DEFAULTS,
  DEFAULT_CONFIG_FILE,
  DEFAULT_PROJECT_NAME,
} from './queue-config.js';
export type { ConfigSource, LoadedConfig } from './queue-config.js';
