export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, LOG_LEVELS, validateLoggerConfig } from './config.js';
export {
  createLogger,
  getAppLogger,
  getComponentLogger,
  logger,
} from './logger.js';
export type { KubeEggLogger, LoggerConfig, LogLevel } from './types.js';
