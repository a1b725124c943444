/**
 * Structured logging
 */

export { DEFAULT_LOGGER_CONFIG, getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
export {
  createContextLogger,
  createLogger,
  getComponentLogger,
  getRouteLogger,
  logger,
} from './logger.js';
export type { IngressLogger, LoggerConfig, LoggerContext, LogLevel } from './types.js';
