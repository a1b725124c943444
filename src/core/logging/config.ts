import type { LoggerConfig, LogLevel } from './types.js';

const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

/**
 * Default logger configuration
 */
export const DEFAULT_LOGGER_CONFIG: LoggerConfig = {
  level: 'info',
  pretty: false,
  options: {
    timestamp: true,
  },
};

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Get logger configuration from environment variables
 */
export function getLoggerConfigFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  const config: LoggerConfig = { ...DEFAULT_LOGGER_CONFIG };

  const envLevel = env.TUNNEL_INGRESS_LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    config.level = envLevel;
  }

  if (env.NODE_ENV === 'development' || env.TUNNEL_INGRESS_LOG_PRETTY === 'true') {
    config.pretty = true;
  }

  if (env.TUNNEL_INGRESS_LOG_DESTINATION) {
    config.destination = env.TUNNEL_INGRESS_LOG_DESTINATION;
  }

  if (env.TUNNEL_INGRESS_LOG_TIMESTAMP === 'false') {
    config.options = { ...config.options, timestamp: false };
  }

  return config;
}

/**
 * Validate logger configuration
 */
export function validateLoggerConfig(config: LoggerConfig): void {
  if (!isLogLevel(config.level)) {
    throw new Error(`Invalid log level: ${config.level}. Must be one of: ${LOG_LEVELS.join(', ')}`);
  }

  if (config.destination !== undefined && config.destination.length === 0) {
    throw new Error('Log destination must be a non-empty string');
  }
}
