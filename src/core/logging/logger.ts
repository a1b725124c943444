import pino from 'pino';
import { getLoggerConfigFromEnv, validateLoggerConfig } from './config.js';
import type { IngressLogger, LoggerConfig, LoggerContext } from './types.js';

/**
 * Pino-based implementation of IngressLogger
 */
class PinoLogger implements IngressLogger {
  constructor(private readonly pinoLogger: pino.Logger) {}

  trace(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.trace(meta, msg);
  }

  debug(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.debug(meta, msg);
  }

  info(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.info(meta, msg);
  }

  warn(msg: string, meta?: Record<string, unknown>): void {
    this.pinoLogger.warn(meta, msg);
  }

  error(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pinoLogger.error(withError(meta, error), msg);
  }

  fatal(msg: string, error?: Error, meta?: Record<string, unknown>): void {
    this.pinoLogger.fatal(withError(meta, error), msg);
  }

  child(bindings: Record<string, unknown>): IngressLogger {
    return new PinoLogger(this.pinoLogger.child(bindings));
  }
}

function withError(meta: Record<string, unknown> | undefined, error: Error | undefined) {
  const logData: Record<string, unknown> = { ...meta };
  if (error) {
    logData.error = {
      name: error.name,
      message: error.message,
      stack: error.stack,
    };
  }
  return logData;
}

/**
 * Create a logger with the specified configuration. Explicit fields win over
 * the environment.
 */
export function createLogger(config?: Partial<LoggerConfig>): IngressLogger {
  const finalConfig = { ...getLoggerConfigFromEnv(), ...config };
  validateLoggerConfig(finalConfig);

  const pinoOptions: pino.LoggerOptions = {
    level: finalConfig.level,
    timestamp: finalConfig.options?.timestamp !== false,
    formatters: {
      level: (label) => ({ level: label }),
    },
  };

  let transport: pino.TransportSingleOptions | undefined;

  if (finalConfig.pretty) {
    transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
      },
    };
  } else if (finalConfig.destination && finalConfig.destination !== 'stdout') {
    transport = {
      target: 'pino/file',
      options: {
        destination: finalConfig.destination,
      },
    };
  }

  const pinoLogger = transport ? pino(pinoOptions, pino.transport(transport)) : pino(pinoOptions);

  return new PinoLogger(pinoLogger);
}

/**
 * Create a logger with bound context
 */
export function createContextLogger(
  context: LoggerContext,
  config?: Partial<LoggerConfig>
): IngressLogger {
  return createLogger(config).child(context);
}

/**
 * Default logger instance using environment configuration
 */
export const logger: IngressLogger = createLogger();

/**
 * Create a component-specific logger
 */
export function getComponentLogger(
  component: string,
  additionalContext?: Record<string, unknown>
): IngressLogger {
  return logger.child({ component, ...additionalContext });
}

/**
 * Create a route-specific logger, keyed `namespace/name`
 */
export function getRouteLogger(
  namespace: string,
  name: string,
  additionalContext?: Record<string, unknown>
): IngressLogger {
  return logger.child({ route: `${namespace}/${name}`, ...additionalContext });
}
