/**
 * Structured logging for schema wiring.
 *
 * Backed by pino. Component loggers created with createLogger() merge their
 * preset fields into every record.
 *
 * Environment:
 * - WIRING_LOG_LEVEL: fatal, error, warn, info, debug, trace or silent (default: info)
 * - NODE_ENV: "production" and "test" write plain JSON, anything else pretty-prints
 */

import { type DestinationStream, type Logger, type LoggerOptions, pino } from 'pino';

/**
 * Structured logging fields.
 *
 * Common fields include:
 * - component: Component/subsystem identifier (e.g., "type_wiring")
 * - type_name: Schema type being wired
 * - field_name: Field a binding applies to
 */
export interface LogFields {
  [key: string]: string | number | boolean | null | undefined;
}

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const DEFAULT_LOG_LEVEL: LogLevel = 'info';

function isLogLevel(value: string): value is LogLevel {
  return (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * Build pino options from environment variables.
 *
 * @param env - Environment to read (defaults to process.env)
 */
export function loggerOptionsFromEnv(env: NodeJS.ProcessEnv = process.env): LoggerOptions {
  const requested = env.WIRING_LOG_LEVEL?.trim().toLowerCase();
  const loggerOptions: LoggerOptions = {
    name: 'schema-wiring',
    level: requested && isLogLevel(requested) ? requested : DEFAULT_LOG_LEVEL,
  };

  if (env.NODE_ENV !== 'production' && env.NODE_ENV !== 'test') {
    loggerOptions.transport = {
      target: 'pino-pretty',
      options: { colorize: true },
    };
  }

  return loggerOptions;
}

/**
 * Create a pino logger from options, optionally writing to a custom destination.
 */
export function createRootLogger(
  options: LoggerOptions = loggerOptionsFromEnv(),
  destination?: DestinationStream
): Logger {
  return destination ? pino(options, destination) : pino(options);
}

let rootLogger: Logger | null = null;

function getRootLogger(): Logger {
  if (!rootLogger) {
    rootLogger = createRootLogger();
  }
  return rootLogger;
}

/**
 * Logger with preset fields.
 */
export interface ComponentLogger {
  error(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  trace(message: string, fields?: LogFields): void;
}

/**
 * Create a logger with preset fields.
 *
 * The root logger is created lazily on first use unless `base` is given.
 *
 * @param defaultFields - Fields to include in every log message
 * @param base - Logger to write through (defaults to the package root logger)
 *
 * @example
 * const logger = createLogger({ component: 'type_wiring' });
 * logger.warn('Replacing field resolver', { type_name: 'Pet', field_name: 'name' });
 */
export function createLogger(defaultFields: LogFields, base?: Logger): ComponentLogger {
  let child: Logger | null = null;
  const target = (): Logger => {
    if (!child) {
      child = (base ?? getRootLogger()).child(defaultFields);
    }
    return child;
  };

  return {
    error: (message, fields) => target().error(fields ?? {}, message),
    warn: (message, fields) => target().warn(fields ?? {}, message),
    info: (message, fields) => target().info(fields ?? {}, message),
    debug: (message, fields) => target().debug(fields ?? {}, message),
    trace: (message, fields) => target().trace(fields ?? {}, message),
  };
}
