/**
 * Diagnostic logging
 *
 * Winston-based logger for operational messages (sink failures, configuration
 * loading). Audit entries do not go through here; they have their own sinks.
 */

import winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Minimal logger surface the rest of the code depends on. A winston logger
 * satisfies it, and so does a test double.
 */
export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

export interface LoggerConfig {
  level: LogLevel;
  silent: boolean;
}

function isLogLevel(value: string | undefined): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Resolve logger configuration
 *
 * Priority:
 * 1. Provided level (from configuration file or --verbose)
 * 2. LOG_LEVEL environment variable
 * 3. Default: 'warn'
 *
 * Logging is silenced when NODE_ENV is 'test'.
 */
export function getLoggerConfig(level?: LogLevel): LoggerConfig {
  const envLevel = process.env.LOG_LEVEL;
  return {
    level: level ?? (isLogLevel(envLevel) ? envLevel : 'warn'),
    silent: process.env.NODE_ENV === 'test'
  };
}

function createFormat(): winston.Logform.Format {
  return winston.format.combine(
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.errors({ stack: true }),
    winston.format.printf(({ level, message, timestamp, ...meta }) => {
      const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
      return `${timestamp} [${level.toUpperCase()}] ${message}${metaStr}`;
    })
  );
}

export function createLogger(config: LoggerConfig = getLoggerConfig()): winston.Logger {
  return winston.createLogger({
    level: config.level,
    silent: config.silent,
    format: createFormat(),
    // Everything to stderr so prompts on stdout stay readable
    transports: [new winston.transports.Console({ stderrLevels: [...LOG_LEVELS] })]
  });
}

let loggerInstance: winston.Logger | null = null;

/**
 * Initialize the global logger. Call once at startup, after configuration is loaded.
 */
export function initializeLogger(level?: LogLevel): winston.Logger {
  loggerInstance = createLogger(getLoggerConfig(level));
  return loggerInstance;
}

export function getLogger(): Logger {
  if (!loggerInstance) {
    loggerInstance = createLogger();
  }
  return loggerInstance;
}
