/**
 * Logging Infrastructure
 *
 * Provides configurable logging using Winston with support for:
 * - Multiple log levels (error, warn, info, debug)
 * - Colored console output (unless --no-color is specified)
 * - Environment variable configuration (MIGRAPH_LOG_LEVEL)
 * - The configured logging.level, applied once configuration is loaded
 *
 * The migrator logs through getLogger() unless it is given its own logger.
 */

import winston from 'winston';
import chalk from 'chalk';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerOptions {
  level?: LogLevel;
  noColor?: boolean;
  verbose?: boolean;
  /** Discard all output (used by tests) */
  silent?: boolean;
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

/**
 * Custom formatter for console output with chalk colors
 */
const consoleFormat = (noColor: boolean) => winston.format.printf(({ level, message, timestamp }) => {
  if (noColor) {
    return `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}`;
  }

  const colorMap: Record<string, (text: string) => string> = {
    error: chalk.red,
    warn: chalk.yellow,
    info: chalk.blue,
    debug: chalk.gray,
  };

  const colorFn = colorMap[level] ?? ((text: string) => text);
  const levelText = colorFn(level.toUpperCase());
  const timeText = chalk.gray(`[${String(timestamp)}]`);

  return `${timeText} ${levelText}: ${String(message)}`;
});

/**
 * Create a configured logger instance
 */
export function createLogger(options: LoggerOptions = {}): winston.Logger {
  const envLevel = process.env.MIGRAPH_LOG_LEVEL;
  const {
    level = isLogLevel(envLevel) ? envLevel : 'info',
    noColor = false,
    verbose = false,
    silent = false,
  } = options;

  // Override level if verbose is enabled
  const effectiveLevel = verbose ? 'debug' : level;

  return winston.createLogger({
    level: effectiveLevel,
    silent,
    format: winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss' }),
      winston.format.errors({ stack: true }),
    ),
    transports: [
      new winston.transports.Console({
        format: consoleFormat(noColor),
        // Keep stdout free for command output
        stderrLevels: [...LOG_LEVELS],
      }),
    ],
  });
}

// Global logger instance (initialized by the CLI entry point)
let globalLogger: winston.Logger | null = null;

/**
 * Initialize the global logger
 */
export function initLogger(options: LoggerOptions = {}): winston.Logger {
  globalLogger = createLogger(options);
  return globalLogger;
}

/**
 * Get the global logger instance
 * Creates a default logger if not initialized
 */
export function getLogger(): winston.Logger {
  if (!globalLogger) {
    globalLogger = createLogger();
  }
  return globalLogger;
}

/**
 * Change the level of the global logger in place
 * Loggers already handed out (e.g. to a migrator) follow the change.
 */
export function setLogLevel(level: LogLevel): void {
  getLogger().level = level;
}

/**
 * Convenience logging functions
 */
export const log = {
  error: (message: string, ...args: unknown[]) => getLogger().error(message, ...args),
  warn: (message: string, ...args: unknown[]) => getLogger().warn(message, ...args),
  info: (message: string, ...args: unknown[]) => getLogger().info(message, ...args),
  debug: (message: string, ...args: unknown[]) => getLogger().debug(message, ...args),
};
