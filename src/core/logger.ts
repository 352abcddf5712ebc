/**
 * Logging for extraction runs.
 *
 * The core never prints on its own: callers pass a Logger, or get the
 * no-op one. The CLI uses the console logger, which writes to stderr so
 * that data written to stdout stays clean.
 */

import pc from 'picocolors';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(component: string, message: string, data?: object): void;
  info(component: string, message: string, data?: object): void;
  warn(component: string, message: string, data?: object): void;
  error(component: string, message: string, error?: Error): void;
}

export interface ConsoleLoggerOptions {
  /** Print debug lines (default: false) */
  verbose?: boolean;
  /** Sink for formatted lines (default: process.stderr) */
  write?: (line: string) => void;
}

const LEVEL_COLORS: Record<LogLevel, (text: string) => string> = {
  debug: pc.dim,
  info: pc.cyan,
  warn: pc.yellow,
  error: pc.red,
};

export function formatEntry(
  level: LogLevel,
  component: string,
  message: string,
  extra?: object | Error
): string {
  const levelStr = LEVEL_COLORS[level](level.toUpperCase().padEnd(5));
  let entry = `${levelStr} ${pc.dim(`${component}:`)} ${message}`;

  if (extra instanceof Error) {
    entry += `\n  ${pc.red(extra.message)}`;
  } else if (extra) {
    entry += ` ${pc.dim(JSON.stringify(extra))}`;
  }

  return entry;
}

export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const verbose = options.verbose ?? false;
  const write = options.write ?? ((line: string) => process.stderr.write(line + '\n'));

  return {
    debug(component, message, data) {
      if (verbose) write(formatEntry('debug', component, message, data));
    },
    info(component, message, data) {
      write(formatEntry('info', component, message, data));
    },
    warn(component, message, data) {
      write(formatEntry('warn', component, message, data));
    },
    error(component, message, error) {
      write(formatEntry('error', component, message, error));
    },
  };
}

/**
 * Create a no-op logger for tests or library use.
 */
export function createNullLogger(): Logger {
  return {
    debug() {},
    info() {},
    warn() {},
    error() {},
  };
}
