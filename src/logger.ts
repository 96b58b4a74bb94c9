/**
 * Logger
 *
 * Levelled console output in the same style as the CLI helpers.
 * Services take a Logger so tests can pass the silent one.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Logger that prefixes every message with a scope label. */
  child(scope: string): Logger;
}

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  noColor?: boolean;
  /** Output sink (defaults to console.log / console.error) */
  write?: (line: string, stream: 'stdout' | 'stderr') => void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const LEVEL_STYLE: Record<Exclude<LogLevel, 'silent'>, { icon: string; color: (s: string) => string }> = {
  debug: { icon: '·', color: chalk.dim },
  info: { icon: 'ℹ', color: chalk.blue },
  warn: { icon: '⚠', color: chalk.yellow },
  error: { icon: '✗', color: chalk.red },
};

function defaultWrite(line: string, stream: 'stdout' | 'stderr'): void {
  if (stream === 'stderr') {
    console.error(line);
  } else {
    console.log(line);
  }
}

export function createLogger(options: ConsoleLoggerOptions = {}, scope?: string): Logger {
  const threshold = LEVEL_ORDER[options.level ?? 'info'];
  const write = options.write ?? defaultWrite;

  const emit = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_ORDER[level] < threshold) return;

    const style = LEVEL_STYLE[level];
    const prefix = scope ? `[${scope}] ` : '';
    const line = options.noColor
      ? `${style.icon} ${prefix}${message}`
      : `${style.color(style.icon)} ${chalk.dim(prefix)}${message}`;
    write(line, level === 'error' ? 'stderr' : 'stdout');
  };

  return {
    debug: (message) => emit('debug', message),
    info: (message) => emit('info', message),
    warn: (message) => emit('warn', message),
    error: (message) => emit('error', message),
    child: (childScope) => createLogger(options, scope ? `${scope}:${childScope}` : childScope),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = createLogger({ level: 'silent' });
