import { appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname } from 'node:path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const silentLogger: Logger = {
  debug() {},
  info() {},
  warn() {},
  error() {},
};

export interface ConsoleLoggerOptions {
  verbose?: boolean;
  quiet?: boolean;
  /** Defaults to stderr, so stdout stays clean for `--format json` */
  write?: (line: string) => void;
}

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: (text) => text,
  warn: chalk.yellow,
  error: chalk.red,
};

export function createConsoleLogger(opts: ConsoleLoggerOptions = {}): Logger {
  const write = opts.write ?? ((line: string) => process.stderr.write(line + '\n'));

  const enabled = (level: LogLevel): boolean => {
    if (opts.quiet) return level === 'error';
    if (level === 'debug') return opts.verbose === true;
    return true;
  };

  const emit = (level: LogLevel, message: string): void => {
    if (!enabled(level)) return;
    const prefix = level === 'info' || level === 'debug' ? '' : `${level}: `;
    write(LEVEL_STYLE[level](`${prefix}${message}`));
  };

  return {
    debug: (m) => emit('debug', m),
    info: (m) => emit('info', m),
    warn: (m) => emit('warn', m),
    error: (m) => emit('error', m),
  };
}

/**
 * Logs every level to `filePath`. The file is truncated on creation, so each
 * run starts with a fresh log.
 */
export function createFileLogger(filePath: string, now: () => Date = () => new Date()): Logger {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, '');

  const emit = (level: LogLevel, message: string): void => {
    appendFileSync(filePath, `${now().toISOString()} - ${level.toUpperCase()} - ${message}\n`);
  };

  return {
    debug: (m) => emit('debug', m),
    info: (m) => emit('info', m),
    warn: (m) => emit('warn', m),
    error: (m) => emit('error', m),
  };
}

export function combineLoggers(...loggers: Logger[]): Logger {
  return {
    debug: (m) => loggers.forEach(l => l.debug(m)),
    info: (m) => loggers.forEach(l => l.info(m)),
    warn: (m) => loggers.forEach(l => l.warn(m)),
    error: (m) => loggers.forEach(l => l.error(m)),
  };
}
