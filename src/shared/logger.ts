/**
 * Logger module for cloud-shrink
 * Provides consistent logging with timestamps and log levels,
 * mirrored to an append-only log file when one is configured
 */

import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LOG_LEVEL_COLORS: Record<LogLevel, string> = {
  debug: '\x1b[90m', // Gray
  info: '\x1b[36m', // Cyan
  warn: '\x1b[33m', // Yellow
  error: '\x1b[31m', // Red
};

const RESET_COLOR = '\x1b[0m';

export interface LoggerOptions {
  level?: LogLevel;
  useColors?: boolean;
  prefix?: string;
  /** Append-only file that receives every emitted line (uncoloured) */
  logFile?: string;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function stringifyArg(arg: unknown): string {
  if (arg instanceof Error) return arg.stack ?? arg.message;
  if (typeof arg === 'string') return arg;
  try {
    return JSON.stringify(arg);
  } catch {
    return String(arg);
  }
}

interface LoggerSettings {
  level: LogLevel;
  useColors: boolean;
  logFile: string | undefined;
}

export class Logger {
  /** Shared by a logger and all of its children */
  private settings: LoggerSettings;
  private prefix: string;

  constructor(options: LoggerOptions = {}, settings?: LoggerSettings) {
    this.prefix = options.prefix ?? '';
    this.settings = settings ?? {
      level: options.level ?? 'info',
      useColors: options.useColors ?? process.stdout.isTTY === true,
      logFile: options.logFile,
    };

    if (!settings && this.settings.logFile) {
      mkdirSync(dirname(this.settings.logFile), { recursive: true });
    }
  }

  /** Reconfigure this logger and every child created from it */
  configure(options: LoggerOptions): void {
    if (options.level) this.settings.level = options.level;
    if (options.useColors !== undefined) this.settings.useColors = options.useColors;
    if (options.logFile !== undefined) {
      mkdirSync(dirname(options.logFile), { recursive: true });
      this.settings.logFile = options.logFile;
    }
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.settings.level];
  }

  private formatTimestamp(): string {
    const now = new Date();
    return now.toISOString().replace('T', ' ').replace('Z', '');
  }

  private formatMessage(level: LogLevel, message: string, colors: boolean): string {
    const timestamp = this.formatTimestamp();
    const levelStr = level.toUpperCase().padEnd(5);
    const prefix = this.prefix ? `[${this.prefix}] ` : '';

    if (colors) {
      const color = LOG_LEVEL_COLORS[level];
      return `${color}[${timestamp}] ${levelStr}${RESET_COLOR} ${prefix}${message}`;
    }

    return `[${timestamp}] ${levelStr} ${prefix}${message}`;
  }

  private writeToFile(line: string): void {
    const logFile = this.settings.logFile;
    if (!logFile) return;
    try {
      appendFileSync(logFile, line + '\n');
    } catch (error) {
      console.error(`Log file unavailable (${logFile}):`, error);
      this.settings.logFile = undefined;
    }
  }

  private log(level: LogLevel, message: string, ...args: unknown[]): void {
    if (!this.shouldLog(level)) return;

    const formattedMessage = this.formatMessage(level, message, this.settings.useColors);
    const output = level === 'error' ? console.error : console.log;

    if (args.length > 0) {
      output(formattedMessage, ...args);
    } else {
      output(formattedMessage);
    }

    if (this.settings.logFile) {
      const plain = this.formatMessage(level, message, false);
      const extra = args.length > 0 ? ' ' + args.map(stringifyArg).join(' ') : '';
      this.writeToFile(plain + extra);
    }
  }

  debug(message: string, ...args: unknown[]): void {
    this.log('debug', message, ...args);
  }

  info(message: string, ...args: unknown[]): void {
    this.log('info', message, ...args);
  }

  warn(message: string, ...args: unknown[]): void {
    this.log('warn', message, ...args);
  }

  error(message: string, ...args: unknown[]): void {
    this.log('error', message, ...args);
  }

  /** Create a child logger with a prefix */
  child(prefix: string): Logger {
    const newPrefix = this.prefix ? `${this.prefix}:${prefix}` : prefix;
    return new Logger({ prefix: newPrefix }, this.settings);
  }

  /** Set the log level */
  setLevel(level: LogLevel): void {
    this.settings.level = level;
  }

  /** Get the current log level */
  getLevel(): LogLevel {
    return this.settings.level;
  }

  /** Log a progress message (always shown, regardless of level) */
  progress(current: number, total: number, message: string): void {
    const percent = total > 0 ? Math.round((current / total) * 100) : 100;
    const bar = this.createProgressBar(percent);
    const formattedMessage = `${bar} ${percent}% (${current}/${total}) ${message}`;

    console.log(formattedMessage);
    this.writeToFile(formattedMessage);
  }

  private createProgressBar(percent: number): string {
    const width = 20;
    const filled = Math.round((percent / 100) * width);
    const empty = width - filled;
    return `[${'█'.repeat(filled)}${'░'.repeat(empty)}]`;
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

export function getLogger(): Logger {
  if (!globalLogger) {
    globalLogger = new Logger();
  }
  return globalLogger;
}

/**
 * Configure the global logger in place, so module-level child loggers
 * created before the CLI parsed its flags follow the new settings
 */
export function configureGlobalLogger(options: LoggerOptions): Logger {
  const logger = getLogger();
  logger.configure(options);
  return logger;
}
