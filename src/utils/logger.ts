/**
 * Logger
 *
 * One process-wide logger with two outputs: the console, filtered by a
 * configurable level, and a daily plain-text file that receives everything.
 */

import * as fs from 'fs';
import * as path from 'path';

import { logDir } from '../constants/config-files.js';

export type LogLevel = 'debug' | 'info' | 'warning' | 'error' | 'critical';

export const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warning: 30,
  error: 40,
  critical: 50,
};

// eslint-disable-next-line no-control-regex
const ANSI_PATTERN = /\u001b\[[0-9;]*[A-Za-z]/g;

export interface LoggerOptions {
  consoleLevel?: LogLevel;
  showLevel?: boolean;
  logDirectory?: string;
}

/**
 * Remove ANSI escape sequences from text
 */
export function stripAnsi(text: string): string {
  return text.replace(ANSI_PATTERN, '');
}

/**
 * Name of today's log file, e.g. 2024-05-01.log
 */
export function logfileName(date: Date = new Date()): string {
  const yyyy = String(date.getFullYear());
  const mm = String(date.getMonth() + 1).padStart(2, '0');
  const dd = String(date.getDate()).padStart(2, '0');
  return `${yyyy}-${mm}-${dd}.log`;
}

export class Logger {
  consoleLevel: LogLevel;
  showLevel: boolean;
  readonly logDirectory: string;
  private fileErrorReported = false;

  constructor(options: LoggerOptions = {}) {
    this.consoleLevel = options.consoleLevel ?? 'info';
    this.showLevel = options.showLevel ?? false;
    this.logDirectory = options.logDirectory ?? logDir();
  }

  get logFilePath(): string {
    return path.join(this.logDirectory, logfileName());
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warning(message: string): void {
    this.log('warning', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  critical(message: string): void {
    this.log('critical', message);
  }

  log(level: LogLevel, message: string): void {
    this.writeFile(level, message);

    if (LOG_LEVELS[level] < LOG_LEVELS[this.consoleLevel]) return;
    const line = this.showLevel ? `${level.toUpperCase().padEnd(8)} ${message}` : message;
    if (LOG_LEVELS[level] >= LOG_LEVELS.warning) {
      console.error(line);
    } else {
      console.log(line);
    }
  }

  private writeFile(level: LogLevel, message: string): void {
    try {
      fs.mkdirSync(this.logDirectory, { recursive: true });
      const entry = `${new Date().toISOString()} ${level.toUpperCase()} ${stripAnsi(message)}\n`;
      fs.appendFileSync(this.logFilePath, entry, 'utf8');
    } catch (e) {
      // The console still gets the message; only report the file problem once
      if (!this.fileErrorReported) {
        this.fileErrorReported = true;
        console.error(`[!] Could not write log file: ${e instanceof Error ? e.message : String(e)}`);
      }
    }
  }
}

let instance: Logger | null = null;

/**
 * Get the process-wide logger, creating it on first use
 */
export function getLogger(): Logger {
  if (!instance) {
    instance = new Logger();
  }
  return instance;
}

/**
 * Replace the process-wide logger (tests and the CLI entry point)
 */
export function resetLogger(options: LoggerOptions = {}): Logger {
  instance = new Logger(options);
  return instance;
}

export function setConsoleLevel(level: LogLevel): void {
  getLogger().consoleLevel = level;
}

export function showConsoleLevel(): void {
  getLogger().showLevel = true;
}

/**
 * Log output from an external tool that may contain ANSI colours
 */
export function fromAnsi(logger: Logger, text: string): void {
  logger.info(stripAnsi(text));
}
