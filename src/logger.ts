/**
 * Levelled logging to stdout or a log file.
 */

import * as fs from 'fs';

export enum LogLevel {
  DEBUG = 10,
  INFO = 20,
  WARNING = 30,
  ERROR = 40,
  CRITICAL = 50,
}

export const LOG_LEVEL_NAMES = ['DEBUG', 'INFO', 'WARNING', 'ERROR', 'CRITICAL'] as const;

export type LogLevelName = (typeof LOG_LEVEL_NAMES)[number];

export function isLogLevelName(value: string): value is LogLevelName {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

export interface LoggerOptions {
  /** Minimum level written (default: WARNING) */
  level?: LogLevel;

  /** Append to this file instead of writing to stdout */
  filename?: string;

  /** Line sink; overrides `filename` */
  write?: (line: string) => void;
}

export class Logger {
  readonly level: LogLevel;
  private logStream: fs.WriteStream | null = null;
  private readonly write: (line: string) => void;

  constructor(options: LoggerOptions = {}) {
    this.level = options.level ?? LogLevel.WARNING;

    if (options.write) {
      this.write = options.write;
    } else if (options.filename) {
      const stream = fs.createWriteStream(options.filename, { flags: 'a' });
      stream.on('error', (error) => {
        console.error(`Log file ${options.filename} unavailable: ${error.message}`);
      });
      this.logStream = stream;
      this.write = (line) => stream.write(line + '\n');
    } else {
      this.write = (line) => console.log(line);
    }
  }

  isEnabledFor(level: LogLevel): boolean {
    return level >= this.level;
  }

  log(level: LogLevel, message: string): void {
    if (!this.isEnabledFor(level)) return;

    this.write(`[${new Date().toISOString()}] [${LogLevel[level]}] ${message}`);
  }

  debug(message: string): void {
    this.log(LogLevel.DEBUG, message);
  }

  info(message: string): void {
    this.log(LogLevel.INFO, message);
  }

  warning(message: string): void {
    this.log(LogLevel.WARNING, message);
  }

  error(message: string): void {
    this.log(LogLevel.ERROR, message);
  }

  critical(message: string): void {
    this.log(LogLevel.CRITICAL, message);
  }

  /**
   * Flush and close the log file, if one is open.
   */
  close(): Promise<void> {
    const stream = this.logStream;
    this.logStream = null;

    if (!stream) return Promise.resolve();

    return new Promise((resolve) => {
      stream.end(() => resolve());
    });
  }
}
