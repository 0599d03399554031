/**
 * Logger module for tracking ingestion and query processing
 * Logs to the console and, when a directory is configured, to a file with timestamps and log levels
 */

import * as fs from 'fs';
import * as path from 'path';

export enum LogLevel {
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
  SUCCESS = 'SUCCESS'
}

export type LogThreshold = LogLevel | 'SILENT';

const SEVERITY: Record<LogThreshold, number> = {
  [LogLevel.DEBUG]: 0,
  [LogLevel.INFO]: 1,
  [LogLevel.SUCCESS]: 1,
  [LogLevel.WARN]: 2,
  [LogLevel.ERROR]: 3,
  SILENT: 4
};

export interface LoggerOptions {
  level?: LogThreshold;
  directory?: string;
}

export function parseLogThreshold(value: string | undefined): LogThreshold {
  const normalized = (value ?? '').trim().toUpperCase();
  if (normalized === 'SILENT') {
    return 'SILENT';
  }

  const match = Object.values(LogLevel).find(level => level === normalized);
  return match ?? LogLevel.DEBUG;
}

export class Logger {
  private readonly threshold: LogThreshold;
  private readonly logFilePath: string | null = null;
  private readonly logStream: fs.WriteStream | null = null;

  constructor(options: LoggerOptions = {}) {
    this.threshold = options.level ?? LogLevel.DEBUG;

    if (options.directory) {
      if (!fs.existsSync(options.directory)) {
        fs.mkdirSync(options.directory, { recursive: true });
      }

      const timestamp = new Date().toISOString().replace(/[:.]/g, '-');
      this.logFilePath = path.join(options.directory, `rag-${timestamp}.log`);
      this.logStream = fs.createWriteStream(this.logFilePath, { flags: 'a' });

      this.log(LogLevel.INFO, `Logger initialized. Log file: ${this.logFilePath}`);
    }
  }

  private enabled(level: LogLevel): boolean {
    return SEVERITY[level] >= SEVERITY[this.threshold];
  }

  /**
   * Main logging method
   */
  private log(level: LogLevel, message: string, data?: unknown): void {
    if (!this.enabled(level)) {
      return;
    }

    const timestamp = new Date().toISOString();
    const logMessage = `[${timestamp}] [${level}] ${message}`;

    if (this.logStream) {
      this.logStream.write(logMessage + '\n');

      if (data !== undefined) {
        this.logStream.write(`  Data: ${this.stringify(data)}\n`);
      }
    }

    console.log(`[${level}] ${message}`);

    if (data !== undefined) {
      console.log('  Data:', data);
    }
  }

  private stringify(data: unknown): string {
    if (data instanceof Error) {
      return data.stack ?? `${data.name}: ${data.message}`;
    }

    return typeof data === 'object' ? JSON.stringify(data, null, 2) : String(data);
  }

  /**
   * Log debug information
   */
  debug(message: string, data?: unknown): void {
    this.log(LogLevel.DEBUG, message, data);
  }

  /**
   * Log informational messages
   */
  info(message: string, data?: unknown): void {
    this.log(LogLevel.INFO, message, data);
  }

  /**
   * Log warnings
   */
  warn(message: string, data?: unknown): void {
    this.log(LogLevel.WARN, message, data);
  }

  /**
   * Log errors
   */
  error(message: string, error?: unknown): void {
    this.log(LogLevel.ERROR, message, error);
  }

  /**
   * Log success messages
   */
  success(message: string, data?: unknown): void {
    this.log(LogLevel.SUCCESS, message, data);
  }

  /**
   * Log separator line for readability
   */
  separator(char: string = '=', length: number = 80): void {
    if (!this.enabled(LogLevel.INFO)) {
      return;
    }

    const line = char.repeat(length);
    this.logStream?.write(line + '\n');
    console.log(line);
  }

  /**
   * Log section header
   */
  section(title: string): void {
    this.separator('=');
    this.info(title);
    this.separator('=');
  }

  /**
   * Close the log stream
   */
  close(): void {
    this.info('Logger closing');
    this.logStream?.end();
  }

  /**
   * Get the log file path, if logging to a file
   */
  getLogFilePath(): string | null {
    return this.logFilePath;
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return new Logger(options);
}

// Process-wide instance, configured from the environment
export const logger = createLogger({
  level: parseLogThreshold(process.env.RAG_LOG_LEVEL),
  directory: process.env.RAG_LOG_DIR || undefined
});
