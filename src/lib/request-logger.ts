import * as fs from 'fs/promises';
import chalk from 'chalk';

export interface RequestLogEntry {
  timestamp: string;
  method: string;
  path: string;
  statusCode: number;
  durationMs: number;
  error?: string;
}

export interface RequestLoggerOptions {
  component: string;    // e.g. "Aggregator" → "[Aggregator]" prefix
  verbose?: boolean;    // Print every request to stdout
  logFilePath?: string; // Append JSON lines here
}

export class RequestLogger {
  private readonly component: string;
  private readonly verbose: boolean;
  private readonly logFilePath?: string;

  constructor(options: RequestLoggerOptions) {
    this.component = options.component;
    this.verbose = options.verbose ?? false;
    this.logFilePath = options.logFilePath;
  }

  /**
   * Log a request with timing and outcome
   */
  async logRequest(entry: RequestLogEntry): Promise<void> {
    if (this.verbose) {
      console.log(this.formatHumanReadable(entry));
    }

    if (this.logFilePath) {
      try {
        await fs.appendFile(this.logFilePath, JSON.stringify(entry) + '\n', 'utf-8');
      } catch (error) {
        console.error(`[${this.component}] Failed to write to log file:`, error);
      }
    }
  }

  /**
   * Format log entry for console output
   */
  formatHumanReadable(entry: RequestLogEntry): string {
    const { method, path, statusCode, durationMs, error } = entry;
    const status = statusCode < 400 ? chalk.green(statusCode) : chalk.red(statusCode);

    let log = `[${this.component}] ${status} ${method} ${path} ${durationMs}ms`;
    if (error) {
      log += ` | Error: ${error}`;
    }
    return log;
  }
}

/**
 * Utility class for tracking request timing
 */
export class RequestTimer {
  private startTime: number;

  constructor() {
    this.startTime = Date.now();
  }

  /**
   * Get elapsed time in milliseconds
   */
  elapsed(): number {
    return Date.now() - this.startTime;
  }

  /**
   * Get current ISO timestamp
   */
  static now(): string {
    return new Date().toISOString();
  }
}
