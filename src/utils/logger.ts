import * as fs from 'fs-extra';
import * as path from 'path';
import chalk from 'chalk';

// Log levels
export enum LogLevel {
  ERROR = 'error',
  INFO = 'info',
  VERBOSE = 'verbose'
}

export type EntryKind = 'ERROR' | 'WARNING' | 'INFO' | 'SUCCESS' | 'VERBOSE';

export interface LogEntry {
  timestamp: string;
  kind: EntryKind;
  message: string;
}

/**
 * Extra destination for log entries (e.g. a spreadsheet). Writes may be async;
 * the logger tracks them so `flush()` can wait before the process exits.
 */
export interface LogSink {
  readonly name: string;
  write(entry: LogEntry): Promise<void>;
}

// Logger configuration
export interface LoggerConfig {
  verbose: boolean;
  logLevel: LogLevel;
  logsDir: string;
  quiet?: boolean | undefined; // No console output (file sinks still written)
}

export interface LogFiles {
  success: string;
  failure: string;
  debug: string;
}

class Logger {
  private config: LoggerConfig;
  private sinks: LogSink[] = [];
  private pending: Promise<void>[] = [];
  readonly files: LogFiles;

  constructor(config: LoggerConfig) {
    this.config = config;
    this.files = {
      success: path.join(config.logsDir, 'success.log'),
      failure: path.join(config.logsDir, 'failure.log'),
      debug: path.join(config.logsDir, 'debug.log')
    };
    this.ensureLogsDirectory();
  }

  private ensureLogsDirectory(): void {
    try {
      fs.ensureDirSync(this.config.logsDir);
    } catch (error) {
      console.error('Failed to create logs directory:', error);
    }
  }

  private getTimestamp(): string {
    return new Date().toISOString();
  }

  private formatMessage(kind: EntryKind, message: string, timestamp: string = this.getTimestamp()): string {
    return `[${timestamp}] [${kind}] ${message}`;
  }

  private appendTo(file: string, line: string): void {
    try {
      fs.appendFileSync(file, line + '\n');
    } catch (error) {
      console.error(`Failed to write to ${file}:`, error);
    }
  }

  private shouldLog(level: LogLevel): boolean {
    const levels = [LogLevel.ERROR, LogLevel.INFO, LogLevel.VERBOSE];
    const configLevelIndex = levels.indexOf(this.config.logLevel);
    const messageLevelIndex = levels.indexOf(level);

    return messageLevelIndex <= configLevelIndex;
  }

  private get debugEnabled(): boolean {
    return this.config.verbose || this.config.logLevel === LogLevel.VERBOSE;
  }

  private print(text: string, toStderr: boolean = false): void {
    if (this.config.quiet) return;
    if (toStderr) {
      console.error(text);
    } else {
      console.log(text);
    }
  }

  /**
   * Write one entry to the file sinks for its kind and forward it to extra sinks
   */
  private record(kind: EntryKind, message: string, fileDetail?: string): void {
    const timestamp = this.getTimestamp();
    const line = this.formatMessage(kind, message, timestamp);
    const detailed = fileDetail ? `${line}\n${fileDetail}` : line;

    if (kind === 'SUCCESS') {
      this.appendTo(this.files.success, line);
    } else if (kind === 'ERROR' || kind === 'WARNING') {
      this.appendTo(this.files.failure, detailed);
    }
    if (this.debugEnabled) {
      this.appendTo(this.files.debug, detailed);
    }

    const entry: LogEntry = { timestamp, kind, message };
    for (const sink of this.sinks) {
      const write = sink.write(entry).catch((sinkError: unknown) => {
        const reason = sinkError instanceof Error ? sinkError.message : String(sinkError);
        console.error(`Log sink '${sink.name}' failed: ${reason}`);
      });
      this.pending.push(write);
    }
  }

  addSink(sink: LogSink): void {
    this.sinks.push(sink);
  }

  /**
   * Wait for every pending sink write
   */
  async flush(): Promise<void> {
    const pending = this.pending;
    this.pending = [];
    await Promise.all(pending);
  }

  error(message: string, error?: Error): void {
    if (!this.shouldLog(LogLevel.ERROR)) return;

    const errorMessage = error ? `${message}: ${error.message}` : message;
    this.print(chalk.red(this.formatMessage('ERROR', errorMessage)), true);
    this.record('ERROR', errorMessage, error?.stack);
  }

  warning(message: string): void {
    if (!this.shouldLog(LogLevel.INFO)) return;

    this.print(chalk.yellow(this.formatMessage('WARNING', message)));
    this.record('WARNING', message);
  }

  info(message: string): void {
    if (!this.shouldLog(LogLevel.INFO)) return;

    this.print(chalk.blue(this.formatMessage('INFO', message)));
    this.record('INFO', message);
  }

  success(message: string): void {
    if (!this.shouldLog(LogLevel.INFO)) return;

    this.print(chalk.green(this.formatMessage('SUCCESS', message)));
    this.record('SUCCESS', message);
  }

  verbose(message: string): void {
    if (!this.shouldLog(LogLevel.VERBOSE) || !this.debugEnabled) return;

    this.print(chalk.gray(this.formatMessage('VERBOSE', message)));
    this.record('VERBOSE', message);
  }

  progress(current: number, total: number, label: string = 'Progress'): void {
    if (!this.shouldLog(LogLevel.INFO) || this.config.quiet || total === 0) return;

    const percentage = Math.round((current / total) * 100);
    const progressBar = this.createProgressBar(percentage);
    const message = `${label}: ${progressBar} ${current}/${total} (${percentage}%)`;

    // Clear line and write progress
    process.stdout.write(`\r${chalk.cyan(message)}`);

    if (current === total) {
      process.stdout.write('\n');
    }
  }

  private createProgressBar(percentage: number, width: number = 20): string {
    const filled = Math.round((percentage / 100) * width);
    const empty = width - filled;
    return '█'.repeat(filled) + '░'.repeat(empty);
  }
}

// Global logger instance
let globalLogger: Logger | null = null;

export function initializeLogger(config: LoggerConfig): Logger {
  globalLogger = new Logger(config);
  return globalLogger;
}

export function getLogger(): Logger {
  if (!globalLogger) {
    throw new Error('Logger not initialized. Call initializeLogger() first.');
  }
  return globalLogger;
}

// Convenience function for verbose logging
export function logVerbose(message: string): void {
  if (globalLogger) {
    globalLogger.verbose(message);
  }
}

export { Logger };
