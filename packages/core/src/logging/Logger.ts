/**
 * Logger - leveled logging for the migration pipeline
 *
 * Every stage logs through the Logger carried by the engine context, so the
 * caller decides whether output goes to the console, to a file, or nowhere.
 *
 * Usage:
 *   const logger = createLogger('info');
 *   logger.info('Scope rewritten', { file: 'src/billing.ts', scope: 'Billing' });
 *
 *   const logger = createLogger('warnings', { logFile: '.rewright/run.log' });
 */

import { createWriteStream, writeFileSync, mkdirSync, existsSync, statSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';
import type { Logger, LogLevel } from '@rewright/types';

export type { Logger, LogLevel };

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
  silent: 0,
  errors: 1,
  warnings: 2,
  info: 3,
  debug: 4,
};

type LogMethod = keyof Logger;

const METHOD_PRIORITY: Record<LogMethod, number> = {
  error: LOG_LEVEL_PRIORITY.errors,
  warn: LOG_LEVEL_PRIORITY.warnings,
  info: LOG_LEVEL_PRIORITY.info,
  debug: LOG_LEVEL_PRIORITY.debug,
  trace: LOG_LEVEL_PRIORITY.debug,
};

const METHOD_LABEL: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

/**
 * JSON.stringify that replaces repeated object references with '[Circular]'
 */
function safeStringify(obj: unknown): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(obj, (_key, value: unknown) => {
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) {
        return '[Circular]';
      }
      seen.add(value);
    }
    return value;
  });
}

export function formatMessage(message: string, context?: Record<string, unknown>): string {
  if (!context || Object.keys(context).length === 0) {
    return message;
  }
  try {
    return `${message} ${safeStringify(context)}`;
  } catch {
    return `${message} [context serialization failed]`;
  }
}

/**
 * Base for loggers that drop messages below a level threshold.
 */
abstract class ThresholdLogger implements Logger {
  private readonly priority: number;

  protected constructor(level: LogLevel) {
    this.priority = LOG_LEVEL_PRIORITY[level];
  }

  protected abstract write(method: LogMethod, message: string, context?: Record<string, unknown>): void;

  private emit(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    if (this.priority < METHOD_PRIORITY[method]) return;
    this.write(method, message, context);
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.emit('error', message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.emit('warn', message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.emit('info', message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.emit('debug', message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    this.emit('trace', message, context);
  }
}

/**
 * Console-based Logger. Methods below the threshold are no-ops.
 */
export class ConsoleLogger extends ThresholdLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    const line = formatMessage(`[${METHOD_LABEL[method]}] ${message}`, context);
    switch (method) {
      case 'error':
        console.error(line);
        break;
      case 'warn':
        console.warn(line);
        break;
      case 'info':
        console.info(line);
        break;
      case 'debug':
      case 'trace':
        console.debug(line);
        break;
    }
  }
}

/**
 * File-based Logger.
 *
 * Truncates the file on construction and appends timestamped lines through a
 * write stream. Parent directories are created; a path naming a directory throws.
 */
export class FileLogger extends ThresholdLogger {
  private readonly stream: WriteStream;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    const resolvedPath = resolve(filePath);
    mkdirSync(dirname(resolvedPath), { recursive: true });

    if (existsSync(resolvedPath) && statSync(resolvedPath).isDirectory()) {
      throw new Error(`Cannot write log file: '${resolvedPath}' is a directory`);
    }

    writeFileSync(resolvedPath, '');
    this.stream = createWriteStream(resolvedPath, { flags: 'a' });
    this.stream.on('error', (err: Error) => {
      console.error(`[ERROR] Log file write failed: ${err.message}`);
    });
  }

  protected write(method: LogMethod, message: string, context?: Record<string, unknown>): void {
    const timestamp = new Date().toISOString();
    this.stream.write(formatMessage(`${timestamp} [${METHOD_LABEL[method]}] ${message}`, context) + '\n');
  }

  /** Flush and close the write stream. */
  close(): Promise<void> {
    return new Promise((done) => {
      this.stream.end(done);
    });
  }
}

/**
 * Fans each message out to several loggers; each applies its own threshold.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: Logger[]) {}

  error(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: Record<string, unknown>): void {
    for (const logger of this.loggers) logger.trace(message, context);
  }

  async close(): Promise<void> {
    for (const logger of this.loggers) {
      if (logger instanceof FileLogger) {
        await logger.close();
      }
    }
  }
}

/**
 * Create a Logger at the given level.
 *
 * With logFile, console output keeps the requested level while the file
 * captures everything at 'debug'.
 */
export function createLogger(level: LogLevel, options?: { logFile?: string }): Logger {
  const consoleLogger = new ConsoleLogger(level);

  if (options?.logFile) {
    return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
  }

  return consoleLogger;
}
