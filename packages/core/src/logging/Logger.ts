/**
 * Logger - leveled logging for the Roster server and CLI
 *
 * Levels, least to most verbose: silent, errors, warnings, info, debug.
 * Every method takes a message and an optional structured context that is
 * appended as JSON.
 *
 *   const logger = createLogger('info', { logFile: '.roster/server.log' });
 *   logger.info('Server listening', { port: 4000 });
 */

import { createWriteStream, mkdirSync, type WriteStream } from 'fs';
import { dirname, resolve } from 'path';

export type LogLevel = 'silent' | 'errors' | 'warnings' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['silent', 'errors', 'warnings', 'info', 'debug'];

export type LogContext = Record<string, unknown>;

export interface Logger {
  error(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  debug(message: string, context?: LogContext): void;
  trace(message: string, context?: LogContext): void;
}

type LogMethod = keyof Logger;

/** Minimum level index at which each method writes */
const METHOD_THRESHOLD: Record<LogMethod, number> = {
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 4,
};

const METHOD_LABEL: Record<LogMethod, string> = {
  error: 'ERROR',
  warn: 'WARN',
  info: 'INFO',
  debug: 'DEBUG',
  trace: 'TRACE',
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

/**
 * JSON.stringify that turns Errors into {name, message, stack} and
 * repeated objects into "[Circular]".
 */
function stringifyContext(context: LogContext): string {
  const seen = new WeakSet<object>();
  return JSON.stringify(context, (_key, value: unknown) => {
    if (value instanceof Error) {
      return { name: value.name, message: value.message, stack: value.stack };
    }
    if (typeof value === 'object' && value !== null) {
      if (seen.has(value)) return '[Circular]';
      seen.add(value);
    }
    return value;
  });
}

function formatLine(label: string, message: string, context?: LogContext): string {
  const line = `[${label}] ${message}`;
  if (!context || Object.keys(context).length === 0) {
    return line;
  }
  try {
    return `${line} ${stringifyContext(context)}`;
  } catch {
    return `${line} [context serialization failed]`;
  }
}

/**
 * Shared level filtering; subclasses only decide where a line goes.
 */
abstract class LeveledLogger implements Logger {
  private readonly priority: number;

  constructor(readonly level: LogLevel) {
    this.priority = LOG_LEVELS.indexOf(level);
  }

  protected abstract write(method: LogMethod, line: string): void;

  private log(method: LogMethod, message: string, context?: LogContext): void {
    if (this.priority < METHOD_THRESHOLD[method]) return;
    this.write(method, formatLine(METHOD_LABEL[method], message, context));
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  trace(message: string, context?: LogContext): void {
    this.log('trace', message, context);
  }
}

/**
 * Writes to console.error / warn / info / debug by method.
 */
export class ConsoleLogger extends LeveledLogger {
  constructor(level: LogLevel = 'info') {
    super(level);
  }

  protected write(method: LogMethod, line: string): void {
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
      default:
        console.debug(line);
    }
  }
}

/**
 * Appends ISO-timestamped lines to a file. The file is truncated when the
 * logger is created; parent directories are created as needed.
 */
export class FileLogger extends LeveledLogger {
  readonly filePath: string;
  private readonly stream: WriteStream;

  constructor(level: LogLevel, filePath: string) {
    super(level);
    this.filePath = resolve(filePath);
    mkdirSync(dirname(this.filePath), { recursive: true });
    this.stream = createWriteStream(this.filePath, { flags: 'w' });
    this.stream.on('error', (err) => {
      console.error(formatLine('ERROR', 'Log file write failed', { filePath: this.filePath, error: err }));
    });
  }

  protected write(_method: LogMethod, line: string): void {
    this.stream.write(`${new Date().toISOString()} ${line}\n`);
  }

  /** Flush and close the file. */
  close(): Promise<void> {
    return new Promise((done) => {
      this.stream.end(done);
    });
  }
}

/**
 * Fans each call out to several loggers, each filtering by its own level.
 */
export class MultiLogger implements Logger {
  constructor(private readonly loggers: Logger[]) {}

  error(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.error(message, context);
  }

  warn(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    for (const logger of this.loggers) logger.debug(message, context);
  }

  trace(message: string, context?: LogContext): void {
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
 * Create a console logger, or a console + file logger when `logFile` is set.
 * The file always records at 'debug' so it keeps what the console drops.
 */
export function createLogger(level: LogLevel, options: { logFile?: string } = {}): Logger {
  const consoleLogger = new ConsoleLogger(level);
  if (!options.logFile) {
    return consoleLogger;
  }
  return new MultiLogger([consoleLogger, new FileLogger('debug', options.logFile)]);
}

/**
 * Close any file outputs behind a logger returned by createLogger().
 */
export async function closeLogger(logger: Logger): Promise<void> {
  if (logger instanceof MultiLogger || logger instanceof FileLogger) {
    await logger.close();
  }
}
