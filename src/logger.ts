/**
 * Audit logging
 *
 * The runner and file processor log through the `Logger` port; the codec
 * never does. The CLI opens a `PinoLogger` on the log file when the process
 * starts and closes it on the way out, which flushes pending lines.
 */

import pino, { type Logger as PinoBase } from 'pino';
import type { LogLevelName, ToolConfig } from './config';
import { IOError } from './errors';

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  /** Logger that adds `bindings` to every line. Closing a child does nothing. */
  child(bindings: LogMeta): Logger;
  /** Flush and release the sink. */
  close(): void;
}

type PinoDestination = ReturnType<typeof pino.destination>;

export class PinoLogger implements Logger {
  constructor(
    protected readonly logger: PinoBase,
    private readonly destination?: PinoDestination,
  ) {}

  debug(message: string, meta: LogMeta = {}): void {
    this.logger.debug(meta, message);
  }

  info(message: string, meta: LogMeta = {}): void {
    this.logger.info(meta, message);
  }

  warn(message: string, meta: LogMeta = {}): void {
    this.logger.warn(meta, message);
  }

  error(message: string, meta: LogMeta = {}): void {
    this.logger.error(meta, message);
  }

  child(bindings: LogMeta): Logger {
    return new PinoLogger(this.logger.child(bindings));
  }

  close(): void {
    if (!this.destination) return;
    this.destination.flushSync();
    this.destination.end();
  }
}

export class NullLogger implements Logger {
  debug(_message: string, _meta?: LogMeta): void {}

  info(_message: string, _meta?: LogMeta): void {}

  warn(_message: string, _meta?: LogMeta): void {}

  error(_message: string, _meta?: LogMeta): void {}

  child(_bindings: LogMeta): Logger {
    return this;
  }

  close(): void {}
}

export function pinoOptions(level: LogLevelName): pino.LoggerOptions {
  return {
    level,
    base: { app: 'byteveil', pid: process.pid },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: { err: pino.stdSerializers.errWithCause },
  };
}

/** Append JSON lines to `options.file`, creating parent directories as needed. */
export function createFileLogger(options: ToolConfig['log']): Logger {
  let destination: ReturnType<typeof pino.destination>;
  try {
    destination = pino.destination({ dest: options.file, sync: true, mkdir: true, append: true });
  } catch (err) {
    throw new IOError(`Cannot open log file ${options.file}`, { cause: err, path: options.file });
  }
  return new PinoLogger(pino(pinoOptions(options.level), destination), destination);
}
