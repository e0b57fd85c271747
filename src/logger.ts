/**
 * Reconciler Logging
 *
 * Every component receives a `Logger` at construction; nothing logs through
 * module-level state. The default implementation writes pino JSON lines to
 * stderr so that command output on stdout stays machine-readable.
 */

import pino from "pino";

export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  name?: string;
  /** pino destination; defaults to stderr */
  destination?: pino.DestinationStream;
};

class PinoLogger implements Logger {
  constructor(private readonly base: pino.Logger) {}

  debug(message: string, meta?: LogMeta): void {
    if (meta) this.base.debug(meta, message);
    else this.base.debug(message);
  }

  info(message: string, meta?: LogMeta): void {
    if (meta) this.base.info(meta, message);
    else this.base.info(message);
  }

  warn(message: string, meta?: LogMeta): void {
    if (meta) this.base.warn(meta, message);
    else this.base.warn(message);
  }

  error(message: string, meta?: LogMeta): void {
    if (meta) this.base.error(meta, message);
    else this.base.error(message);
  }

  child(bindings: LogMeta): Logger {
    return new PinoLogger(this.base.child(bindings));
  }
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const base = pino(
    {
      name: options.name ?? "lifecycle-reconciler",
      level: options.level ?? "info",
    },
    options.destination ?? pino.destination(2),
  );
  return new PinoLogger(base);
}

export const silentLogger: Logger = new PinoLogger(pino({ level: "silent" }));
