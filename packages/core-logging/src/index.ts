import pino, { Logger as PinoLoggerInstance } from "pino";

export interface ILogger {
  info(msg: string, meta?: Record<string, unknown>): void;
  warn(msg: string, meta?: Record<string, unknown>): void;
  error(msg: string, meta?: Record<string, unknown>): void;
}

export const LOGGER = Symbol("LOGGER");

export interface PinoLoggerOptions {
  level?: string;
}

export class PinoLogger implements ILogger {
  private readonly logger: PinoLoggerInstance;

  constructor(options: PinoLoggerOptions = {}) {
    this.logger = pino({ level: options.level ?? process.env.LOG_LEVEL ?? "info" });
  }

  info(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.info(meta, msg);
  }

  warn(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.warn(meta, msg);
  }

  error(msg: string, meta: Record<string, unknown> = {}): void {
    this.logger.error(meta, msg);
  }
}

export class NoopLogger implements ILogger {
  info(): void {}
  warn(): void {}
  error(): void {}
}
