import type { Logger, LoggerMeta } from './types';

/**
 * Console logger implementation.
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly prefix?: string) {}

  debug(message: string, meta?: LoggerMeta): void {
    console.debug(this.format(message), meta ?? {});
  }
  info(message: string, meta?: LoggerMeta): void {
    console.info(this.format(message), meta ?? {});
  }
  warn(message: string, meta?: LoggerMeta): void {
    console.warn(this.format(message), meta ?? {});
  }
  error(message: string, meta?: LoggerMeta): void {
    console.error(this.format(message), meta ?? {});
  }

  private format(message: string): string {
    return this.prefix ? `[${this.prefix}] ${message}` : message;
  }
}

export class NoopLogger implements Logger {
  // eslint-disable-next-line @typescript-eslint/no-empty-function
  debug(): void {}

  // eslint-disable-next-line @typescript-eslint/no-empty-function
  info(): void {}

  // eslint-disable-next-line @typescript-eslint/no-empty-function
  warn(): void {}

  // eslint-disable-next-line @typescript-eslint/no-empty-function
  error(): void {}
}
