import type { Logger, LoggerMeta } from './types';

/**
 * Logs to console.debug, console.info, console.warn, and console.error.
 */
export class ConsoleLogger implements Logger {
  debug(message: string, meta?: LoggerMeta): void {
    this.write(console.debug, message, meta);
  }
  info(message: string, meta?: LoggerMeta): void {
    this.write(console.info, message, meta);
  }
  warn(message: string, meta?: LoggerMeta): void {
    this.write(console.warn, message, meta);
  }
  error(message: string, meta?: LoggerMeta): void {
    this.write(console.error, message, meta);
  }

  private write(fn: (...args: unknown[]) => void, message: string, meta?: LoggerMeta): void {
    if (meta) {
      fn(message, meta);
    } else {
      fn(message);
    }
  }
}

export const noopLogger: Logger = {
  debug: () => {
    /* no-op */
  },
  info: () => {
    /* no-op */
  },
  warn: () => {
    /* no-op */
  },
  error: () => {
    /* no-op */
  },
};
