const PREFIX = "[HalPay SDK]";

/**
 * Logging port used by the client
 * Pass your own implementation through `HalPayClientConfig.logger`
 */
export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

export interface ConsoleLoggerOptions {
  /**
   * Print debug messages
   * @default false
   */
  debug?: boolean;
}

export class ConsoleLogger implements Logger {
  private readonly debugEnabled: boolean;

  constructor(options: ConsoleLoggerOptions = {}) {
    this.debugEnabled = options.debug ?? false;
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (!this.debugEnabled) {
      return;
    }
    this.write(console.log, `[DEBUG] ${message}`, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.write(console.log, message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.write(console.warn, message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.write(console.error, message, data);
  }

  private write(
    sink: (...args: unknown[]) => void,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (data) {
      sink(`${PREFIX} ${message}`, data);
    } else {
      sink(`${PREFIX} ${message}`);
    }
  }
}

/**
 * Logger that drops everything
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
