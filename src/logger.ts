/**
 * Logger interface for customizable logging.
 * Lets host applications route board diagnostics into their own logging
 * infrastructure. Messages start with a bracketed component tag such as
 * `[BoardLink]` or `[Auth]`.
 */
export interface Logger {
  /**
   * Verbose protocol tracing (handshake progress, subscriptions, timers).
   * Optional - if not provided, debug messages are dropped.
   */
  debug?(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

const noop = () => {};

const defaultLogger: Logger = {
  debug: noop,
  warn: (msg, ...args) => console.warn(msg, ...args),
  error: (msg, ...args) => console.error(msg, ...args),
};

let currentLogger: Logger = defaultLogger;

export function getLogger(): Logger {
  return currentLogger;
}

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function resetLogger(): void {
  currentLogger = defaultLogger;
}

export function enableDebugLogging(): void {
  const current = currentLogger;
  currentLogger = {
    ...current,
    debug: (msg, ...args) => console.debug(msg, ...args),
  };
}

/**
 * Formats a caught value for a log line.
 */
export function describeError(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
