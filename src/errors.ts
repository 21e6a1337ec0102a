/**
 * Custom error class for timeout operations
 */
export class TimeoutError extends Error {
  constructor(
    public readonly operation: string,
    public readonly timeout: number,
  ) {
    super(`${operation} timed out after ${timeout}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Error thrown when an operation is cancelled through an AbortSignal.
 */
export class AbortError extends Error {
  constructor(message = 'Operation aborted') {
    super(message);
    this.name = 'AbortError';
  }
}

/**
 * Error thrown when a connection attempt is cancelled by `disconnect()`.
 */
export class ConnectionAbortedError extends Error {
  constructor() {
    super('Connection aborted');
    this.name = 'ConnectionAbortedError';
  }
}

/**
 * Error thrown when a characteristic payload is too short for its layout.
 */
export class TelemetryDecodeError extends Error {
  constructor(
    public readonly uuid: string,
    public readonly expectedLength: number,
    public readonly actualLength: number,
  ) {
    super(
      `Payload for ${uuid} has ${actualLength} bytes, expected at least ${expectedLength}`,
    );
    this.name = 'TelemetryDecodeError';
  }
}

/**
 * Kinds of failure that escalate to the connection state machine.
 */
export type BoardErrorKind =
  | 'ScanFailure'
  | 'ConnectFailure'
  | 'ServiceNotFound'
  | 'CharacteristicsMissing'
  | 'FirmwareReadFailure'
  | 'ChallengeTimeout'
  | 'InvalidChallengeSignature'
  | 'AllStrategiesExhausted'
  | 'HeartbeatFailure'
  | 'WatchdogDisconnect';

/**
 * Base class of every escalated failure. `kind` is stable and suitable for
 * programmatic handling; `message` is for humans.
 */
export class BoardError extends Error {
  constructor(
    public readonly kind: BoardErrorKind,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BoardError';
  }
}

export class ScanFailureError extends BoardError {
  constructor(cause: unknown) {
    super('ScanFailure', `Scan failed: ${normalizeError(cause).message}`, {
      cause,
    });
    this.name = 'ScanFailureError';
  }
}

export class ConnectFailureError extends BoardError {
  constructor(
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(
      'ConnectFailure',
      `Connect failed after ${attempts} attempts: ${normalizeError(cause).message}`,
      { cause },
    );
    this.name = 'ConnectFailureError';
  }
}

export class ServiceNotFoundError extends BoardError {
  /**
   * @param cause - Set when discovery itself failed, e.g. timed out
   */
  constructor(
    public readonly availableServices: string[],
    cause?: unknown,
  ) {
    super(
      'ServiceNotFound',
      cause === undefined
        ? `Board service not found. Available services: ${
            availableServices.join(', ') || 'none'
          }`
        : `Board service not found: ${normalizeError(cause).message}`,
      { cause },
    );
    this.name = 'ServiceNotFoundError';
  }
}

export class CharacteristicsMissingError extends BoardError {
  constructor(public readonly missing: string[]) {
    super(
      'CharacteristicsMissing',
      `Required characteristics missing: ${missing.join(', ')}`,
    );
    this.name = 'CharacteristicsMissingError';
  }
}

export class FirmwareReadFailureError extends BoardError {
  constructor(
    public readonly attempts: number,
    cause: unknown,
  ) {
    super(
      'FirmwareReadFailure',
      `Firmware revision read failed after ${attempts} attempts: ${
        normalizeError(cause).message
      }`,
      { cause },
    );
    this.name = 'FirmwareReadFailureError';
  }
}

export class ChallengeTimeoutError extends BoardError {
  constructor(public readonly timeoutMs: number) {
    super(
      'ChallengeTimeout',
      `Challenge timeout - no response from board within ${timeoutMs}ms`,
    );
    this.name = 'ChallengeTimeoutError';
  }
}

export class InvalidChallengeSignatureError extends BoardError {
  constructor(public readonly received: number[]) {
    super(
      'InvalidChallengeSignature',
      `Invalid challenge signature: [${received.join(', ')}]`,
    );
    this.name = 'InvalidChallengeSignatureError';
  }
}

/**
 * Outcome of one unlock strategy, as recorded in diagnostics.
 */
export interface StrategyAttempt {
  strategy: string;
  outcome: 'unlocked' | 'primed' | 'failed';
  /** Error message when the strategy failed */
  error?: string;
}

export class AllStrategiesExhaustedError extends BoardError {
  constructor(public readonly attempts: StrategyAttempt[]) {
    super(
      'AllStrategiesExhausted',
      `All unlock strategies exhausted: ${attempts
        .map((a) => `${a.strategy}=${a.outcome}`)
        .join(', ')}`,
    );
    this.name = 'AllStrategiesExhaustedError';
  }
}

export class HeartbeatFailureError extends BoardError {
  constructor(
    public readonly consecutiveFailures: number,
    cause: unknown,
  ) {
    super(
      'HeartbeatFailure',
      `Connection lost - heartbeat failed: ${normalizeError(cause).message}`,
      { cause },
    );
    this.name = 'HeartbeatFailureError';
  }
}

export class WatchdogDisconnectError extends BoardError {
  constructor(reason = 'device disconnected') {
    super('WatchdogDisconnect', `Connection lost - ${reason}`);
    this.name = 'WatchdogDisconnectError';
  }
}

/**
 * Normalizes any thrown value into an Error instance.
 * Ensures consistent error handling throughout the codebase.
 */
export function normalizeError(e: unknown): Error {
  if (e instanceof Error) {
    return e;
  }

  if (e === null) {
    return new Error('null');
  }

  if (e === undefined) {
    return new Error('undefined');
  }

  if (typeof e === 'string') {
    return new Error(e);
  }

  if (typeof e === 'object') {
    try {
      return new Error(JSON.stringify(e));
    } catch {
      // Circular reference or other JSON error
      return new Error(String(e));
    }
  }

  return new Error(String(e));
}

/**
 * Wraps a promise with a timeout.
 * If the promise doesn't resolve/reject within the specified time,
 * rejects with a TimeoutError.
 *
 * **Important:** This does NOT cancel the underlying operation.
 * The original promise continues running in the background even after
 * timeout. For BLE operations, this means a write may still complete
 * after the timeout rejects.
 *
 * @param label - Descriptive label for the operation (used in error message)
 * @throws {TimeoutError} If the operation times out
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  label: string,
): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const timeoutId = setTimeout(() => {
      reject(new TimeoutError(label, ms));
    }, ms);

    promise
      .then((value) => {
        clearTimeout(timeoutId);
        resolve(value);
      })
      .catch((error: unknown) => {
        clearTimeout(timeoutId);
        reject(error);
      });
  });
}

/**
 * Races a promise against an abort signal.
 * Rejects with AbortError as soon as the signal fires; the abort listener
 * is removed once the promise settles.
 */
export function raceWithAbort<T>(
  promise: Promise<T>,
  signal: AbortSignal,
): Promise<T> {
  if (signal.aborted) {
    return Promise.reject(new AbortError());
  }

  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => {
      reject(new AbortError());
    };
    signal.addEventListener('abort', onAbort, { once: true });

    promise
      .then((value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      })
      .catch((error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      });
  });
}

/**
 * Resolves after `ms`, or rejects with AbortError when the signal fires first.
 */
export function delay(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new AbortError());
  }

  return new Promise<void>((resolve, reject) => {
    const onAbort = (): void => {
      clearTimeout(timeoutId);
      reject(new AbortError());
    };
    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
