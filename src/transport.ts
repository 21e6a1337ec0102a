import {
  BLE_NOTIFICATION_TIMEOUT_MS,
  BLE_READ_TIMEOUT_MS,
  BLE_WRITE_TIMEOUT_MS,
  GATT_BOARD_SERVICE,
  type TimingProfile,
} from './constants';
import {
  AbortError,
  ConnectFailureError,
  delay,
  raceWithAbort,
  ServiceNotFoundError,
  withTimeout,
} from './errors';
import { describeError, getLogger, type Logger } from './logger';
import type {
  BoardCharacteristic,
  BoardLink,
  BoardService,
  BoardTransport,
} from './types';

/**
 * Races an operation against an optional abort signal.
 */
function abortable<T>(promise: Promise<T>, signal?: AbortSignal): Promise<T> {
  return signal ? raceWithAbort(promise, signal) : promise;
}

/**
 * Reads a characteristic with a timeout.
 * Returns a copy so later notifications cannot mutate the result.
 */
export async function readWithTimeout(
  char: BoardCharacteristic,
  timeoutMs: number = BLE_READ_TIMEOUT_MS,
): Promise<Uint8Array> {
  const value = await withTimeout(char.readValue(), timeoutMs, 'BLE read');
  return Uint8Array.from(value);
}

/**
 * Writes data to a characteristic with a timeout.
 * BLE writes can hang indefinitely, so every write goes through here.
 * @throws Error if data is empty
 */
export async function writeWithTimeout(
  char: BoardCharacteristic,
  data: Uint8Array,
  timeoutMs: number = BLE_WRITE_TIMEOUT_MS,
): Promise<void> {
  if (data.byteLength === 0) {
    throw new Error(
      'Empty data: cannot write zero bytes to BLE characteristic',
    );
  }
  await withTimeout(char.writeValueWithResponse(data), timeoutMs, 'BLE write');
}

export interface ReadWithRetryOptions {
  attempts: number;
  timeoutMs?: number;
  /** Linear backoff step: after failed attempt n, wait n * backoffMs */
  backoffMs: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Reads a characteristic with bounded retries. Each attempt is time-boxed,
 * and an empty value counts as a failed attempt.
 * @throws The last attempt's error once attempts are exhausted
 */
export async function readWithRetry(
  char: BoardCharacteristic,
  options: ReadWithRetryOptions,
): Promise<Uint8Array> {
  const { attempts, timeoutMs, backoffMs, signal } = options;
  const logger = options.logger ?? getLogger();
  let lastError: unknown = new Error('No read attempted');

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const value = await abortable(readWithTimeout(char, timeoutMs), signal);
      if (value.length > 0) {
        return value;
      }
      lastError = new Error(`Empty value from ${char.uuid}`);
    } catch (e) {
      if (e instanceof AbortError) throw e;
      lastError = e;
    }
    logger.debug?.(
      `[Transport] Read attempt ${attempt}/${attempts} on ${char.uuid} failed:`,
      describeError(lastError),
    );
    if (attempt < attempts) {
      await delay(backoffMs * attempt, signal);
    }
  }
  throw lastError;
}

/**
 * Releases a link that is established after its attempt timed out or was
 * aborted. A connect that rejected on its own only gets logged.
 */
function releaseLateLink(pending: Promise<BoardLink>, logger: Logger): void {
  pending
    .then((link) => link.disconnect())
    .catch((e: unknown) => {
      logger.debug?.(
        '[Transport] Abandoned connect settled:',
        describeError(e),
      );
    });
}

/**
 * Connects with bounded retries and linear backoff per the timing profile.
 * @throws ConnectFailureError once every attempt has failed
 * @throws AbortError if the signal fires first
 */
export async function connectWithRetry(
  transport: BoardTransport,
  deviceId: string,
  profile: TimingProfile,
  options: { signal?: AbortSignal; logger?: Logger } = {},
): Promise<BoardLink> {
  const { signal } = options;
  const logger = options.logger ?? getLogger();
  let lastError: unknown = new Error('No connect attempted');

  for (let attempt = 1; attempt <= profile.connectAttempts; attempt++) {
    const pending = transport.connect(deviceId, profile.connectTimeoutMs);
    try {
      return await abortable(
        withTimeout(pending, profile.connectTimeoutMs, 'BLE connect'),
        signal,
      );
    } catch (e) {
      releaseLateLink(pending, logger);
      if (e instanceof AbortError) throw e;
      lastError = e;
      logger.warn(
        `[Transport] Connection attempt ${attempt}/${profile.connectAttempts} failed:`,
        describeError(e),
      );
    }
    if (attempt < profile.connectAttempts) {
      await delay(profile.connectBackoffMs * attempt, signal);
    }
  }
  throw new ConnectFailureError(profile.connectAttempts, lastError);
}

/**
 * Discovers services and returns the board service.
 * @throws ServiceNotFoundError if the board service is absent, or discovery
 *   failed or took longer than `timeoutMs`
 */
export async function discoverBoardService(
  link: BoardLink,
  timeoutMs: number,
  signal?: AbortSignal,
): Promise<BoardService> {
  let services: BoardService[];
  try {
    services = await abortable(
      withTimeout(link.discoverServices(), timeoutMs, 'Service discovery'),
      signal,
    );
  } catch (e) {
    if (e instanceof AbortError) throw e;
    throw new ServiceNotFoundError([], e);
  }
  const boardService = services.find(
    (s) => s.uuid.toLowerCase() === GATT_BOARD_SERVICE,
  );
  if (!boardService) {
    throw new ServiceNotFoundError(services.map((s) => s.uuid));
  }
  return boardService;
}

/**
 * Options for starting notifications.
 */
export interface StartNotificationsOptions {
  /** Timeout for starting notifications in milliseconds */
  timeoutMs?: number;
  /** Logger for error reporting. Falls back to global logger if not provided. */
  logger?: Logger;
}

/**
 * Starts notifications on a characteristic with timeout protection.
 * Returns a cleanup function to stop notifications and remove the listener.
 *
 * @throws TimeoutError if notification setup takes too long
 */
export async function startNotifications(
  char: BoardCharacteristic,
  onData: (data: Uint8Array) => void,
  options: StartNotificationsOptions = {},
): Promise<() => void> {
  const timeoutMs = options.timeoutMs ?? BLE_NOTIFICATION_TIMEOUT_MS;
  const logger = options.logger ?? getLogger();

  await withTimeout(
    char.startNotifications(),
    timeoutMs,
    'BLE notification setup',
  );

  const removeListener = char.onValueChanged((value) => {
    if (value.byteLength > 0) {
      onData(value);
    }
  });

  return () => {
    removeListener();
    char.stopNotifications().catch((e: unknown) => {
      logger.warn(
        `[Transport] Error stopping notifications on ${char.uuid}:`,
        describeError(e),
      );
    });
  };
}
