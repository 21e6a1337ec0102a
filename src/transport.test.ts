import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CLASSIC_TIMING, GATT_BOARD_SERVICE } from './constants';
import {
  AbortError,
  ConnectFailureError,
  ServiceNotFoundError,
  TimeoutError,
} from './errors';
import {
  createDeferred,
  createMockCharacteristic,
  createMockLink,
  createMockLogger,
  createMockService,
  createMockTransport,
  flushPromises,
} from './test-utils';
import * as transport from './transport';
import type { BoardLink } from './types';

describe('connectWithRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('returns the link from the first successful attempt', async () => {
    const link = createMockLink();
    const mock = createMockTransport({ link });

    const result = await transport.connectWithRetry(
      mock,
      'board-1',
      CLASSIC_TIMING,
      { logger: createMockLogger() },
    );

    expect(result).toBe(link);
    expect(mock.getConnectCallCount()).toBe(1);
    expect(mock.getLastConnectTimeout()).toBe(CLASSIC_TIMING.connectTimeoutMs);
  });

  it('retries with linear backoff', async () => {
    const link = createMockLink();
    const mock = createMockTransport({ link, connectFailures: 2 });
    const logger = createMockLogger();

    const promise = transport.connectWithRetry(mock, 'board-1', CLASSIC_TIMING, {
      logger,
    });

    await vi.advanceTimersByTimeAsync(499);
    expect(mock.getConnectCallCount()).toBe(1);
    await vi.advanceTimersByTimeAsync(1001);

    await expect(promise).resolves.toBe(link);
    expect(mock.getConnectCallCount()).toBe(3);
    expect(logger.warn).toHaveBeenCalledWith(
      '[Transport] Connection attempt 1/3 failed:',
      'Connect failed',
    );
  });

  it('gives up with ConnectFailureError after every attempt fails', async () => {
    const mock = createMockTransport({ connectFailures: 3 });

    const promise = transport.connectWithRetry(mock, 'board-1', CLASSIC_TIMING, {
      logger: createMockLogger(),
    });
    const assertion = expect(promise).rejects.toThrow(
      'Connect failed after 3 attempts: Connect failed',
    );
    await vi.advanceTimersByTimeAsync(1500);

    await assertion;
    await expect(promise).rejects.toBeInstanceOf(ConnectFailureError);
    expect(mock.getConnectCallCount()).toBe(3);
  });

  it('time-boxes each attempt and releases a link that arrives late', async () => {
    const late = createDeferred<BoardLink>();
    const link = createMockLink();
    const mock = createMockTransport();
    mock.setConnectHandler(() => late.promise);
    const profile = { ...CLASSIC_TIMING, connectAttempts: 1, connectTimeoutMs: 100 };

    const promise = transport.connectWithRetry(mock, 'board-1', profile, {
      logger: createMockLogger(),
    });
    const assertion = expect(promise).rejects.toThrow(
      'Connect failed after 1 attempts: BLE connect timed out after 100ms',
    );
    await vi.advanceTimersByTimeAsync(100);
    await assertion;

    vi.useRealTimers();
    late.resolve(link);
    await flushPromises();

    expect(link.wasDisconnectCalled()).toBe(true);
  });

  it('stops retrying once aborted', async () => {
    const mock = createMockTransport({ connectFailures: 3 });
    const controller = new AbortController();

    const promise = transport.connectWithRetry(mock, 'board-1', CLASSIC_TIMING, {
      signal: controller.signal,
      logger: createMockLogger(),
    });
    const assertion = expect(promise).rejects.toBeInstanceOf(AbortError);
    await vi.advanceTimersByTimeAsync(100);
    controller.abort();

    await assertion;
    await vi.advanceTimersByTimeAsync(5000);
    expect(mock.getConnectCallCount()).toBe(1);
  });
});

describe('readWithTimeout', () => {
  it('returns a copy of the value', async () => {
    const value = Uint8Array.of(0x10, 0x26);
    const char = createMockCharacteristic({ value });

    const result = await transport.readWithTimeout(char);

    expect(result).toEqual(value);
    expect(result).not.toBe(value);
  });

  it('propagates read errors', async () => {
    const readError = new Error('GATT busy');
    const char = createMockCharacteristic({
      readShouldFail: true,
      readFailError: readError,
    });

    await expect(transport.readWithTimeout(char)).rejects.toBe(readError);
  });
});

describe('readWithRetry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('treats empty values as failures and backs off linearly', async () => {
    const char = createMockCharacteristic({ value: Uint8Array.of(0x10, 0x26) });
    char.queueReads(new Error('GATT busy'), new Uint8Array(0));
    const logger = createMockLogger();

    const promise = transport.readWithRetry(char, {
      attempts: 3,
      backoffMs: 200,
      logger,
    });

    await vi.advanceTimersByTimeAsync(600);

    await expect(promise).resolves.toEqual(Uint8Array.of(0x10, 0x26));
    expect(char.getReadCount()).toBe(3);
    expect(logger.debug).toHaveBeenCalledTimes(2);
  });

  it('throws the last error once attempts run out', async () => {
    const char = createMockCharacteristic({ readShouldFail: true });

    const promise = transport.readWithRetry(char, {
      attempts: 2,
      backoffMs: 200,
      logger: createMockLogger(),
    });
    const assertion = expect(promise).rejects.toThrow('Read failed');
    await vi.advanceTimersByTimeAsync(200);

    await assertion;
    expect(char.getReadCount()).toBe(2);
  });

  it('rejects with AbortError when aborted during backoff', async () => {
    const char = createMockCharacteristic({ readShouldFail: true });
    const controller = new AbortController();

    const promise = transport.readWithRetry(char, {
      attempts: 5,
      backoffMs: 200,
      signal: controller.signal,
      logger: createMockLogger(),
    });
    const assertion = expect(promise).rejects.toBeInstanceOf(AbortError);
    await vi.advanceTimersByTimeAsync(50);
    controller.abort();

    await assertion;
    expect(char.getReadCount()).toBe(1);
  });
});

describe('writeWithTimeout', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('resolves when write completes before timeout', async () => {
    const char = createMockCharacteristic({ properties: { write: true } });

    const promise = transport.writeWithTimeout(
      char,
      new Uint8Array([0x01]),
      1000,
    );
    await vi.runAllTimersAsync();

    await expect(promise).resolves.toBeUndefined();
    expect(char.getWrittenValues()).toEqual([Uint8Array.of(0x01)]);
  });

  it('rejects with TimeoutError when write exceeds timeout', async () => {
    const char = createMockCharacteristic({
      properties: { write: true },
      writeDelay: 2000,
    });

    const promise = transport.writeWithTimeout(
      char,
      new Uint8Array([0x01]),
      100,
    );
    const assertion = expect(promise).rejects.toBeInstanceOf(TimeoutError);

    await vi.advanceTimersByTimeAsync(100);

    await assertion;
    await expect(promise).rejects.toThrow('BLE write');
  });

  it('refuses to write zero bytes', async () => {
    const char = createMockCharacteristic({ properties: { write: true } });

    await expect(
      transport.writeWithTimeout(char, new Uint8Array(0)),
    ).rejects.toThrow('Empty data');
    expect(char.getWrittenValues()).toHaveLength(0);
  });
});

describe('discoverBoardService', () => {
  it('returns the board service regardless of UUID case', async () => {
    const boardService = createMockService({
      uuid: GATT_BOARD_SERVICE.toUpperCase(),
    });
    const link = createMockLink({
      services: [
        createMockService({ uuid: '00001800-0000-1000-8000-00805f9b34fb' }),
        boardService,
      ],
    });

    await expect(transport.discoverBoardService(link, 1000)).resolves.toBe(
      boardService,
    );
  });

  it('lists the services found when the board service is absent', async () => {
    const link = createMockLink({
      services: [
        createMockService({ uuid: '00001800-0000-1000-8000-00805f9b34fb' }),
      ],
    });

    await expect(transport.discoverBoardService(link, 1000)).rejects.toThrow(
      'Board service not found. Available services: 00001800-0000-1000-8000-00805f9b34fb',
    );
  });

  it('reports a failed discovery as ServiceNotFoundError', async () => {
    const link = createMockLink({ discoverShouldFail: true });

    const promise = transport.discoverBoardService(link, 1000);

    await expect(promise).rejects.toBeInstanceOf(ServiceNotFoundError);
    await expect(promise).rejects.toThrow(
      'Board service not found: Discovery failed',
    );
  });

  describe('with fake timers', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('bounds discovery by the timeout', async () => {
      const link = createMockLink({ discoverDelay: 20000 });

      const promise = transport.discoverBoardService(link, 100);
      const assertion = expect(promise).rejects.toThrow(
        'Board service not found: Service discovery timed out after 100ms',
      );
      await vi.advanceTimersByTimeAsync(100);

      await assertion;
    });

    it('rejects with AbortError when aborted', async () => {
      const link = createMockLink({ discoverDelay: 20000 });
      const controller = new AbortController();

      const promise = transport.discoverBoardService(
        link,
        15000,
        controller.signal,
      );
      const assertion = expect(promise).rejects.toBeInstanceOf(AbortError);
      controller.abort();

      await assertion;
    });
  });
});

describe('startNotifications', () => {
  it('calls startNotifications on characteristic', async () => {
    const char = createMockCharacteristic({ properties: { notify: true } });

    await transport.startNotifications(char, () => {});

    expect(char.wasStartNotificationsCalled()).toBe(true);
  });

  it('returns cleanup function that stops notifications', async () => {
    const char = createMockCharacteristic({ properties: { notify: true } });

    const cleanup = await transport.startNotifications(char, () => {});
    cleanup();

    expect(char.wasStopNotificationsCalled()).toBe(true);
  });

  it('returns cleanup function that removes the listener', async () => {
    const char = createMockCharacteristic({ properties: { notify: true } });

    const cleanup = await transport.startNotifications(char, () => {});
    expect(char.getListenerCount()).toBe(1);

    cleanup();
    expect(char.getListenerCount()).toBe(0);
  });

  it('delivers payloads in arrival order and drops empty ones', async () => {
    const char = createMockCharacteristic({ properties: { notify: true } });
    const received: number[][] = [];

    await transport.startNotifications(char, (data) => {
      received.push([...data]);
    });
    char.simulateNotification([0x01, 0x02]);
    char.simulateNotification([]);
    char.simulateNotification([0x03]);

    expect(received).toEqual([[0x01, 0x02], [0x03]]);
  });

  it('rejects when startNotifications fails', async () => {
    const startError = new Error('BLE notification setup failed');
    const char = createMockCharacteristic({
      properties: { notify: true },
      startNotificationsShouldFail: true,
      startNotificationsFailError: startError,
    });

    await expect(transport.startNotifications(char, () => {})).rejects.toBe(
      startError,
    );
    expect(char.getListenerCount()).toBe(0);
  });
});
