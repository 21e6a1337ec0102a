import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import {
  type BoardError,
  HeartbeatFailureError,
  WatchdogDisconnectError,
} from './errors';
import { createLivenessScheduler, type LivenessOptions } from './liveness';
import {
  createDeferred,
  createMockCharacteristic,
  createMockLink,
  createMockLogger,
} from './test-utils';

const PAYLOAD = Uint8Array.of(0x10, 0x26);

function setup(overrides: Partial<LivenessOptions> = {}) {
  const logger = createMockLogger();
  const fatal: BoardError[] = [];
  const scheduler = createLivenessScheduler({
    heartbeatIntervalMs: 1000,
    watchdogIntervalMs: 5000,
    maxHeartbeatFailures: 1,
    writeTimeoutMs: 500,
    logger,
    onFatal: (error) => fatal.push(error),
    ...overrides,
  });
  return { scheduler, logger, fatal };
}

describe('createLivenessScheduler', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('heartbeat', () => {
    it('writes the payload every interval', async () => {
      const { scheduler } = setup();
      const char = createMockCharacteristic({ properties: { write: true } });

      scheduler.startHeartbeat(char, PAYLOAD);
      await vi.advanceTimersByTimeAsync(999);
      expect(char.getWrittenValues()).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(2001);
      expect(char.getWrittenValues()).toEqual([PAYLOAD, PAYLOAD, PAYLOAD]);
      expect(scheduler.status().heartbeatActive).toBe(true);
    });

    it('escalates on the first failure by default', async () => {
      const { scheduler, fatal } = setup();
      const char = createMockCharacteristic({
        properties: { write: true },
        writeShouldFail: true,
      });

      scheduler.startHeartbeat(char, PAYLOAD);
      await vi.advanceTimersByTimeAsync(1000);

      expect(fatal).toHaveLength(1);
      expect(fatal[0]).toBeInstanceOf(HeartbeatFailureError);
      expect(fatal[0]?.message).toBe(
        'Connection lost - heartbeat failed: Write failed',
      );
      expect(scheduler.status().heartbeatActive).toBe(false);

      await vi.advanceTimersByTimeAsync(5000);
      expect(fatal).toHaveLength(1);
    });

    it('escalates only after consecutive failures reach the threshold', async () => {
      const { scheduler, fatal, logger } = setup({ maxHeartbeatFailures: 2 });
      const char = createMockCharacteristic({ properties: { write: true } });
      char.setWriteFailure(new Error('GATT busy'));

      scheduler.startHeartbeat(char, PAYLOAD);
      await vi.advanceTimersByTimeAsync(1000);
      expect(fatal).toHaveLength(0);
      expect(logger.warn).toHaveBeenCalledWith(
        '[Liveness] Heartbeat failed (1/2):',
        'GATT busy',
      );

      char.setWriteFailure(null);
      await vi.advanceTimersByTimeAsync(1000);
      char.setWriteFailure(new Error('GATT busy'));
      await vi.advanceTimersByTimeAsync(1000);
      expect(fatal).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1000);
      expect(fatal).toHaveLength(1);
    });

    it('skips ticks while a write is still pending', async () => {
      const { scheduler } = setup({ writeTimeoutMs: 10000 });
      const char = createMockCharacteristic({ properties: { write: true } });
      const pending = createDeferred<void>();
      char.setWriteDelay(pending.promise);
      const writeSpy = vi.spyOn(char, 'writeValueWithResponse');

      scheduler.startHeartbeat(char, PAYLOAD);
      await vi.advanceTimersByTimeAsync(3000);
      expect(writeSpy).toHaveBeenCalledTimes(1);

      pending.resolve();
      await vi.advanceTimersByTimeAsync(1000);
      expect(writeSpy).toHaveBeenCalledTimes(2);
    });
  });

  describe('keepalive', () => {
    it('only logs failures', async () => {
      const { scheduler, fatal, logger } = setup();
      const char = createMockCharacteristic({
        properties: { write: true },
        writeShouldFail: true,
      });

      scheduler.startKeepalive(char, PAYLOAD, 20000);
      await vi.advanceTimersByTimeAsync(40000);

      expect(fatal).toHaveLength(0);
      expect(logger.warn).toHaveBeenCalledTimes(2);
      expect(logger.warn).toHaveBeenCalledWith(
        '[Liveness] Keepalive failed:',
        'Write failed',
      );
      expect(scheduler.status().keepaliveActive).toBe(true);
    });
  });

  describe('watchdog', () => {
    it('waits out the grace period before polling', async () => {
      const { scheduler, fatal } = setup();
      const link = createMockLink();
      const checkSpy = vi.spyOn(link, 'isConnected');
      link.setConnected(false);

      scheduler.startWatchdog(link, 2000);
      await vi.advanceTimersByTimeAsync(6999);
      expect(checkSpy).not.toHaveBeenCalled();
      expect(fatal).toHaveLength(0);

      await vi.advanceTimersByTimeAsync(1);
      expect(fatal).toHaveLength(1);
      expect(fatal[0]).toBeInstanceOf(WatchdogDisconnectError);
      expect(scheduler.status().watchdogActive).toBe(false);
    });

    it('keeps polling while the link is up', async () => {
      const { scheduler, fatal } = setup();
      const link = createMockLink();
      const checkSpy = vi.spyOn(link, 'isConnected');

      scheduler.startWatchdog(link, 0);
      await vi.advanceTimersByTimeAsync(15000);

      expect(checkSpy).toHaveBeenCalledTimes(3);
      expect(fatal).toHaveLength(0);
    });

    it('treats a failed check as inconclusive', async () => {
      const { scheduler, fatal, logger } = setup();
      const link = createMockLink();
      link.setConnectedCheckFailure(new Error('adapter busy'));

      scheduler.startWatchdog(link, 0);
      await vi.advanceTimersByTimeAsync(5000);

      expect(fatal).toHaveLength(0);
      expect(logger.warn).toHaveBeenCalledWith(
        '[Liveness] Watchdog check failed:',
        'adapter busy',
      );
    });
  });

  it('stopAll cancels every timer', async () => {
    const { scheduler, fatal } = setup();
    const char = createMockCharacteristic({ properties: { write: true } });
    const link = createMockLink();
    link.setConnected(false);

    scheduler.startHeartbeat(char, PAYLOAD);
    scheduler.startKeepalive(char, PAYLOAD, 1000);
    scheduler.startWatchdog(link, 0);
    scheduler.stopAll();
    await vi.advanceTimersByTimeAsync(10000);

    expect(char.getWrittenValues()).toHaveLength(0);
    expect(fatal).toHaveLength(0);
    expect(scheduler.status()).toEqual({
      heartbeatActive: false,
      keepaliveActive: false,
      watchdogActive: false,
    });
  });
});
