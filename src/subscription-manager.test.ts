import { describe, expect, it, vi } from 'vitest';
import { CHARACTERISTIC_LAYOUTS } from './constants';
import { createSubscriptionManager } from './subscription-manager';
import {
  createBoardCharacteristics,
  createDeferred,
  createMockCharacteristic,
  createMockLogger,
  type MockLogger,
} from './test-utils';
import type { CharacteristicLayout } from './types';

const original = CHARACTERISTIC_LAYOUTS.original;

function setup(layout: CharacteristicLayout = 'original') {
  const logger: MockLogger = createMockLogger();
  const onDecoded = vi.fn();
  let currentLayout = layout;
  const manager = createSubscriptionManager({
    notificationTimeoutMs: 1000,
    logger,
    getLayout: () => currentLayout,
    onDecoded,
  });
  return {
    manager,
    logger,
    onDecoded,
    setLayout(next: CharacteristicLayout) {
      currentLayout = next;
    },
  };
}

describe('subscribe', () => {
  it('routes decoded payloads to onDecoded', async () => {
    const { manager, onDecoded } = setup();
    const battery = createMockCharacteristic();

    await expect(manager.subscribe(battery)).resolves.toBe(true);
    battery.simulateNotification([82]);

    expect(onDecoded).toHaveBeenCalledWith(original.batteryPercent, {
      field: 'batteryPercent',
      value: 82,
    });
    expect(manager.isSubscribed(original.batteryPercent.toUpperCase())).toBe(
      true,
    );
  });

  it('refuses characteristics that cannot notify', async () => {
    const { manager } = setup();
    const { writeChannel } = createBoardCharacteristics();

    await expect(manager.subscribe(writeChannel)).resolves.toBe(false);
    expect(writeChannel.wasStartNotificationsCalled()).toBe(false);
    expect(manager.count()).toBe(0);
  });

  it('does not subscribe twice', async () => {
    const { manager } = setup();
    const battery = createMockCharacteristic();

    await manager.subscribe(battery);
    await expect(manager.subscribe(battery)).resolves.toBe(true);

    expect(battery.getListenerCount()).toBe(1);
    expect(manager.count()).toBe(1);
  });

  it('logs and reports a failed subscription', async () => {
    const { manager, logger } = setup();
    const battery = createMockCharacteristic({
      startNotificationsShouldFail: true,
    });

    await expect(manager.subscribe(battery)).resolves.toBe(false);

    expect(manager.isSubscribed(battery.uuid)).toBe(false);
    expect(logger.warn).toHaveBeenCalledWith(
      `[Subscriptions] Failed to subscribe to ${original.batteryPercent}:`,
      'startNotifications failed',
    );
  });

  it('keeps delivering after a payload fails to decode', async () => {
    const { manager, logger, onDecoded } = setup();
    const { pitch } = createBoardCharacteristics();
    await manager.subscribe(pitch);

    pitch.simulateNotification([0x01]);
    pitch.simulateNotification([0xe8, 0x03]);

    expect(logger.warn).toHaveBeenCalledWith(
      `[Subscriptions] Error processing data from ${original.pitch}:`,
      `Payload for ${original.pitch} has 1 bytes, expected at least 2`,
    );
    expect(onDecoded).toHaveBeenCalledTimes(1);
    expect(onDecoded).toHaveBeenCalledWith(original.pitch, {
      field: 'pitch',
      value: 10,
    });
  });

  it('decodes with the layout current at delivery time', async () => {
    const { manager, onDecoded, setLayout } = setup();
    const char = createMockCharacteristic({ uuid: original.tripOdometer });
    await manager.subscribe(char);

    setLayout('revised');
    char.simulateNotification([0xe8, 0x03]);

    expect(onDecoded).toHaveBeenCalledWith(original.tripOdometer, {
      field: 'pitch',
      value: 10,
    });
  });

  it('ignores payloads on protocol channels', async () => {
    const { manager, onDecoded } = setup();
    const { readChannel } = createBoardCharacteristics();
    await manager.subscribe(readChannel);

    readChannel.simulateNotification([0x43, 0x52, 0x58]);

    expect(onDecoded).not.toHaveBeenCalled();
  });
});

describe('subscribeAll', () => {
  it('subscribes priority characteristics first, in order', async () => {
    const { manager } = setup();
    const chars = createBoardCharacteristics();
    const order: string[] = [];
    for (const char of Object.values(chars)) {
      vi.spyOn(char, 'startNotifications').mockImplementation(async () => {
        order.push(char.uuid);
      });
    }

    const added = await manager.subscribeAll(Object.values(chars), {
      priority: [chars.rpm, chars.pitch],
    });

    expect(added).toBe(14);
    expect(order.slice(0, 3)).toEqual([
      original.rpm,
      original.pitch,
      original.serialNumber,
    ]);
    expect(order).toHaveLength(14);
  });

  it('counts only newly subscribed characteristics', async () => {
    const { manager } = setup();
    const chars = createBoardCharacteristics();
    await manager.subscribe(chars.batteryPercent);

    const added = await manager.subscribeAll([
      chars.batteryPercent,
      chars.roll,
      chars.writeChannel,
    ]);

    expect(added).toBe(1);
    expect(manager.count()).toBe(2);
  });

  it('stops when the signal is already aborted', async () => {
    const { manager } = setup();
    const controller = new AbortController();
    controller.abort();

    const added = await manager.subscribeAll(
      Object.values(createBoardCharacteristics()),
      { signal: controller.signal },
    );

    expect(added).toBe(0);
  });
});

describe('unsubscribeAll', () => {
  it('removes listeners and disables notifications', async () => {
    const { manager, onDecoded } = setup();
    const chars = createBoardCharacteristics();
    await manager.subscribeAll([chars.batteryPercent, chars.roll]);

    manager.unsubscribeAll();
    chars.batteryPercent.simulateNotification([50]);

    expect(manager.count()).toBe(0);
    expect(chars.batteryPercent.getListenerCount()).toBe(0);
    expect(chars.roll.wasStopNotificationsCalled()).toBe(true);
    expect(onDecoded).not.toHaveBeenCalled();
  });

  it('releases a subscription that completes afterwards', async () => {
    const { manager, onDecoded } = setup();
    const { rpm } = createBoardCharacteristics();
    const gate = createDeferred<void>();
    rpm.setStartNotificationsDelay(gate.promise);

    const pending = manager.subscribe(rpm);
    manager.unsubscribeAll();
    gate.resolve();

    await expect(pending).resolves.toBe(false);
    expect(manager.count()).toBe(0);
    expect(manager.isSubscribed(rpm.uuid)).toBe(false);
    expect(rpm.getListenerCount()).toBe(0);
    expect(rpm.wasStopNotificationsCalled()).toBe(true);
    rpm.simulateNotification([0x10, 0x00]);
    expect(onDecoded).not.toHaveBeenCalled();
  });

  it('lets a released characteristic subscribe again', async () => {
    const { manager } = setup();
    const { rpm } = createBoardCharacteristics();
    const gate = createDeferred<void>();
    rpm.setStartNotificationsDelay(gate.promise);
    const pending = manager.subscribe(rpm);
    manager.unsubscribeAll();
    gate.resolve();
    await pending;

    await expect(manager.subscribe(rpm)).resolves.toBe(true);
    expect(manager.count()).toBe(1);
  });
});
