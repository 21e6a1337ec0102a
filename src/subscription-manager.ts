import { delay } from './errors';
import type { Logger } from './logger';
import { describeError } from './logger';
import { decodeCharacteristic, type DecodedValue } from './telemetry-codec';
import * as transport from './transport';
import type { BoardCharacteristic, CharacteristicLayout } from './types';

export interface SubscriptionManagerOptions {
  /** Timeout for enabling notifications on one characteristic */
  notificationTimeoutMs: number;
  logger: Logger;
  /** Layout used to decode payloads, read at delivery time */
  getLayout: () => CharacteristicLayout;
  /** Called for every successfully decoded payload */
  onDecoded: (uuid: string, decoded: DecodedValue) => void;
}

export interface SubscribeAllOptions {
  /** Subscribed first, in order, with `delayMs` between them */
  priority?: readonly BoardCharacteristic[];
  delayMs?: number;
  signal?: AbortSignal;
}

export interface SubscriptionManager {
  /**
   * Enables notifications on one characteristic. Already-subscribed
   * characteristics are left as they are.
   * @returns false if enabling failed (the failure is logged)
   */
  subscribe(char: BoardCharacteristic): Promise<boolean>;
  /**
   * Enables notifications on every given notify-capable characteristic.
   * @returns The number of characteristics newly subscribed
   */
  subscribeAll(
    chars: readonly BoardCharacteristic[],
    options?: SubscribeAllOptions,
  ): Promise<number>;
  isSubscribed(uuid: string): boolean;
  count(): number;
  /**
   * Removes every listener and disables notifications. Subscriptions still
   * being set up are released when they complete instead of being recorded.
   */
  unsubscribeAll(): void;
}

/**
 * Creates the subscription manager for one board session.
 * Decode failures are isolated per payload and never stop delivery.
 */
export function createSubscriptionManager(
  options: SubscriptionManagerOptions,
): SubscriptionManager {
  const { notificationTimeoutMs, logger, getLayout, onDecoded } = options;
  const active = new Map<string, () => void>();
  // Bumped by unsubscribeAll so subscriptions still being set up are dropped
  let epoch = 0;

  function route(uuid: string, data: Uint8Array): void {
    try {
      const decoded = decodeCharacteristic(getLayout(), uuid, data);
      if (decoded) {
        onDecoded(uuid, decoded);
      }
    } catch (e) {
      logger.warn(
        `[Subscriptions] Error processing data from ${uuid}:`,
        describeError(e),
      );
    }
  }

  async function subscribe(char: BoardCharacteristic): Promise<boolean> {
    const uuid = char.uuid.toLowerCase();
    if (active.has(uuid)) return true;
    if (!char.properties.notify && !char.properties.indicate) return false;

    const started = epoch;
    try {
      const stop = await transport.startNotifications(
        char,
        (data) => route(uuid, data),
        { timeoutMs: notificationTimeoutMs, logger },
      );
      if (started !== epoch) {
        stop();
        logger.debug?.(
          `[Subscriptions] Dropped stale subscription to ${uuid}`,
        );
        return false;
      }
      active.set(uuid, stop);
      logger.debug?.(`[Subscriptions] Subscribed to ${uuid}`);
      return true;
    } catch (e) {
      logger.warn(
        `[Subscriptions] Failed to subscribe to ${uuid}:`,
        describeError(e),
      );
      return false;
    }
  }

  async function subscribeAll(
    chars: readonly BoardCharacteristic[],
    subscribeOptions: SubscribeAllOptions = {},
  ): Promise<number> {
    const { priority = [], delayMs = 0, signal } = subscribeOptions;
    const before = active.size;

    for (const char of priority) {
      const wasActive = isSubscribed(char.uuid);
      await subscribe(char);
      if (!wasActive && delayMs > 0) {
        await delay(delayMs, signal);
      }
    }
    for (const char of chars) {
      if (signal?.aborted) break;
      await subscribe(char);
    }
    return active.size - before;
  }

  function isSubscribed(uuid: string): boolean {
    return active.has(uuid.toLowerCase());
  }

  function count(): number {
    return active.size;
  }

  function unsubscribeAll(): void {
    epoch++;
    for (const stop of active.values()) {
      stop();
    }
    active.clear();
  }

  return {
    subscribe,
    subscribeAll,
    isSubscribed,
    count,
    unsubscribeAll,
  };
}
