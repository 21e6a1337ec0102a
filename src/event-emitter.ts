import type { Logger } from './logger';

/**
 * Maps event names to payload types. Declare maps with `type`, not
 * `interface`, so they satisfy the index signature.
 */
export type EventMap = { [key: string]: unknown };

export interface TypedEventEmitter<T extends EventMap> {
  on<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
  once<K extends keyof T>(event: K, callback: (data: T[K]) => void): () => void;
  off<K extends keyof T>(event: K, callback: (data: T[K]) => void): void;
  removeAllListeners<K extends keyof T>(event?: K): void;
  emit<K extends keyof T>(event: K, data: T[K]): void;
  listenerCount<K extends keyof T>(event: K): number;
}

export interface EventEmitterOptions {
  /** Receives listener exceptions. Defaults to console. */
  logger?: Pick<Logger, 'error'>;
}

export function createEventEmitter<T extends EventMap>(
  options: EventEmitterOptions = {},
): TypedEventEmitter<T> {
  const logger = options.logger ?? { error: console.error.bind(console) };
  const listeners = new Map<keyof T, Set<(data: unknown) => void>>();

  function getListenerSet<K extends keyof T>(
    event: K,
  ): Set<(data: unknown) => void> {
    let set = listeners.get(event);
    if (!set) {
      set = new Set();
      listeners.set(event, set);
    }
    return set;
  }

  function on<K extends keyof T>(
    event: K,
    callback: (data: T[K]) => void,
  ): () => void {
    const set = getListenerSet(event);
    set.add(callback as (data: unknown) => void);
    return () => off(event, callback);
  }

  function once<K extends keyof T>(
    event: K,
    callback: (data: T[K]) => void,
  ): () => void {
    const wrapper = (data: T[K]) => {
      off(event, wrapper);
      callback(data);
    };
    return on(event, wrapper);
  }

  function off<K extends keyof T>(
    event: K,
    callback: (data: T[K]) => void,
  ): void {
    const set = listeners.get(event);
    if (set) {
      set.delete(callback as (data: unknown) => void);
      if (set.size === 0) listeners.delete(event);
    }
  }

  function removeAllListeners<K extends keyof T>(event?: K): void {
    if (event !== undefined) {
      listeners.delete(event);
    } else {
      listeners.clear();
    }
  }

  function emit<K extends keyof T>(event: K, data: T[K]): void {
    const set = listeners.get(event);
    if (set) {
      // Snapshot: listeners added or removed mid-emit take effect next time
      for (const cb of [...set]) {
        try {
          cb(data);
        } catch (err) {
          queueMicrotask(() => {
            logger.error('[EventEmitter] Listener threw an error:', err);
          });
        }
      }
    }
  }

  function listenerCount<K extends keyof T>(event: K): number {
    const set = listeners.get(event);
    return set ? set.size : 0;
  }

  return {
    on,
    once,
    off,
    removeAllListeners,
    emit,
    listenerCount,
  };
}
