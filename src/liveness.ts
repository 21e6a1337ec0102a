import {
  type BoardError,
  HeartbeatFailureError,
  WatchdogDisconnectError,
} from './errors';
import { describeError, type Logger } from './logger';
import * as transport from './transport';
import type { BoardCharacteristic, BoardLink } from './types';

export interface LivenessOptions {
  heartbeatIntervalMs: number;
  watchdogIntervalMs: number;
  /** Consecutive heartbeat failures that end the session */
  maxHeartbeatFailures: number;
  /** Timeout for heartbeat and keepalive writes in milliseconds */
  writeTimeoutMs: number;
  logger: Logger;
  /** Called once per handle when it detects a lost session */
  onFatal: (error: BoardError) => void;
}

export interface LivenessStatus {
  heartbeatActive: boolean;
  keepaliveActive: boolean;
  watchdogActive: boolean;
}

export interface LivenessScheduler {
  /** Periodically writes `payload`; consecutive failures are fatal. */
  startHeartbeat(char: BoardCharacteristic, payload: Uint8Array): void;
  /** Periodically writes `payload`; failures are only logged. */
  startKeepalive(
    char: BoardCharacteristic,
    payload: Uint8Array,
    intervalMs: number,
  ): void;
  /** Polls the link after `graceMs`; a dropped link is fatal. */
  startWatchdog(link: BoardLink, graceMs: number): void;
  stopHeartbeat(): void;
  stopKeepalive(): void;
  stopWatchdog(): void;
  stopAll(): void;
  status(): LivenessStatus;
}

interface TimerHandle {
  stop(): void;
}

/**
 * Runs `task` every `intervalMs` after an optional initial delay. A tick is
 * skipped while the previous run is still pending.
 */
function startRepeating(
  task: () => Promise<void>,
  intervalMs: number,
  logger: Logger,
  initialDelayMs = 0,
): TimerHandle {
  let intervalTimer: ReturnType<typeof setInterval> | null = null;
  let graceTimer: ReturnType<typeof setTimeout> | null = null;
  let running = false;
  let stopped = false;

  const tick = (): void => {
    if (stopped || running) return;
    running = true;
    void task()
      .catch((e: unknown) => {
        logger.error('[Liveness] Timer task threw:', describeError(e));
      })
      .finally(() => {
        running = false;
      });
  };

  const begin = (): void => {
    graceTimer = null;
    if (!stopped) {
      intervalTimer = setInterval(tick, intervalMs);
    }
  };

  if (initialDelayMs > 0) {
    graceTimer = setTimeout(begin, initialDelayMs);
  } else {
    begin();
  }

  return {
    stop() {
      stopped = true;
      if (graceTimer !== null) {
        clearTimeout(graceTimer);
        graceTimer = null;
      }
      if (intervalTimer !== null) {
        clearInterval(intervalTimer);
        intervalTimer = null;
      }
    },
  };
}

/**
 * Creates the liveness scheduler for one board session: heartbeat,
 * keepalive and watchdog, each independently cancellable.
 */
export function createLivenessScheduler(
  options: LivenessOptions,
): LivenessScheduler {
  const {
    heartbeatIntervalMs,
    watchdogIntervalMs,
    maxHeartbeatFailures,
    writeTimeoutMs,
    logger,
    onFatal,
  } = options;

  let heartbeat: TimerHandle | null = null;
  let keepalive: TimerHandle | null = null;
  let watchdog: TimerHandle | null = null;

  function startHeartbeat(
    char: BoardCharacteristic,
    payload: Uint8Array,
  ): void {
    stopHeartbeat();
    let consecutiveFailures = 0;

    const handle = startRepeating(async () => {
      try {
        await transport.writeWithTimeout(char, payload, writeTimeoutMs);
        consecutiveFailures = 0;
        logger.debug?.('[Liveness] Heartbeat sent');
      } catch (e) {
        consecutiveFailures++;
        logger.warn(
          `[Liveness] Heartbeat failed (${consecutiveFailures}/${maxHeartbeatFailures}):`,
          describeError(e),
        );
        if (
          consecutiveFailures >= maxHeartbeatFailures &&
          heartbeat === handle
        ) {
          stopHeartbeat();
          onFatal(new HeartbeatFailureError(consecutiveFailures, e));
        }
      }
    }, heartbeatIntervalMs, logger);
    heartbeat = handle;
  }

  function startKeepalive(
    char: BoardCharacteristic,
    payload: Uint8Array,
    intervalMs: number,
  ): void {
    stopKeepalive();
    keepalive = startRepeating(async () => {
      try {
        await transport.writeWithTimeout(char, payload, writeTimeoutMs);
        logger.debug?.('[Liveness] Keepalive sent');
      } catch (e) {
        logger.warn('[Liveness] Keepalive failed:', describeError(e));
      }
    }, intervalMs, logger);
  }

  function startWatchdog(link: BoardLink, graceMs: number): void {
    stopWatchdog();
    const handle = startRepeating(
      async () => {
        let connected: boolean;
        try {
          connected = await link.isConnected();
        } catch (e) {
          logger.warn('[Liveness] Watchdog check failed:', describeError(e));
          return;
        }
        if (!connected && watchdog === handle) {
          stopWatchdog();
          onFatal(new WatchdogDisconnectError());
        }
      },
      watchdogIntervalMs,
      logger,
      graceMs,
    );
    watchdog = handle;
  }

  function stopHeartbeat(): void {
    heartbeat?.stop();
    heartbeat = null;
  }

  function stopKeepalive(): void {
    keepalive?.stop();
    keepalive = null;
  }

  function stopWatchdog(): void {
    watchdog?.stop();
    watchdog = null;
  }

  function stopAll(): void {
    stopHeartbeat();
    stopKeepalive();
    stopWatchdog();
  }

  function status(): LivenessStatus {
    return {
      heartbeatActive: heartbeat !== null,
      keepaliveActive: keepalive !== null,
      watchdogActive: watchdog !== null,
    };
  }

  return {
    startHeartbeat,
    startKeepalive,
    startWatchdog,
    stopHeartbeat,
    stopKeepalive,
    stopWatchdog,
    stopAll,
    status,
  };
}
