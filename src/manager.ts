import {
  authenticate,
  type StrategyName,
  type UnlockCommands,
} from './authentication';
import { createCharacteristicRegistry } from './characteristic-registry';
import {
  BLE_NOTIFICATION_TIMEOUT_MS,
  BLE_READ_TIMEOUT_MS,
  BLE_WRITE_TIMEOUT_MS,
  CLASSIC_TIMING,
  EXTENDED_TIMING,
  GATT_BOARD_SERVICE,
  HEARTBEAT_INTERVAL_MS,
  MAX_HEARTBEAT_FAILURES,
  PRIORITY_SUBSCRIPTION_DELAY_MS,
  PRIORITY_SUBSCRIPTION_ROLES,
  SCAN_TIMEOUT_MS,
  type TimingProfile,
  WATCHDOG_INTERVAL_MS,
  WHEEL_CIRCUMFERENCE_M,
} from './constants';
import { type DeviceFilterOptions, mergeCandidates } from './device-filter';
import {
  AbortError,
  BoardError,
  type BoardErrorKind,
  CharacteristicsMissingError,
  ConnectionAbortedError,
  normalizeError,
  ScanFailureError,
  type StrategyAttempt,
  WatchdogDisconnectError,
} from './errors';
import { createEventEmitter, type TypedEventEmitter } from './event-emitter';
import { createLivenessScheduler } from './liveness';
import { describeError, getLogger, type Logger } from './logger';
import { createStateMachine, SESSION_STATES } from './state-machine';
import { createSubscriptionManager } from './subscription-manager';
import {
  applyDecodedValue,
  deriveRideMetrics,
  type RideMetrics,
} from './telemetry-codec';
import * as transport from './transport';
import {
  type AuthVariant,
  type BoardCharacteristic,
  type BoardLink,
  type BoardModel,
  type BoardTransport,
  type CharacteristicLayout,
  type ConnectionState,
  createDefaultSnapshot,
  type DeviceCandidate,
  resetSnapshot,
  type StopScan,
  type TelemetrySnapshot,
} from './types';

/**
 * Events emitted by the board manager.
 */
export type BoardEvents = {
  connectionStateChange: {
    from: ConnectionState;
    to: ConnectionState;
  };
  /** A copy of the snapshot after each applied notification */
  telemetry: TelemetrySnapshot;
  /** Every candidate found so far in the current scan, strongest first */
  candidates: DeviceCandidate[];
  error: Error;
  strategyAttempt: StrategyAttempt;
};

/**
 * Information about the current session.
 * Available once the board is authenticated.
 */
export interface SessionInfo {
  device: DeviceCandidate;
  model: BoardModel;
  variant: AuthVariant;
  layout: CharacteristicLayout;
  /** Raw firmware revision bytes */
  firmware: Uint8Array;
  /** The strategy that unlocked the board */
  strategy: StrategyName;
}

export interface LastError {
  /** 'Unexpected' marks a failure outside the board error taxonomy */
  kind: BoardErrorKind | 'Unexpected';
  message: string;
}

/**
 * Point-in-time view of the engine for external tooling.
 */
export interface BoardDiagnostics {
  connectionState: ConnectionState;
  lastError: LastError | null;
  device: DeviceCandidate | null;
  model: BoardModel | null;
  candidatesFound: number;
  characteristicsFound: number;
  subscriptionsActive: number;
  heartbeatActive: boolean;
  keepaliveActive: boolean;
  watchdogActive: boolean;
  /** Strategy outcomes of the latest connection attempt */
  strategyAttempts: StrategyAttempt[];
}

export interface StartScanOptions {
  /**
   * Ask the transport to report only devices advertising the board service.
   * Boards that omit the service from their advertisement are then missed.
   * @default false
   */
  filterByService?: boolean;
  /**
   * Stop scanning automatically after this many milliseconds.
   * @default 20000
   */
  timeoutMs?: number;
}

/**
 * Options for creating a board manager.
 */
export interface CreateBoardManagerOptions {
  /**
   * Custom logger instance. If not provided, uses the global logger.
   */
  logger?: Logger;

  /** Overrides for the classic and extended timing profiles */
  timing?: {
    classic?: Partial<TimingProfile>;
    extended?: Partial<TimingProfile>;
  };

  /** @default 15000 */
  heartbeatIntervalMs?: number;

  /** @default 5000 */
  watchdogIntervalMs?: number;

  /**
   * Consecutive heartbeat write failures that end the session.
   * @default 1
   */
  maxHeartbeatFailures?: number;

  /** @default 5000 */
  readTimeoutMs?: number;

  /**
   * Timeout for BLE write operations in milliseconds.
   * BLE writes can hang indefinitely if the board becomes unresponsive.
   * @default 10000
   */
  writeTimeoutMs?: number;

  /** @default 15000 */
  notificationTimeoutMs?: number;

  /** Default auto-stop delay for scans. @default 20000 */
  scanTimeoutMs?: number;

  /** Candidate heuristics overrides */
  filter?: DeviceFilterOptions;

  /** 16-byte key appended to the challenge before hashing */
  secretKey?: ArrayLike<number>;

  /** Replacement unlock commands for newer boards */
  unlockCommands?: Partial<UnlockCommands>;

  /** Used by `getRideMetrics()`. @default 0.91 */
  wheelCircumferenceM?: number;
}

/**
 * Connection and authentication engine for self-balancing boards.
 */
export interface BoardManager {
  /**
   * Starts scanning for boards. Candidates are published through the
   * `candidates` event. Does nothing while already scanning.
   * @throws ScanFailureError if the transport cannot scan
   * @throws Error if a session is active
   */
  startScan(options?: StartScanOptions): Promise<void>;

  /**
   * Stops the current scan. Safe to call when not scanning.
   */
  stopScan(): Promise<void>;

  /**
   * Connects to and unlocks a candidate. Does nothing while a session is
   * already active; stops a running scan first.
   * @throws BoardError subclass describing the failure
   * @throws ConnectionAbortedError if `disconnect()` is called meanwhile
   */
  connect(candidate: DeviceCandidate): Promise<void>;

  /**
   * Cancels any attempt, stops every timer and subscription and releases
   * the link. Safe to call repeatedly.
   */
  disconnect(): Promise<void>;

  getConnectionState(): ConnectionState;

  /** Candidates of the current scan, strongest signal first */
  getCandidates(): DeviceCandidate[];

  /**
   * The live snapshot instance. It is updated in place, so a reader may
   * observe a partially applied notification batch.
   */
  getSnapshot(): Readonly<TelemetrySnapshot>;

  getRideMetrics(): RideMetrics;

  /**
   * Returns session info once authenticated, null otherwise.
   */
  getSessionInfo(): SessionInfo | null;

  getDiagnostics(): BoardDiagnostics;

  /**
   * Typed event emitter for connection, telemetry, candidate, strategy and
   * error events.
   * @example
   * ```typescript
   * manager.events.on('telemetry', (t) => console.log(t.batteryPercent));
   * manager.events.on('error', (error) => console.error(error));
   * ```
   */
  readonly events: TypedEventEmitter<BoardEvents>;
}

/**
 * Newer boards advertise a GT marker and need the slower timing profile.
 */
export function usesExtendedProfile(name: string): boolean {
  return name.toLowerCase().includes('gt');
}

function requirePositive(name: string, value: number): number {
  if (!Number.isFinite(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive number, got ${value}`);
  }
  return value;
}

function requireCount(name: string, value: number): number {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${name} must be a positive integer, got ${value}`);
  }
  return value;
}

function resolveProfile(
  label: string,
  base: Readonly<TimingProfile>,
  overrides: Partial<TimingProfile> = {},
): TimingProfile {
  const profile = { ...base, ...overrides };
  return {
    connectAttempts: requireCount(
      `${label}.connectAttempts`,
      profile.connectAttempts,
    ),
    connectBackoffMs: requirePositive(
      `${label}.connectBackoffMs`,
      profile.connectBackoffMs,
    ),
    connectTimeoutMs: requirePositive(
      `${label}.connectTimeoutMs`,
      profile.connectTimeoutMs,
    ),
    watchdogGraceMs: requirePositive(
      `${label}.watchdogGraceMs`,
      profile.watchdogGraceMs,
    ),
    discoveryTimeoutMs: requirePositive(
      `${label}.discoveryTimeoutMs`,
      profile.discoveryTimeoutMs,
    ),
    firmwareReadAttempts: requireCount(
      `${label}.firmwareReadAttempts`,
      profile.firmwareReadAttempts,
    ),
  };
}

/**
 * Creates a board manager on top of the given transport.
 *
 * @example
 * ```typescript
 * const manager = createBoardManager(transport);
 * manager.events.on('candidates', (found) => {
 *   const [board] = found;
 *   if (board) void manager.connect(board);
 * });
 * manager.events.on('telemetry', (t) => render(t));
 * await manager.startScan();
 * ```
 */
export function createBoardManager(
  boardTransport: BoardTransport,
  options: CreateBoardManagerOptions = {},
): BoardManager {
  const logger = options.logger ?? getLogger();
  const classicProfile = resolveProfile(
    'timing.classic',
    CLASSIC_TIMING,
    options.timing?.classic,
  );
  const extendedProfile = resolveProfile(
    'timing.extended',
    EXTENDED_TIMING,
    options.timing?.extended,
  );
  const readTimeoutMs = requirePositive(
    'readTimeoutMs',
    options.readTimeoutMs ?? BLE_READ_TIMEOUT_MS,
  );
  const writeTimeoutMs = requirePositive(
    'writeTimeoutMs',
    options.writeTimeoutMs ?? BLE_WRITE_TIMEOUT_MS,
  );
  const notificationTimeoutMs = requirePositive(
    'notificationTimeoutMs',
    options.notificationTimeoutMs ?? BLE_NOTIFICATION_TIMEOUT_MS,
  );
  const defaultScanTimeoutMs = requirePositive(
    'scanTimeoutMs',
    options.scanTimeoutMs ?? SCAN_TIMEOUT_MS,
  );
  const wheelCircumferenceM = requirePositive(
    'wheelCircumferenceM',
    options.wheelCircumferenceM ?? WHEEL_CIRCUMFERENCE_M,
  );
  const filterOptions = options.filter ?? {};

  const stateMachine = createStateMachine('disconnected');
  const events = createEventEmitter<BoardEvents>({ logger });
  const registry = createCharacteristicRegistry();
  const snapshot = createDefaultSnapshot();
  const candidates = new Map<string, DeviceCandidate>();

  const subscriptions = createSubscriptionManager({
    notificationTimeoutMs,
    logger,
    getLayout: () => registry.layout(),
    onDecoded: (_uuid, decoded) => {
      const state = stateMachine.getState();
      if (state !== 'authenticating' && state !== 'authenticated') return;
      applyDecodedValue(snapshot, decoded);
      events.emit('telemetry', { ...snapshot });
    },
  });

  const liveness = createLivenessScheduler({
    heartbeatIntervalMs: requirePositive(
      'heartbeatIntervalMs',
      options.heartbeatIntervalMs ?? HEARTBEAT_INTERVAL_MS,
    ),
    watchdogIntervalMs: requirePositive(
      'watchdogIntervalMs',
      options.watchdogIntervalMs ?? WATCHDOG_INTERVAL_MS,
    ),
    maxHeartbeatFailures: requireCount(
      'maxHeartbeatFailures',
      options.maxHeartbeatFailures ?? MAX_HEARTBEAT_FAILURES,
    ),
    writeTimeoutMs,
    logger,
    onFatal: (error) => failSession(error),
  });

  // Scan state
  let stopScanFn: StopScan | null = null;
  let scanTimer: ReturnType<typeof setTimeout> | null = null;
  let scanGeneration = 0;

  // Session state. A new connect or a disconnect bumps the generation so
  // stale attempts and teardowns leave newer sessions alone.
  let attemptGeneration = 0;
  let currentAttempt: AbortController | null = null;
  let pendingFailure: BoardError | null = null;
  let activeLink: BoardLink | null = null;
  let stopDisconnectListener: (() => void) | null = null;
  let device: DeviceCandidate | null = null;
  let model: BoardModel | null = null;
  let sessionInfo: SessionInfo | null = null;
  let strategyAttempts: StrategyAttempt[] = [];
  let lastError: LastError | null = null;

  stateMachine.onTransition((from, to) => {
    logger.debug?.(`[BoardLink] ${from} -> ${to}`);
    events.emit('connectionStateChange', { from, to });
  });

  function transitionState(to: ConnectionState): void {
    if (stateMachine.canTransition(to)) {
      stateMachine.transition(to);
    }
  }

  function emitError(error: Error): void {
    if (events.listenerCount('error') === 0) {
      logger.error('[BoardLink] Unhandled error:', error.message);
      return;
    }
    events.emit('error', error);
  }

  function clearScanTimer(): void {
    if (scanTimer !== null) {
      clearTimeout(scanTimer);
      scanTimer = null;
    }
  }

  async function releaseLink(link: BoardLink): Promise<void> {
    try {
      await link.disconnect();
    } catch (e) {
      logger.warn('[BoardLink] Error releasing link:', describeError(e));
    }
  }

  /**
   * Releases every session resource. Only the generation that started the
   * teardown may move the state machine to disconnected.
   */
  async function teardown(generation: number): Promise<void> {
    liveness.stopAll();
    subscriptions.unsubscribeAll();
    if (stopDisconnectListener) {
      stopDisconnectListener();
      stopDisconnectListener = null;
    }
    const link = activeLink;
    activeLink = null;
    registry.clear();
    sessionInfo = null;

    if (link) {
      await releaseLink(link);
    }
    if (generation === attemptGeneration) {
      transitionState('disconnected');
    }
  }

  /**
   * error -> teardown -> disconnected, with the failure recorded and emitted.
   */
  async function escalate(error: Error, generation: number): Promise<void> {
    lastError = {
      kind: error instanceof BoardError ? error.kind : 'Unexpected',
      message: error.message,
    };
    transitionState('error');
    emitError(error);
    await teardown(generation);
  }

  /**
   * Handles a failure detected outside the connect flow (liveness timers,
   * link loss). An in-flight attempt is aborted and reports the failure.
   */
  function failSession(error: BoardError): void {
    if (!SESSION_STATES.includes(stateMachine.getState())) return;
    logger.warn(`[BoardLink] ${error.message}`);
    if (currentAttempt) {
      pendingFailure = error;
      currentAttempt.abort();
      return;
    }
    escalate(error, attemptGeneration).catch((e: unknown) => {
      logger.error('[BoardLink] Teardown failed:', describeError(e));
    });
  }

  async function startScan(scanOptions: StartScanOptions = {}): Promise<void> {
    const state = stateMachine.getState();
    if (state === 'scanning') return;
    if (state !== 'disconnected') {
      throw new Error(`Cannot start scan while ${state}`);
    }
    const timeoutMs = requirePositive(
      'timeoutMs',
      scanOptions.timeoutMs ?? defaultScanTimeoutMs,
    );

    candidates.clear();
    lastError = null;
    transitionState('scanning');
    const generation = ++scanGeneration;

    let stop: StopScan;
    try {
      stop = await boardTransport.startScan(
        { services: scanOptions.filterByService ? [GATT_BOARD_SERVICE] : [] },
        (batch) => {
          if (generation !== scanGeneration) return;
          if (mergeCandidates(candidates, batch, filterOptions)) {
            events.emit('candidates', getCandidates());
          }
        },
      );
    } catch (e) {
      const error = new ScanFailureError(e);
      if (generation === scanGeneration) {
        scanGeneration++;
        await escalate(error, attemptGeneration);
      }
      throw error;
    }

    if (generation !== scanGeneration) {
      // stopScan() ran while the transport was starting
      await stop();
      return;
    }
    stopScanFn = stop;
    scanTimer = setTimeout(() => {
      scanTimer = null;
      logger.debug?.('[BoardLink] Scan timed out');
      void stopScan();
    }, timeoutMs);
  }

  async function stopScan(): Promise<void> {
    scanGeneration++;
    clearScanTimer();
    const stop = stopScanFn;
    stopScanFn = null;
    if (stop) {
      try {
        await stop();
      } catch (e) {
        logger.warn('[BoardLink] Error stopping scan:', describeError(e));
      }
    }
    if (stateMachine.getState() === 'scanning') {
      stateMachine.transition('disconnected');
    }
  }

  function priorityCharacteristics(): BoardCharacteristic[] {
    return PRIORITY_SUBSCRIPTION_ROLES.map((role) =>
      registry.getByRole(role),
    ).filter((c): c is BoardCharacteristic => c !== undefined);
  }

  async function connect(candidate: DeviceCandidate): Promise<void> {
    const state = stateMachine.getState();
    if (SESSION_STATES.includes(state) || state === 'error') {
      logger.debug?.(`[BoardLink] connect() ignored while ${state}`);
      return;
    }
    if (state === 'scanning') {
      await stopScan();
    }

    const generation = ++attemptGeneration;
    const controller = new AbortController();
    const { signal } = controller;
    currentAttempt = controller;
    pendingFailure = null;

    const checkAborted = (): void => {
      if (signal.aborted) throw new AbortError();
    };

    const extended = usesExtendedProfile(candidate.name);
    const profile = extended ? extendedProfile : classicProfile;
    device = candidate;
    model = null;
    strategyAttempts = [];
    lastError = null;
    transitionState('connecting');

    let link: BoardLink | null = null;
    try {
      link = await transport.connectWithRetry(
        boardTransport,
        candidate.id,
        profile,
        { signal, logger },
      );
      checkAborted();
      activeLink = link;
      stopDisconnectListener =
        link.onDisconnect?.(() =>
          failSession(new WatchdogDisconnectError('link dropped')),
        ) ?? null;
      transitionState('connected');
      liveness.startWatchdog(link, profile.watchdogGraceMs);

      const service = await transport.discoverBoardService(
        link,
        profile.discoveryTimeoutMs,
        signal,
      );
      checkAborted();
      registry.populate(service.characteristics);
      if (registry.size() === 0) {
        throw new CharacteristicsMissingError([GATT_BOARD_SERVICE]);
      }
      logger.debug?.(
        `[BoardLink] ${registry.size()} characteristics, ${registry.layout()} layout`,
      );

      transitionState('authenticating');
      resetSnapshot(snapshot);
      const result = await authenticate({
        deviceName: candidate.name,
        registry,
        subscriptions,
        profile,
        logger,
        secretKey: options.secretKey,
        unlockCommands: options.unlockCommands,
        prioritySubscriptions: extended ? priorityCharacteristics() : [],
        readTimeoutMs,
        writeTimeoutMs,
        notificationTimeoutMs,
        signal,
        onAttempt: (attempt) => {
          strategyAttempts.push(attempt);
          events.emit('strategyAttempt', attempt);
        },
      });
      checkAborted();
      model = result.model;

      await subscriptions.subscribeAll(registry.notifyCapable(), {
        priority: extended ? priorityCharacteristics() : [],
        delayMs: PRIORITY_SUBSCRIPTION_DELAY_MS,
        signal,
      });
      checkAborted();

      const { firmwareRevision } = registry.requireRoles(['firmwareRevision']);
      sessionInfo = {
        device: candidate,
        model: result.model,
        variant: result.variant,
        layout: registry.layout(),
        firmware: result.firmware,
        strategy: result.strategy,
      };
      transitionState('authenticated');
      liveness.startHeartbeat(firmwareRevision, result.firmware);
      liveness.startKeepalive(
        firmwareRevision,
        result.firmware,
        result.keepaliveIntervalMs,
      );
    } catch (err) {
      if (link && activeLink !== link) {
        await releaseLink(link);
      }
      if (generation !== attemptGeneration) {
        // disconnect() owns the teardown
        throw new ConnectionAbortedError();
      }
      const failure =
        err instanceof AbortError && pendingFailure
          ? pendingFailure
          : normalizeError(err);
      await escalate(failure, generation);
      throw failure;
    } finally {
      if (currentAttempt === controller) {
        currentAttempt = null;
        pendingFailure = null;
      }
    }
  }

  async function disconnect(): Promise<void> {
    if (stateMachine.getState() === 'scanning') {
      await stopScan();
      return;
    }
    const generation = ++attemptGeneration;
    if (currentAttempt) {
      currentAttempt.abort();
      currentAttempt = null;
    }
    await teardown(generation);
  }

  function getConnectionState(): ConnectionState {
    return stateMachine.getState();
  }

  function getCandidates(): DeviceCandidate[] {
    return [...candidates.values()].sort((a, b) => b.rssi - a.rssi);
  }

  function getSnapshot(): Readonly<TelemetrySnapshot> {
    return snapshot;
  }

  function getRideMetrics(): RideMetrics {
    return deriveRideMetrics(snapshot, wheelCircumferenceM);
  }

  function getSessionInfo(): SessionInfo | null {
    if (!sessionInfo || stateMachine.getState() !== 'authenticated') {
      return null;
    }
    return { ...sessionInfo, firmware: Uint8Array.from(sessionInfo.firmware) };
  }

  function getDiagnostics(): BoardDiagnostics {
    return {
      connectionState: stateMachine.getState(),
      lastError: lastError ? { ...lastError } : null,
      device,
      model,
      candidatesFound: candidates.size,
      characteristicsFound: registry.size(),
      subscriptionsActive: subscriptions.count(),
      ...liveness.status(),
      strategyAttempts: strategyAttempts.map((a) => ({ ...a })),
    };
  }

  return {
    startScan,
    stopScan,
    connect,
    disconnect,
    getConnectionState,
    getCandidates,
    getSnapshot,
    getRideMetrics,
    getSessionInfo,
    getDiagnostics,
    events,
  };
}
