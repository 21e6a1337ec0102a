/**
 * boardlink-ble - connection and authentication engine for self-balancing
 * boards over Bluetooth Low Energy.
 *
 * @packageDocumentation
 *
 * @example Quick Start
 * ```typescript
 * import { createBoardManager } from 'boardlink-ble';
 *
 * const manager = createBoardManager(myTransport);
 *
 * manager.events.on('candidates', ([board]) => {
 *   if (board) void manager.connect(board);
 * });
 * manager.events.on('telemetry', (t) => {
 *   console.log(`Battery: ${t.batteryPercent}%`);
 * });
 *
 * await manager.startScan();
 * ```
 *
 * @example Without hardware
 * ```typescript
 * import {
 *   createBoardManager,
 *   createSimulatedBoard,
 *   createSimulatedBoardTransport,
 * } from 'boardlink-ble';
 *
 * const board = createSimulatedBoard({ name: 'Pint 1234' });
 * const manager = createBoardManager(createSimulatedBoardTransport([board]));
 * ```
 */

// ============================================================================
// ESSENTIAL - What most users need
// ============================================================================

export {
  createBoardManager,
  usesExtendedProfile,
  type BoardDiagnostics,
  type BoardEvents,
  type BoardManager,
  type CreateBoardManagerOptions,
  type LastError,
  type SessionInfo,
  type StartScanOptions,
} from './manager';

export type {
  Advertisement,
  AuthVariant,
  BoardCharacteristic,
  BoardLink,
  BoardModel,
  BoardService,
  BoardTransport,
  CharacteristicLayout,
  CharacteristicProperties,
  CharacteristicRole,
  ConnectionState,
  DeviceCandidate,
  ScanFilter,
  StopScan,
  TelemetrySnapshot,
} from './types';

// ============================================================================
// ERRORS - For error handling
// ============================================================================

export {
  AllStrategiesExhaustedError,
  BoardError,
  type BoardErrorKind,
  ChallengeTimeoutError,
  CharacteristicsMissingError,
  ConnectFailureError,
  ConnectionAbortedError,
  FirmwareReadFailureError,
  HeartbeatFailureError,
  InvalidChallengeSignatureError,
  normalizeError,
  ScanFailureError,
  ServiceNotFoundError,
  type StrategyAttempt,
  TelemetryDecodeError,
  TimeoutError,
  WatchdogDisconnectError,
} from './errors';

// ============================================================================
// ADVANCED - Building blocks for custom orchestration and tooling
// ============================================================================

export {
  authenticate,
  detectBoardModel,
  STRATEGY_PLANS,
  variantForModel,
  type AuthenticationContext,
  type AuthenticationResult,
  type StrategyName,
  type UnlockCommands,
} from './authentication';
export {
  computeChallengeResponse,
  hasCrxSignature,
  isWellFormedResponse,
  selectChallengeSlice,
  type ChallengeSlice,
} from './challenge-response';
export {
  createCharacteristicRegistry,
  detectLayout,
  type CharacteristicRegistry,
} from './characteristic-registry';
export {
  isBoardCandidate,
  mergeCandidates,
  type DeviceFilterOptions,
} from './device-filter';
export {
  batteryBand,
  decodeCharacteristic,
  deriveRideMetrics,
  type BatteryBand,
  type DecodedValue,
  type RideMetrics,
} from './telemetry-codec';
export {
  CHARACTERISTIC_LAYOUTS,
  CLASSIC_TIMING,
  EXTENDED_TIMING,
  GATT_BOARD_SERVICE,
  type TimingProfile,
} from './constants';

// ============================================================================
// SIMULATION - In-process boards for development and tests
// ============================================================================

export {
  createSimulatedBoard,
  createSimulatedBoardTransport,
  type SimulatedBoard,
  type SimulatedBoardOptions,
  type SimulatedTransportOptions,
  type SimulatedUnlockMode,
} from './adapter/simulated-board';

// ============================================================================
// CONFIGURATION - For custom logging
// ============================================================================

/** Custom logger interface */
export type { Logger } from './logger';
export { enableDebugLogging, resetLogger, setLogger } from './logger';
