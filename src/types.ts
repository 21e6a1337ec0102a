/**
 * Connection lifecycle state.
 * - 'disconnected': No active session
 * - 'scanning': Advertisement scan in progress
 * - 'connecting': Link establishment in progress (bounded retries)
 * - 'connected': Link up, service discovery in progress
 * - 'authenticating': Unlock handshake in progress
 * - 'authenticated': Telemetry unlocked and subscribed
 * - 'error': Escalated failure, teardown pending
 */
export type ConnectionState =
  | 'disconnected'
  | 'scanning'
  | 'connecting'
  | 'connected'
  | 'authenticating'
  | 'authenticated'
  | 'error';

/**
 * One advertisement record reported by the transport during a scan.
 */
export interface Advertisement {
  /** Transport-specific device identifier */
  id: string;
  /** Advertised local name (may be empty) */
  name: string;
  /** Received signal strength in dBm */
  rssi: number;
  /** Advertised service UUIDs */
  serviceUuids: string[];
  /** Hardware address, when the platform exposes it */
  address?: string;
}

/**
 * A discovered device that passed the board filter.
 */
export interface DeviceCandidate {
  id: string;
  name: string;
  rssi: number;
  serviceUuids: string[];
}

/**
 * Scan filter forwarded to the transport.
 */
export interface ScanFilter {
  /** Restrict the scan to devices advertising these services. Empty means no restriction. */
  services: string[];
}

/** Stops a running scan. Safe to call more than once. */
export type StopScan = () => Promise<void>;

/**
 * Properties indicating which operations a characteristic supports.
 */
export interface CharacteristicProperties {
  read?: boolean;
  write?: boolean;
  writeWithoutResponse?: boolean;
  notify?: boolean;
  indicate?: boolean;
}

/**
 * A GATT characteristic on the board.
 *
 * @remarks
 * Implementations must deliver notification payloads to every listener
 * registered through `onValueChanged`, in arrival order.
 */
export interface BoardCharacteristic {
  /** The UUID of this characteristic */
  readonly uuid: string;

  readonly properties: CharacteristicProperties;

  /** Reads the current value. */
  readValue(): Promise<Uint8Array>;

  /**
   * Writes a value and waits for acknowledgment.
   * @throws Error if the write fails
   */
  writeValueWithResponse(value: Uint8Array): Promise<void>;

  /** Enables notifications on the board side. */
  startNotifications(): Promise<void>;

  /** Disables notifications on the board side. */
  stopNotifications(): Promise<void>;

  /**
   * Registers a listener for notification payloads.
   * @returns A function to unregister the listener
   */
  onValueChanged(listener: (value: Uint8Array) => void): () => void;
}

/**
 * A primary GATT service and its characteristics.
 */
export interface BoardService {
  readonly uuid: string;
  readonly characteristics: BoardCharacteristic[];
}

/**
 * An established link to a board.
 */
export interface BoardLink {
  readonly deviceId: string;

  /** Discovers all primary services with their characteristics. */
  discoverServices(): Promise<BoardService[]>;

  /** Reports whether the underlying link is still up. Polled by the watchdog. */
  isConnected(): Promise<boolean>;

  /**
   * Releases the link.
   * Should be idempotent - safe to call multiple times.
   */
  disconnect(): Promise<void>;

  /**
   * Registers a callback for unexpected link loss.
   * @returns A function to unregister the callback
   */
  onDisconnect?(callback: () => void): () => void;
}

/**
 * Wireless backend consumed by the manager.
 *
 * @example Custom transport
 * ```typescript
 * const transport: BoardTransport = {
 *   async startScan(filter, onBatch) {
 *     const scanner = await myStack.scan(filter.services);
 *     scanner.on('batch', (records) => onBatch(records.map(toAdvertisement)));
 *     return () => scanner.stop();
 *   },
 *   async connect(deviceId, timeoutMs) {
 *     return wrapLink(await myStack.connect(deviceId, { timeoutMs }));
 *   },
 * };
 * ```
 */
export interface BoardTransport {
  /**
   * Starts scanning. Batches of advertisements are delivered to `onBatch`
   * until the returned stop function is called.
   */
  startScan(
    filter: ScanFilter,
    onBatch: (batch: Advertisement[]) => void,
  ): Promise<StopScan>;

  /**
   * Connects to a device. Implementations must give up after `timeoutMs`.
   */
  connect(deviceId: string, timeoutMs: number): Promise<BoardLink>;
}

/**
 * Board model label derived from the advertised name and firmware.
 */
export type BoardModel = 'GT-S' | 'GT' | 'Pint' | 'XR' | 'Unknown';

/**
 * Authentication variant. Each variant owns an ordered strategy plan.
 */
export type AuthVariant = 'classic' | 'gt' | 'gts' | 'unknown';

/**
 * Characteristic UUID layout, which differs across firmware revisions.
 */
export type CharacteristicLayout = 'original' | 'revised';

/**
 * Named slots on the board service.
 */
export type CharacteristicRole =
  | 'serialNumber'
  | 'rideMode'
  | 'batteryPercent'
  | 'pitch'
  | 'roll'
  | 'yaw'
  | 'tripOdometer'
  | 'rpm'
  | 'temperature'
  | 'firmwareRevision'
  | 'currentAmps'
  | 'batteryVoltage'
  | 'lifetimeOdometer'
  | 'readChannel'
  | 'writeChannel';

/**
 * Latest decoded telemetry. A single instance is shared per manager and
 * updated field-by-field, so readers may observe a partially updated record.
 */
export interface TelemetrySnapshot {
  /** Battery charge in percent */
  batteryPercent: number;
  /** Degrees */
  pitch: number;
  /** Degrees */
  roll: number;
  /** Degrees */
  yaw: number;
  /** Motor revolutions per minute */
  rpm: number;
  /** Degrees Celsius */
  motorTemperature: number;
  /** Amperes, negative while charging */
  currentAmps: number;
  /** Volts */
  batteryVoltage: number;
  /** Kilometres */
  tripOdometerKm: number;
  /** Kilometres */
  lifetimeOdometerKm: number;
  rideMode: number | null;
  serialNumber: number | null;
  hardwareRevision: number | null;
  /** Epoch milliseconds of the last applied update, 0 before the first */
  timestamp: number;
}

export function createDefaultSnapshot(): TelemetrySnapshot {
  return {
    batteryPercent: 0,
    pitch: 0,
    roll: 0,
    yaw: 0,
    rpm: 0,
    motorTemperature: 0,
    currentAmps: 0,
    batteryVoltage: 0,
    tripOdometerKm: 0,
    lifetimeOdometerKm: 0,
    rideMode: null,
    serialNumber: null,
    hardwareRevision: null,
    timestamp: 0,
  };
}

/**
 * Resets a snapshot in place so existing references keep observing it.
 */
export function resetSnapshot(snapshot: TelemetrySnapshot): void {
  Object.assign(snapshot, createDefaultSnapshot());
}
