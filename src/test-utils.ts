import { vi } from 'vitest';
import { CHARACTERISTIC_LAYOUTS, GATT_BOARD_SERVICE } from './constants';
import type { Logger } from './logger';
import type {
  Advertisement,
  BoardCharacteristic,
  BoardLink,
  BoardService,
  BoardTransport,
  CharacteristicLayout,
  CharacteristicProperties,
  CharacteristicRole,
  ScanFilter,
  StopScan,
} from './types';

export interface MockCharacteristicOptions {
  uuid?: string;
  properties?: CharacteristicProperties;
  /** Value returned by readValue() */
  value?: Uint8Array;
  readDelay?: number;
  readShouldFail?: boolean;
  readFailError?: Error;
  writeDelay?: number;
  writeShouldFail?: boolean;
  writeFailError?: Error;
  startNotificationsShouldFail?: boolean;
  startNotificationsFailError?: Error;
}

export interface MockCharacteristic extends BoardCharacteristic {
  simulateNotification(data: Uint8Array | number[]): void;
  getWrittenValues(): Uint8Array[];
  getReadCount(): number;
  getListenerCount(): number;
  wasStartNotificationsCalled(): boolean;
  wasStopNotificationsCalled(): boolean;
  setValue(value: Uint8Array): void;
  /** Queue values returned by the next reads before falling back to `value` */
  queueReads(...values: Array<Uint8Array | Error>): void;
  /** Set a dynamic write delay (number in ms or Promise to await) */
  setWriteDelay(delay: number | Promise<void>): void;
  setWriteFailure(error: Error | null): void;
  /** Delay startNotifications() (number in ms or Promise to await) */
  setStartNotificationsDelay(delay: number | Promise<void>): void;
  /** Called after every successful write */
  onWrite(handler: (value: Uint8Array) => void): void;
}

async function wait(delayMs: number | Promise<void>): Promise<void> {
  if (typeof delayMs === 'number' && delayMs > 0) {
    await new Promise((resolve) => setTimeout(resolve, delayMs));
  } else if (delayMs instanceof Promise) {
    await delayMs;
  }
}

export function createMockCharacteristic(
  options: MockCharacteristicOptions = {},
): MockCharacteristic {
  const {
    uuid = CHARACTERISTIC_LAYOUTS.original.batteryPercent,
    properties = { read: true, notify: true },
    readDelay = 0,
    readShouldFail = false,
    readFailError = new Error('Read failed'),
    writeDelay = 0,
    writeShouldFail = false,
    startNotificationsShouldFail = false,
    startNotificationsFailError = new Error('startNotifications failed'),
  } = options;

  const listeners = new Set<(value: Uint8Array) => void>();
  const writtenValues: Uint8Array[] = [];
  const readQueue: Array<Uint8Array | Error> = [];
  let currentValue = options.value ?? Uint8Array.of(0x01);
  let readCount = 0;
  let startNotificationsCalled = false;
  let stopNotificationsCalled = false;
  let dynamicWriteDelay: number | Promise<void> = writeDelay;
  let startNotificationsDelay: number | Promise<void> = 0;
  let writeFailure: Error | null = writeShouldFail
    ? (options.writeFailError ?? new Error('Write failed'))
    : null;
  let writeHandler: ((value: Uint8Array) => void) | null = null;

  return {
    uuid,
    properties,

    async readValue(): Promise<Uint8Array> {
      readCount++;
      await wait(readDelay);
      const queued = readQueue.shift();
      if (queued instanceof Error) throw queued;
      if (queued) return queued;
      if (readShouldFail) throw readFailError;
      return currentValue;
    },

    async writeValueWithResponse(value: Uint8Array): Promise<void> {
      await wait(dynamicWriteDelay);
      if (writeFailure) {
        throw writeFailure;
      }
      writtenValues.push(Uint8Array.from(value));
      writeHandler?.(value);
    },

    async startNotifications(): Promise<void> {
      startNotificationsCalled = true;
      await wait(startNotificationsDelay);
      if (startNotificationsShouldFail) {
        throw startNotificationsFailError;
      }
    },

    async stopNotifications(): Promise<void> {
      stopNotificationsCalled = true;
    },

    onValueChanged(listener: (value: Uint8Array) => void): () => void {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },

    simulateNotification(data: Uint8Array | number[]): void {
      const bytes = Uint8Array.from(data);
      for (const listener of [...listeners]) {
        listener(bytes);
      }
    },

    getWrittenValues(): Uint8Array[] {
      return [...writtenValues];
    },

    getReadCount(): number {
      return readCount;
    },

    getListenerCount(): number {
      return listeners.size;
    },

    wasStartNotificationsCalled(): boolean {
      return startNotificationsCalled;
    },

    wasStopNotificationsCalled(): boolean {
      return stopNotificationsCalled;
    },

    setValue(value: Uint8Array): void {
      currentValue = value;
    },

    queueReads(...values: Array<Uint8Array | Error>): void {
      readQueue.push(...values);
    },

    setWriteDelay(delayMs: number | Promise<void>): void {
      dynamicWriteDelay = delayMs;
    },

    setWriteFailure(error: Error | null): void {
      writeFailure = error;
    },

    setStartNotificationsDelay(delayMs: number | Promise<void>): void {
      startNotificationsDelay = delayMs;
    },

    onWrite(handler: (value: Uint8Array) => void): void {
      writeHandler = handler;
    },
  };
}

export type MockBoardCharacteristics = Record<
  CharacteristicRole,
  MockCharacteristic
>;

/**
 * One mock characteristic per role, with the UUIDs of the given layout.
 */
export function createBoardCharacteristics(
  layout: CharacteristicLayout = 'original',
): MockBoardCharacteristics {
  const uuids = CHARACTERISTIC_LAYOUTS[layout];
  const make = (
    role: CharacteristicRole,
    properties: CharacteristicProperties = { read: true, notify: true },
  ): MockCharacteristic =>
    createMockCharacteristic({ uuid: uuids[role], properties });

  return {
    serialNumber: make('serialNumber'),
    rideMode: make('rideMode'),
    batteryPercent: make('batteryPercent'),
    pitch: make('pitch'),
    roll: make('roll'),
    yaw: make('yaw'),
    tripOdometer: make('tripOdometer'),
    rpm: make('rpm'),
    temperature: make('temperature'),
    firmwareRevision: make('firmwareRevision', {
      read: true,
      write: true,
      notify: true,
    }),
    currentAmps: make('currentAmps'),
    batteryVoltage: make('batteryVoltage'),
    lifetimeOdometer: make('lifetimeOdometer'),
    readChannel: make('readChannel'),
    writeChannel: make('writeChannel', { write: true }),
  };
}

export interface MockServiceOptions {
  uuid?: string;
  characteristics?: BoardCharacteristic[];
}

export function createMockService(
  options: MockServiceOptions = {},
): BoardService {
  const { uuid = GATT_BOARD_SERVICE, characteristics = [] } = options;
  return { uuid, characteristics };
}

export interface MockLinkOptions {
  deviceId?: string;
  services?: BoardService[];
  discoverDelay?: number;
  discoverShouldFail?: boolean;
  disconnectShouldFail?: boolean;
  disconnectFailError?: Error;
}

export interface MockLink extends BoardLink {
  onDisconnect(callback: () => void): () => void;
  wasDisconnectCalled(): boolean;
  getDisconnectCallCount(): number;
  setConnected(connected: boolean): void;
  setConnectedCheckFailure(error: Error | null): void;
  /** Fires the registered disconnect callbacks */
  simulateDisconnect(): void;
}

export function createMockLink(options: MockLinkOptions = {}): MockLink {
  const {
    deviceId = 'board-1',
    services = [],
    discoverDelay = 0,
    discoverShouldFail = false,
    disconnectShouldFail = false,
    disconnectFailError = new Error('Disconnect failed'),
  } = options;

  const callbacks = new Set<() => void>();
  let disconnectCalls = 0;
  let connected = true;
  let connectedCheckFailure: Error | null = null;

  return {
    deviceId,

    async discoverServices(): Promise<BoardService[]> {
      await wait(discoverDelay);
      if (discoverShouldFail) {
        throw new Error('Discovery failed');
      }
      return services;
    },

    async isConnected(): Promise<boolean> {
      if (connectedCheckFailure) throw connectedCheckFailure;
      return connected;
    },

    async disconnect(): Promise<void> {
      disconnectCalls++;
      connected = false;
      if (disconnectShouldFail) {
        throw disconnectFailError;
      }
    },

    onDisconnect(callback: () => void): () => void {
      callbacks.add(callback);
      return () => {
        callbacks.delete(callback);
      };
    },

    wasDisconnectCalled(): boolean {
      return disconnectCalls > 0;
    },

    getDisconnectCallCount(): number {
      return disconnectCalls;
    },

    setConnected(value: boolean): void {
      connected = value;
    },

    setConnectedCheckFailure(error: Error | null): void {
      connectedCheckFailure = error;
    },

    simulateDisconnect(): void {
      connected = false;
      for (const callback of [...callbacks]) {
        callback();
      }
    },
  };
}

export interface MockTransportOptions {
  link?: BoardLink;
  /** Number of leading connect calls that reject */
  connectFailures?: number;
  connectFailError?: Error;
  connectDelay?: number;
  scanShouldFail?: boolean;
}

export interface MockTransport extends BoardTransport {
  getConnectCallCount(): number;
  getLastConnectTimeout(): number | undefined;
  getLastScanFilter(): ScanFilter | undefined;
  isScanning(): boolean;
  /** Delivers a batch to the active scan */
  emitAdvertisements(batch: Advertisement[]): void;
  setLink(link: BoardLink): void;
  setConnectHandler(handler: (deviceId: string) => Promise<BoardLink>): void;
}

export function createMockTransport(
  options: MockTransportOptions = {},
): MockTransport {
  const {
    connectFailError = new Error('Connect failed'),
    connectDelay = 0,
    scanShouldFail = false,
  } = options;

  let link: BoardLink = options.link ?? createMockLink();
  let failuresLeft = options.connectFailures ?? 0;
  let connectCallCount = 0;
  let lastConnectTimeout: number | undefined;
  let lastScanFilter: ScanFilter | undefined;
  let onBatch: ((batch: Advertisement[]) => void) | null = null;
  let connectHandler: ((deviceId: string) => Promise<BoardLink>) | null =
    null;

  return {
    async startScan(
      filter: ScanFilter,
      callback: (batch: Advertisement[]) => void,
    ): Promise<StopScan> {
      lastScanFilter = filter;
      if (scanShouldFail) {
        throw new Error('Bluetooth adapter off');
      }
      onBatch = callback;
      return async () => {
        onBatch = null;
      };
    },

    async connect(deviceId: string, timeoutMs: number): Promise<BoardLink> {
      connectCallCount++;
      lastConnectTimeout = timeoutMs;
      await wait(connectDelay);
      if (connectHandler) {
        return connectHandler(deviceId);
      }
      if (failuresLeft > 0) {
        failuresLeft--;
        throw connectFailError;
      }
      return link;
    },

    getConnectCallCount(): number {
      return connectCallCount;
    },

    getLastConnectTimeout(): number | undefined {
      return lastConnectTimeout;
    },

    getLastScanFilter(): ScanFilter | undefined {
      return lastScanFilter;
    },

    isScanning(): boolean {
      return onBatch !== null;
    },

    emitAdvertisements(batch: Advertisement[]): void {
      onBatch?.(batch);
    },

    setLink(newLink: BoardLink): void {
      link = newLink;
    },

    setConnectHandler(
      handler: (deviceId: string) => Promise<BoardLink>,
    ): void {
      connectHandler = handler;
    },
  };
}

export function createAdvertisement(
  overrides: Partial<Advertisement> = {},
): Advertisement {
  return {
    id: 'board-1',
    name: 'Pint 1234',
    rssi: -55,
    serviceUuids: [GATT_BOARD_SERVICE],
    ...overrides,
  };
}

export interface MockLogger extends Logger {
  debug: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
}

export function createMockLogger(): MockLogger {
  return {
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export function createDeferred<T>(): Deferred<T> {
  let resolve!: (value: T) => void;
  let reject!: (error: Error) => void;

  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });

  return { promise, resolve, reject };
}

export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
