import { computeChallengeResponse } from '../challenge-response';
import {
  ALTERNATE_UNLOCK_COMMAND,
  CHARACTERISTIC_LAYOUTS,
  CRX_SIGNATURE,
  DEFAULT_SECRET_KEY,
  DIRECT_UNLOCK_COMMAND,
  GATT_BOARD_SERVICE,
} from '../constants';
import { xorChecksum } from '../buffer-utils';
import { getLogger } from '../logger';
import type {
  Advertisement,
  AuthVariant,
  BoardCharacteristic,
  BoardLink,
  BoardService,
  BoardTransport,
  CharacteristicLayout,
  CharacteristicProperties,
  CharacteristicRole,
  ScanFilter,
  StopScan,
} from '../types';

/** Generic Access service exposed next to the board service */
const GENERIC_ACCESS_SERVICE = '00001800-0000-1000-8000-00805f9b34fb';

/**
 * How a simulated board expects to be unlocked.
 * - 'challenge': CRX challenge-response
 * - 'direct' / 'alternate': the matching fixed unlock command
 */
export type SimulatedUnlockMode = 'challenge' | 'direct' | 'alternate';

export interface SimulatedBoardOptions {
  id?: string;
  /** @default 'Pint 1234' */
  name?: string;
  /** @default -55 */
  rssi?: number;
  address?: string;
  /** Include the board service in the advertisement. @default true */
  advertiseService?: boolean;
  /** @default 'original' */
  layout?: CharacteristicLayout;
  /** Characteristics left out of discovery */
  omitRoles?: readonly CharacteristicRole[];
  /** Value of the firmware revision characteristic */
  firmware?: Uint8Array;
  /** @default 'challenge' */
  unlockMode?: SimulatedUnlockMode;
  /** Variant whose slice rule the board uses to check responses. @default 'classic' */
  challengeVariant?: AuthVariant;
  /**
   * Which write issues the challenge: the firmware revision write, or the
   * firmware bytes written to the write channel.
   * @default 'firmware'
   */
  challengeTrigger?: 'firmware' | 'writeChannel';
  /** 16 bytes placed between the signature and the check byte */
  challengeBody?: Uint8Array;
  /** Split the challenge into notifications of this size. @default 20 */
  challengeChunkSize?: number;
  /** Never send a challenge */
  silent?: boolean;
  /** @default DEFAULT_SECRET_KEY */
  secretKey?: ArrayLike<number>;
  /** The first N connect attempts are refused */
  refuseConnects?: number;
  /** Initial characteristic values by role */
  values?: Partial<Record<CharacteristicRole, Uint8Array>>;
}

export interface SimulatedBoard {
  readonly id: string;
  readonly name: string;
  advertisement(): Advertisement;
  characteristics(): BoardCharacteristic[];
  /** Establishes a link, honouring `refuseConnects` */
  connect(): Promise<BoardLink>;
  isConnected(): boolean;
  isUnlocked(): boolean;
  connectCount(): number;
  /** Payloads written to a role, oldest first */
  writesTo(role: CharacteristicRole): Uint8Array[];
  /** Updates a value and notifies subscribers of that role */
  pushValue(role: CharacteristicRole, value: Uint8Array): void;
  /** Makes writes to a role reject until cleared with null */
  failWrites(role: CharacteristicRole, error: Error | null): void;
  /** Drops the link as if the board went out of range */
  dropLink(): void;
}

const DEFAULT_VALUES: Readonly<Record<CharacteristicRole, readonly number[]>> = {
  serialNumber: [0x39, 0x30],
  rideMode: [0x07, 0x00],
  batteryPercent: [82],
  pitch: [0x00, 0x00],
  roll: [0x00, 0x00],
  yaw: [0x00, 0x00],
  tripOdometer: [0x00, 0x00, 0x00, 0x00],
  rpm: [0x00, 0x00],
  temperature: [0xc4, 0x09],
  firmwareRevision: [0x10, 0x26],
  currentAmps: [0x00, 0x00],
  batteryVoltage: [0x14, 0x17],
  lifetimeOdometer: [0x40, 0x42, 0x0f, 0x00],
  readChannel: [0x00],
  writeChannel: [0x00],
};

/** Readable while locked */
const PUBLIC_ROLES: readonly CharacteristicRole[] = [
  'serialNumber',
  'firmwareRevision',
];

function propertiesFor(role: CharacteristicRole): CharacteristicProperties {
  switch (role) {
    case 'writeChannel':
      return { write: true };
    case 'firmwareRevision':
      return { read: true, write: true, notify: true };
    default:
      return { read: true, notify: true };
  }
}

function sameBytes(a: Uint8Array, b: ArrayLike<number>): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

function buildChallenge(body: Uint8Array): Uint8Array {
  const frame = new Uint8Array(CRX_SIGNATURE.length + body.length + 1);
  frame.set(CRX_SIGNATURE, 0);
  frame.set(body, CRX_SIGNATURE.length);
  frame[frame.length - 1] = xorChecksum(frame.subarray(0, frame.length - 1));
  return frame;
}

/**
 * Creates an in-process board that answers like real hardware: it exposes
 * the board service in either layout, issues a CRX challenge, checks the
 * response and only then serves telemetry.
 */
export function createSimulatedBoard(
  options: SimulatedBoardOptions = {},
): SimulatedBoard {
  const {
    id = 'sim-board-1',
    name = 'Pint 1234',
    rssi = -55,
    address,
    advertiseService = true,
    layout = 'original',
    omitRoles = [],
    unlockMode = 'challenge',
    challengeVariant = 'classic',
    challengeTrigger = 'firmware',
    challengeChunkSize = 20,
    silent = false,
    secretKey = DEFAULT_SECRET_KEY,
  } = options;

  const challenge = buildChallenge(
    options.challengeBody ??
      Uint8Array.from({ length: 16 }, (_, i) => (i * 17 + 5) & 0xff),
  );
  const expectedResponse = computeChallengeResponse(
    challenge,
    challengeVariant,
    secretKey,
  );

  const values = new Map<CharacteristicRole, Uint8Array>();
  for (const [role, bytes] of Object.entries(DEFAULT_VALUES)) {
    if (isRole(role)) values.set(role, Uint8Array.from(bytes));
  }
  if (options.firmware) values.set('firmwareRevision', options.firmware);
  for (const [role, bytes] of Object.entries(options.values ?? {})) {
    if (isRole(role) && bytes) values.set(role, bytes);
  }

  const writes = new Map<CharacteristicRole, Uint8Array[]>();
  const writeFailures = new Map<CharacteristicRole, Error>();
  const notifiers = new Map<CharacteristicRole, (value: Uint8Array) => void>();
  const disconnectCallbacks = new Set<() => void>();
  let connected = false;
  let unlocked = false;
  let connects = 0;
  let refusalsLeft = options.refuseConnects ?? 0;

  function sendChallenge(): void {
    if (silent || unlocked) return;
    const notify = notifiers.get('readChannel');
    if (!notify) return;
    setTimeout(() => {
      for (let i = 0; i < challenge.length; i += challengeChunkSize) {
        notify(challenge.slice(i, i + challengeChunkSize));
      }
    }, 0);
  }

  function handleWrite(role: CharacteristicRole, value: Uint8Array): void {
    const firmware = values.get('firmwareRevision') ?? new Uint8Array();
    if (role === 'firmwareRevision' && challengeTrigger === 'firmware') {
      if (unlockMode === 'challenge') sendChallenge();
      return;
    }
    if (role !== 'writeChannel' || unlocked) return;

    switch (unlockMode) {
      case 'challenge':
        if (sameBytes(value, expectedResponse)) {
          unlocked = true;
        } else if (
          challengeTrigger === 'writeChannel' &&
          sameBytes(value, firmware)
        ) {
          sendChallenge();
        }
        break;
      case 'direct':
        unlocked = sameBytes(value, DIRECT_UNLOCK_COMMAND);
        break;
      case 'alternate':
        unlocked = sameBytes(value, ALTERNATE_UNLOCK_COMMAND);
        break;
    }
  }

  function createCharacteristic(role: CharacteristicRole): BoardCharacteristic {
    const uuid = CHARACTERISTIC_LAYOUTS[layout][role];
    const listeners = new Set<(value: Uint8Array) => void>();
    let notifying = false;

    notifiers.set(role, (value) => {
      if (!notifying || !connected) return;
      for (const listener of listeners) {
        listener(Uint8Array.from(value));
      }
    });

    const requireLink = (): void => {
      if (!connected) throw new Error('Board not connected');
    };

    return {
      uuid,
      properties: propertiesFor(role),

      async readValue(): Promise<Uint8Array> {
        requireLink();
        const value = values.get(role) ?? new Uint8Array();
        if (!unlocked && !PUBLIC_ROLES.includes(role)) {
          return new Uint8Array(value.length);
        }
        return Uint8Array.from(value);
      },

      async writeValueWithResponse(value: Uint8Array): Promise<void> {
        requireLink();
        const failure = writeFailures.get(role);
        if (failure) throw failure;
        const log = writes.get(role) ?? [];
        log.push(Uint8Array.from(value));
        writes.set(role, log);
        handleWrite(role, value);
      },

      async startNotifications(): Promise<void> {
        requireLink();
        notifying = true;
      },

      async stopNotifications(): Promise<void> {
        notifying = false;
      },

      onValueChanged(listener: (value: Uint8Array) => void): () => void {
        listeners.add(listener);
        return () => {
          listeners.delete(listener);
        };
      },
    };
  }

  const roles = Object.keys(CHARACTERISTIC_LAYOUTS[layout])
    .filter(isRole)
    .filter((role) => !omitRoles.includes(role));
  const boardCharacteristics = roles.map(createCharacteristic);

  function release(): void {
    connected = false;
    unlocked = false;
  }

  const link: BoardLink = {
    deviceId: id,
    async discoverServices(): Promise<BoardService[]> {
      if (!connected) throw new Error('Board not connected');
      return [
        { uuid: GENERIC_ACCESS_SERVICE, characteristics: [] },
        { uuid: GATT_BOARD_SERVICE, characteristics: boardCharacteristics },
      ];
    },
    async isConnected(): Promise<boolean> {
      return connected;
    },
    async disconnect(): Promise<void> {
      release();
    },
    onDisconnect(callback: () => void): () => void {
      disconnectCallbacks.add(callback);
      return () => {
        disconnectCallbacks.delete(callback);
      };
    },
  };

  return {
    id,
    name,

    advertisement(): Advertisement {
      return {
        id,
        name,
        rssi,
        serviceUuids: advertiseService ? [GATT_BOARD_SERVICE] : [],
        address,
      };
    },

    characteristics(): BoardCharacteristic[] {
      return [...boardCharacteristics];
    },

    async connect(): Promise<BoardLink> {
      connects++;
      if (refusalsLeft > 0) {
        refusalsLeft--;
        throw new Error('Connection refused');
      }
      connected = true;
      return link;
    },

    isConnected: () => connected,
    isUnlocked: () => unlocked,
    connectCount: () => connects,

    writesTo(role: CharacteristicRole): Uint8Array[] {
      return [...(writes.get(role) ?? [])];
    },

    pushValue(role: CharacteristicRole, value: Uint8Array): void {
      values.set(role, Uint8Array.from(value));
      notifiers.get(role)?.(value);
    },

    failWrites(role: CharacteristicRole, error: Error | null): void {
      if (error) {
        writeFailures.set(role, error);
      } else {
        writeFailures.delete(role);
      }
    },

    dropLink(): void {
      if (!connected) return;
      release();
      for (const callback of [...disconnectCallbacks]) {
        callback();
      }
    },
  };
}

function isRole(value: string): value is CharacteristicRole {
  return value in CHARACTERISTIC_LAYOUTS.original;
}

export interface SimulatedTransportOptions {
  /** Interval between advertisement batches. @default 1000 */
  scanIntervalMs?: number;
}

/**
 * A BoardTransport backed by simulated boards. Scans report every board
 * (subject to the service filter) once immediately and then on each
 * interval; connects resolve against the board with the matching id.
 */
export function createSimulatedBoardTransport(
  boards: readonly SimulatedBoard[],
  options: SimulatedTransportOptions = {},
): BoardTransport {
  const { scanIntervalMs = 1000 } = options;

  return {
    async startScan(
      filter: ScanFilter,
      onBatch: (batch: Advertisement[]) => void,
    ): Promise<StopScan> {
      const report = (): void => {
        const wanted = filter.services.map((s) => s.toLowerCase());
        const batch = boards
          .map((board) => board.advertisement())
          .filter(
            (ad) =>
              wanted.length === 0 ||
              ad.serviceUuids.some((s) => wanted.includes(s.toLowerCase())),
          );
        onBatch(batch);
      };

      const first = setTimeout(report, 0);
      const interval = setInterval(report, scanIntervalMs);
      return async () => {
        clearTimeout(first);
        clearInterval(interval);
      };
    },

    async connect(deviceId: string, timeoutMs: number): Promise<BoardLink> {
      const board = boards.find((b) => b.id === deviceId);
      if (!board) {
        throw new Error(`Unknown device: ${deviceId}`);
      }
      getLogger().debug?.(
        `[Simulator] Connecting to ${deviceId} (timeout ${timeoutMs}ms)`,
      );
      return board.connect();
    },
  };
}
