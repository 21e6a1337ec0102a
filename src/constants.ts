import type { CharacteristicLayout, CharacteristicRole } from './types';

// GATT UUIDs
export const GATT_BOARD_SERVICE = 'e659f300-ea98-11e3-ac10-0800200c9a66';
const GATT_BOARD_UUID_SUFFIX = '-ea98-11e3-ac10-0800200c9a66';

export function toBoardUuid(shortId: string): string {
  return `e659${shortId.toLowerCase()}${GATT_BOARD_UUID_SUFFIX}`;
}

/**
 * Characteristic UUIDs per layout. Boards with older firmware expose the
 * 'original' layout; later firmware moved most slots (and reused some of the
 * original UUIDs for different values), so decoding must know the layout.
 */
export const CHARACTERISTIC_LAYOUTS: Readonly<
  Record<CharacteristicLayout, Readonly<Record<CharacteristicRole, string>>>
> = {
  original: {
    serialNumber: toBoardUuid('f301'),
    rideMode: toBoardUuid('f302'),
    batteryPercent: toBoardUuid('f303'),
    pitch: toBoardUuid('f304'),
    roll: toBoardUuid('f305'),
    yaw: toBoardUuid('f306'),
    tripOdometer: toBoardUuid('f307'),
    rpm: toBoardUuid('f308'),
    temperature: toBoardUuid('f309'),
    firmwareRevision: toBoardUuid('f30a'),
    currentAmps: toBoardUuid('f30b'),
    batteryVoltage: toBoardUuid('f30c'),
    lifetimeOdometer: toBoardUuid('f30d'),
    readChannel: toBoardUuid('f30e'),
    writeChannel: toBoardUuid('f30f'),
  },
  revised: {
    serialNumber: toBoardUuid('f301'),
    rideMode: toBoardUuid('f302'),
    batteryPercent: toBoardUuid('f303'),
    pitch: toBoardUuid('f307'),
    roll: toBoardUuid('f308'),
    yaw: toBoardUuid('f309'),
    tripOdometer: toBoardUuid('f30a'),
    rpm: toBoardUuid('f30b'),
    temperature: toBoardUuid('f310'),
    firmwareRevision: toBoardUuid('f311'),
    currentAmps: toBoardUuid('f312'),
    batteryVoltage: toBoardUuid('f316'),
    lifetimeOdometer: toBoardUuid('f319'),
    readChannel: toBoardUuid('f3fe'),
    writeChannel: toBoardUuid('f3ff'),
  },
};

/** Any of these present after discovery means the revised layout. */
export const REVISED_LAYOUT_MARKERS: readonly string[] = [
  toBoardUuid('f311'),
  toBoardUuid('f3fe'),
  toBoardUuid('f3ff'),
] as const;

// Device discovery
export const DEFAULT_NAME_FRAGMENTS: readonly string[] = [
  'onewheel',
  'ow',
  'future motion',
  'fm',
  'pint',
  'xr',
  'gt',
] as const;

/** Manufacturer OUI prefixes seen on boards */
export const DEFAULT_OUI_PREFIXES: readonly string[] = [
  '00:13:43',
  '00:1B:63',
] as const;

/** Advertisements weaker than this are never candidates */
export const DEFAULT_MIN_RSSI_DBM = -80;

export const SCAN_TIMEOUT_MS = 20000;

// Challenge-response
export const CRX_SIGNATURE: readonly number[] = [0x43, 0x52, 0x58] as const;
export const CRX_DIGEST_LENGTH = 16;
export const CRX_RESPONSE_LENGTH = CRX_SIGNATURE.length + CRX_DIGEST_LENGTH + 1;
export const MIN_CHALLENGE_LENGTH_FOR_RESPONSE = 4;

/** Fixed MD5 key appended to the challenge slice */
export const DEFAULT_SECRET_KEY: readonly number[] = [
  0xd9, 0x25, 0x5f, 0x0f, 0x23, 0x35, 0x4e, 0x19, 0xba, 0x73, 0x9c, 0xcd, 0xc4,
  0xa9, 0x17, 0x65,
] as const;

export const CLASSIC_CHALLENGE_MIN_LENGTH = 20;
export const CLASSIC_CHALLENGE_TIMEOUT_MS = 15000;
export const MODIFIED_CHALLENGE_MIN_LENGTH = 10;
export const MODIFIED_CHALLENGE_TIMEOUT_MS = 25000;

/** Wait after writing a response before the board is considered unlocked */
export const RESPONSE_SETTLE_MS = 100;

/**
 * Unlock commands written to the write channel by the newer-board
 * strategies. These are unconfirmed captures, kept overridable.
 */
export const DIRECT_UNLOCK_COMMAND: readonly number[] = [
  0x43, 0x52, 0x58, 0x55, 0x4e, 0x4c, 0x4f, 0x43, 0x4b,
] as const;
export const ALTERNATE_UNLOCK_COMMAND: readonly number[] = [
  0x55, 0x4e, 0x4c, 0x4f, 0x43, 0x4b, 0x00, 0x01,
] as const;

/** Pause between subscribing and writing an unlock command */
export const UNLOCK_PAUSE_MS = 500;

export const WAKE_UP_ROLES: readonly CharacteristicRole[] = [
  'serialNumber',
  'firmwareRevision',
  'rideMode',
  'batteryPercent',
] as const;

/** Subscribed first, in order, on the extended profile */
export const PRIORITY_SUBSCRIPTION_ROLES: readonly CharacteristicRole[] = [
  'batteryPercent',
  'pitch',
  'roll',
  'batteryVoltage',
  'rpm',
  'readChannel',
] as const;

export const PRIORITY_SUBSCRIPTION_DELAY_MS = 100;

// Liveness
export const HEARTBEAT_INTERVAL_MS = 15000;
export const WATCHDOG_INTERVAL_MS = 5000;
export const MAX_HEARTBEAT_FAILURES = 1;
export const CLASSIC_KEEPALIVE_INTERVAL_MS = 20000;
export const EXTENDED_KEEPALIVE_INTERVAL_MS = 30000;

// Per-operation timeouts
export const BLE_READ_TIMEOUT_MS = 5000;
export const BLE_WRITE_TIMEOUT_MS = 10000;
export const BLE_NOTIFICATION_TIMEOUT_MS = 15000;

/** Linear backoff step between firmware read attempts */
export const FIRMWARE_READ_BACKOFF_MS = 200;

/**
 * Timing profile for one connection attempt. The extended profile is used
 * for newer boards, which are slower to accept a link and to answer.
 */
export interface TimingProfile {
  connectAttempts: number;
  /** Linear backoff step: attempt n waits n * connectBackoffMs */
  connectBackoffMs: number;
  connectTimeoutMs: number;
  /** Delay between reaching 'connected' and the first watchdog poll cycle */
  watchdogGraceMs: number;
  discoveryTimeoutMs: number;
  firmwareReadAttempts: number;
}

export const CLASSIC_TIMING: Readonly<TimingProfile> = {
  connectAttempts: 3,
  connectBackoffMs: 500,
  connectTimeoutMs: 15000,
  watchdogGraceMs: 2000,
  discoveryTimeoutMs: 10000,
  firmwareReadAttempts: 3,
};

export const EXTENDED_TIMING: Readonly<TimingProfile> = {
  connectAttempts: 5,
  connectBackoffMs: 800,
  connectTimeoutMs: 25000,
  watchdogGraceMs: 5000,
  discoveryTimeoutMs: 15000,
  firmwareReadAttempts: 5,
};

/**
 * Wheel circumference used to estimate ground speed from motor RPM.
 */
export const WHEEL_CIRCUMFERENCE_M = 0.91;
