import {
  readByte,
  readInt16LE,
  readUint16LE,
  readUint32LE,
} from './buffer-utils';
import { CHARACTERISTIC_LAYOUTS, WHEEL_CIRCUMFERENCE_M } from './constants';
import { TelemetryDecodeError } from './errors';
import type {
  CharacteristicLayout,
  CharacteristicRole,
  TelemetrySnapshot,
} from './types';

/** Snapshot fields written by the codec */
export type TelemetryField = Exclude<keyof TelemetrySnapshot, 'timestamp'>;

export interface DecodedValue {
  field: TelemetryField;
  value: number;
}

interface DecodeRule {
  field: TelemetryField;
  /** Minimum payload length in bytes */
  length: number;
  read(bytes: Uint8Array): number;
}

const unsigned8 = (bytes: Uint8Array) => readByte(bytes, 0);
const unsigned16 = (bytes: Uint8Array) => readUint16LE(bytes, 0);
const signedHundredths = (bytes: Uint8Array) => readInt16LE(bytes, 0) / 100;
const thousandths32 = (bytes: Uint8Array) => readUint32LE(bytes, 0) / 1000;

/**
 * Decode rules by role. Read and write channels carry protocol frames, not
 * telemetry, and have no rule.
 */
const DECODE_RULES: Readonly<Partial<Record<CharacteristicRole, DecodeRule>>> =
  {
    batteryPercent: { field: 'batteryPercent', length: 1, read: unsigned8 },
    pitch: { field: 'pitch', length: 2, read: signedHundredths },
    roll: { field: 'roll', length: 2, read: signedHundredths },
    yaw: { field: 'yaw', length: 2, read: signedHundredths },
    temperature: {
      field: 'motorTemperature',
      length: 2,
      read: signedHundredths,
    },
    currentAmps: { field: 'currentAmps', length: 2, read: signedHundredths },
    batteryVoltage: {
      field: 'batteryVoltage',
      length: 2,
      read: signedHundredths,
    },
    rpm: { field: 'rpm', length: 2, read: unsigned16 },
    tripOdometer: { field: 'tripOdometerKm', length: 4, read: thousandths32 },
    lifetimeOdometer: {
      field: 'lifetimeOdometerKm',
      length: 4,
      read: thousandths32,
    },
    rideMode: { field: 'rideMode', length: 2, read: unsigned16 },
    serialNumber: { field: 'serialNumber', length: 2, read: unsigned16 },
    firmwareRevision: {
      field: 'hardwareRevision',
      length: 2,
      read: unsigned16,
    },
  };

function buildRoleIndex(
  layout: CharacteristicLayout,
): ReadonlyMap<string, CharacteristicRole> {
  const index = new Map<string, CharacteristicRole>();
  for (const [role, uuid] of Object.entries(CHARACTERISTIC_LAYOUTS[layout])) {
    if (isCharacteristicRole(role)) {
      index.set(uuid, role);
    }
  }
  return index;
}

function isCharacteristicRole(value: string): value is CharacteristicRole {
  return value in CHARACTERISTIC_LAYOUTS.original;
}

const ROLE_INDEX: Readonly<
  Record<CharacteristicLayout, ReadonlyMap<string, CharacteristicRole>>
> = {
  original: buildRoleIndex('original'),
  revised: buildRoleIndex('revised'),
};

export function roleForUuid(
  layout: CharacteristicLayout,
  uuid: string,
): CharacteristicRole | null {
  return ROLE_INDEX[layout].get(uuid.toLowerCase()) ?? null;
}

/**
 * Decodes one characteristic payload.
 *
 * @returns The decoded field, or null when the characteristic carries no
 *   telemetry (unknown UUID, read or write channel)
 * @throws TelemetryDecodeError if the payload is shorter than the field needs
 */
export function decodeCharacteristic(
  layout: CharacteristicLayout,
  uuid: string,
  payload: Uint8Array,
): DecodedValue | null {
  const role = roleForUuid(layout, uuid);
  if (!role) return null;
  const rule = DECODE_RULES[role];
  if (!rule) return null;

  if (payload.length < rule.length) {
    throw new TelemetryDecodeError(uuid, rule.length, payload.length);
  }
  return { field: rule.field, value: rule.read(payload) };
}

/**
 * Writes one decoded value into the shared snapshot and stamps it.
 */
export function applyDecodedValue(
  snapshot: TelemetrySnapshot,
  decoded: DecodedValue,
  now: number = Date.now(),
): void {
  snapshot[decoded.field] = decoded.value;
  snapshot.timestamp = now;
}

export type BatteryBand = 'Full' | 'Good' | 'Medium' | 'Low' | 'Critical';

export interface RideMetrics {
  /** Estimated ground speed from motor RPM */
  speedKmh: number;
  /** Negative current means the pack is charging */
  isCharging: boolean;
  isRiding: boolean;
  batteryBand: BatteryBand;
}

export function batteryBand(percent: number): BatteryBand {
  if (percent > 80) return 'Full';
  if (percent > 60) return 'Good';
  if (percent > 40) return 'Medium';
  if (percent > 20) return 'Low';
  return 'Critical';
}

export function deriveRideMetrics(
  snapshot: Readonly<TelemetrySnapshot>,
  wheelCircumferenceM: number = WHEEL_CIRCUMFERENCE_M,
): RideMetrics {
  // rev/min * m/rev * 60 min/h / 1000 m/km
  const speedKmh = (Math.abs(snapshot.rpm) * wheelCircumferenceM * 60) / 1000;
  return {
    speedKmh,
    isCharging: snapshot.currentAmps < 0,
    isRiding: speedKmh > 0.1,
    batteryBand: batteryBand(snapshot.batteryPercent),
  };
}
