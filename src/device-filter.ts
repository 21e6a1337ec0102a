import {
  DEFAULT_MIN_RSSI_DBM,
  DEFAULT_NAME_FRAGMENTS,
  DEFAULT_OUI_PREFIXES,
  GATT_BOARD_SERVICE,
} from './constants';
import type { Advertisement, DeviceCandidate } from './types';

/**
 * Overrides for the board candidate heuristics.
 */
export interface DeviceFilterOptions {
  /**
   * Name fragments matched case-insensitively anywhere in the advertised name.
   * @default ['onewheel', 'ow', 'future motion', 'fm', 'pint', 'xr', 'gt']
   */
  nameFragments?: readonly string[];
  /**
   * Manufacturer address prefixes. Separators are ignored when matching.
   * @default ['00:13:43', '00:1B:63']
   */
  ouiPrefixes?: readonly string[];
  /**
   * Weakest accepted signal strength in dBm.
   * @default -80
   */
  minRssi?: number;
}

function normalizeAddress(address: string): string {
  return address.replace(/[:-]/g, '').toUpperCase();
}

function matchesName(name: string, fragments: readonly string[]): boolean {
  const lowered = name.trim().toLowerCase();
  if (!lowered) return false;
  return fragments.some((fragment) => lowered.includes(fragment.toLowerCase()));
}

function matchesOui(
  address: string | undefined,
  prefixes: readonly string[],
): boolean {
  if (!address) return false;
  const normalized = normalizeAddress(address);
  return prefixes.some((prefix) =>
    normalized.startsWith(normalizeAddress(prefix)),
  );
}

function advertisesBoardService(serviceUuids: readonly string[]): boolean {
  return serviceUuids.some(
    (uuid) => uuid.toLowerCase() === GATT_BOARD_SERVICE,
  );
}

/**
 * Classifies one advertisement.
 * A board candidate has an acceptable signal and either a known name
 * fragment, or a known manufacturer prefix together with the board service.
 */
export function isBoardCandidate(
  ad: Advertisement,
  options: DeviceFilterOptions = {},
): boolean {
  const {
    nameFragments = DEFAULT_NAME_FRAGMENTS,
    ouiPrefixes = DEFAULT_OUI_PREFIXES,
    minRssi = DEFAULT_MIN_RSSI_DBM,
  } = options;

  if (!Number.isFinite(ad.rssi) || ad.rssi < minRssi) {
    return false;
  }

  return (
    matchesName(ad.name, nameFragments) ||
    (matchesOui(ad.address, ouiPrefixes) &&
      advertisesBoardService(ad.serviceUuids))
  );
}

export function toCandidate(ad: Advertisement): DeviceCandidate {
  return {
    id: ad.id,
    name: ad.name,
    rssi: ad.rssi,
    serviceUuids: [...ad.serviceUuids],
  };
}

/**
 * Folds a scan batch into the candidate map. Each identifier keeps the
 * record from its latest advertisement.
 *
 * @returns true if any candidate was added or replaced
 */
export function mergeCandidates(
  candidates: Map<string, DeviceCandidate>,
  batch: readonly Advertisement[],
  options: DeviceFilterOptions = {},
): boolean {
  let changed = false;
  for (const ad of batch) {
    if (isBoardCandidate(ad, options)) {
      candidates.set(ad.id, toCandidate(ad));
      changed = true;
    }
  }
  return changed;
}
