import { CHARACTERISTIC_LAYOUTS, REVISED_LAYOUT_MARKERS } from './constants';
import { CharacteristicsMissingError } from './errors';
import type {
  BoardCharacteristic,
  CharacteristicLayout,
  CharacteristicRole,
} from './types';

/**
 * Characteristics of the board service for the current connection,
 * keyed by lower-cased UUID.
 */
export interface CharacteristicRegistry {
  /** Replaces the registry contents and re-detects the layout. */
  populate(characteristics: readonly BoardCharacteristic[]): void;
  get(uuid: string): BoardCharacteristic | undefined;
  getByRole(role: CharacteristicRole): BoardCharacteristic | undefined;
  /**
   * Resolves several roles at once.
   * @throws CharacteristicsMissingError naming every role that is absent
   */
  requireRoles<R extends CharacteristicRole>(
    roles: readonly R[],
  ): Record<R, BoardCharacteristic>;
  notifyCapable(): BoardCharacteristic[];
  entries(): [string, BoardCharacteristic][];
  layout(): CharacteristicLayout;
  size(): number;
  clear(): void;
}

export function detectLayout(uuids: Iterable<string>): CharacteristicLayout {
  for (const uuid of uuids) {
    if (REVISED_LAYOUT_MARKERS.includes(uuid.toLowerCase())) {
      return 'revised';
    }
  }
  return 'original';
}

export function createCharacteristicRegistry(): CharacteristicRegistry {
  const characteristics = new Map<string, BoardCharacteristic>();
  let currentLayout: CharacteristicLayout = 'original';

  function populate(list: readonly BoardCharacteristic[]): void {
    characteristics.clear();
    for (const c of list) {
      characteristics.set(c.uuid.toLowerCase(), c);
    }
    currentLayout = detectLayout(characteristics.keys());
  }

  function get(uuid: string): BoardCharacteristic | undefined {
    return characteristics.get(uuid.toLowerCase());
  }

  function getByRole(role: CharacteristicRole): BoardCharacteristic | undefined {
    return characteristics.get(CHARACTERISTIC_LAYOUTS[currentLayout][role]);
  }

  function requireRoles<R extends CharacteristicRole>(
    roles: readonly R[],
  ): Record<R, BoardCharacteristic> {
    const found: Partial<Record<R, BoardCharacteristic>> = {};
    const missing: string[] = [];
    for (const role of roles) {
      const c = getByRole(role);
      if (c) {
        found[role] = c;
      } else {
        missing.push(role);
      }
    }
    if (!isComplete(found, roles)) {
      throw new CharacteristicsMissingError(missing);
    }
    return found;
  }

  function notifyCapable(): BoardCharacteristic[] {
    return [...characteristics.values()].filter(
      (c) => c.properties.notify || c.properties.indicate,
    );
  }

  function entries(): [string, BoardCharacteristic][] {
    return [...characteristics.entries()];
  }

  function layout(): CharacteristicLayout {
    return currentLayout;
  }

  function size(): number {
    return characteristics.size;
  }

  function clear(): void {
    characteristics.clear();
    currentLayout = 'original';
  }

  return {
    populate,
    get,
    getByRole,
    requireRoles,
    notifyCapable,
    entries,
    layout,
    size,
    clear,
  };
}

function isComplete<R extends CharacteristicRole>(
  found: Partial<Record<R, BoardCharacteristic>>,
  roles: readonly R[],
): found is Record<R, BoardCharacteristic> {
  return roles.every((role) => found[role] !== undefined);
}
