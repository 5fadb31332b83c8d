/**
 * Value parsers for collected records
 *
 * Collectors return loosely formatted strings (`"1000 Mbit"`, `"a-full"`,
 * `"10,20,30-32"`). These helpers turn them into the canonical values the
 * entity model and the registry use.
 */

import type { Duplex, EnabledMode, InterfaceMode, InterfaceStatus } from './types.js';
import { isLagName, isSviName } from './naming.js';

// =============================================================================
// Primitive Readers
// =============================================================================

/**
 * Read a trimmed non-empty string, or null
 */
export function readText(value: unknown): string | null {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return null;
}

/**
 * Read an integer from a number or a numeric string, or null
 */
export function readInt(value: unknown): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) ? value : Math.trunc(value);
  }
  const text = readText(value);
  if (!text || !/^-?\d+$/.test(text)) return null;
  return Number.parseInt(text, 10);
}

/**
 * First non-empty string among several candidate keys of a record
 */
export function pickText(record: Record<string, unknown>, ...keys: string[]): string | null {
  for (const key of keys) {
    const text = readText(record[key]);
    if (text !== null) return text;
  }
  return null;
}

// =============================================================================
// Interface Values
// =============================================================================

const SPEED_UNITS: Record<string, number> = {
  kbit: 1,
  kb: 1,
  mbit: 1000,
  mb: 1000,
  gbit: 1000000,
  gb: 1000000,
};

/**
 * Parse a speed into kbit/s
 *
 * `"1000 Mbit"` → 1000000, `"10Gb/s"` → 10000000, `"100000 Kbit"` → 100000,
 * a bare number is taken as Mbit/s. `auto` and unknown values give null.
 */
export function parseSpeed(value: unknown): number | null {
  if (typeof value === 'number') {
    return value > 0 ? Math.round(value * 1000) : null;
  }
  const text = readText(value)?.toLowerCase();
  if (!text) return null;

  const match = /^(?:a-)?(\d+(?:\.\d+)?)\s*([a-z]*)/.exec(text);
  if (!match) return null;

  const amount = Number.parseFloat(match[1]);
  const unit = match[2].replace(/\/s$|ps$/, '');
  if (unit === '') return Math.round(amount * 1000);

  const factor = SPEED_UNITS[unit];
  return factor === undefined ? null : Math.round(amount * factor);
}

/**
 * Parse duplex settings such as `full`, `a-full`, `Full-duplex`, `auto`
 */
export function parseDuplex(value: unknown): Duplex | null {
  const text = readText(value)?.toLowerCase();
  if (!text) return null;
  if (text.includes('full')) return 'full';
  if (text.includes('half')) return 'half';
  if (text.includes('auto')) return 'auto';
  return null;
}

const STATUS_MAP: Record<string, InterfaceStatus> = {
  up: 'up',
  connected: 'up',
  'up/up': 'up',
  down: 'down',
  notconnect: 'down',
  notconnected: 'down',
  'not connected': 'down',
  'up/down': 'down',
  'down/down': 'down',
  'administratively down': 'disabled',
  'admin down': 'disabled',
  disabled: 'disabled',
  'err-disabled': 'error',
  errdisabled: 'error',
  error: 'error',
};

/**
 * Normalize an interface status string
 */
export function parseStatus(value: unknown): InterfaceStatus | null {
  const text = readText(value)?.toLowerCase();
  if (!text) return null;
  return STATUS_MAP[text] ?? null;
}

/**
 * Derive the registry `enabled` flag from an observed status
 */
export function isEnabled(status: InterfaceStatus | null, mode: EnabledMode = 'admin'): boolean | null {
  if (status === null) return null;
  if (mode === 'link') return status === 'up';
  return status !== 'disabled' && status !== 'error';
}

/**
 * Expand a VLAN list: `"10,20,30-32"` → [10, 20, 30, 31, 32]
 *
 * Ids outside 1-4094 are dropped; the result is sorted and unique. `all` and
 * full ranges are not lists; use {@link isAllVlans} to detect them.
 */
export function parseVlanList(value: unknown): number[] {
  if (Array.isArray(value)) {
    return uniqueSorted(value.map(readInt).filter((id): id is number => id !== null && id >= 1 && id <= 4094));
  }
  const text = readText(value)?.toLowerCase();
  if (!text || isAllVlans(text) || text === 'none') return [];

  const ids: number[] = [];
  for (const part of text.split(/[,\s]+/)) {
    if (!part) continue;
    const range = /^(\d+)-(\d+)$/.exec(part);
    if (range) {
      const start = Number.parseInt(range[1], 10);
      const end = Number.parseInt(range[2], 10);
      for (let id = start; id <= end && id <= 4094; id++) {
        if (id >= 1) ids.push(id);
      }
      continue;
    }
    const single = readInt(part);
    if (single !== null && single >= 1 && single <= 4094) ids.push(single);
  }
  return uniqueSorted(ids);
}

/**
 * True when a trunk allowed-VLAN list means "every VLAN"
 */
export function isAllVlans(value: unknown): boolean {
  const text = readText(value)?.toLowerCase().replace(/\s+/g, '');
  return text === 'all' || text === '1-4094' || text === '1-4095' || text === '2-4094';
}

function uniqueSorted(ids: number[]): number[] {
  return [...new Set(ids)].sort((a, b) => a - b);
}

/**
 * Map a switchport mode to the registry's 802.1Q mode
 *
 * `trunk` with an explicit allowed list is `tagged`; with all VLANs (or no
 * list) it is `tagged-all`.
 */
export function parseMode(mode: unknown, allowedVlans: unknown): InterfaceMode | null {
  const text = readText(mode)?.toLowerCase();
  if (!text) return null;
  if (text.includes('access')) return 'access';
  if (text.includes('trunk') || text === 'tagged' || text === 'tagged-all') {
    if (text === 'tagged-all' || isAllVlans(allowedVlans)) return 'tagged-all';
    return parseVlanList(allowedVlans).length > 0 ? 'tagged' : 'tagged-all';
  }
  return null;
}

/**
 * Normalize a MAC address to `aa:bb:cc:dd:ee:ff`
 *
 * Accepts Cisco dotted (`aabb.ccdd.eeff`), dashed and colon forms.
 */
export function normalizeMac(value: unknown): string | null {
  const text = readText(value);
  if (!text) return null;
  const hex = text.toLowerCase().replace(/[^0-9a-f]/g, '');
  if (hex.length !== 12) return null;
  return hex.match(/.{2}/g)?.join(':') ?? null;
}

/**
 * Infer the registry interface type from the name and speed
 */
export function inferInterfaceType(name: string, speedKbps: number | null, hint?: string | null): string {
  if (hint) return hint;
  if (isLagName(name)) return 'lag';
  const lower = name.toLowerCase();
  if (isSviName(name) || lower.startsWith('loopback') || lower.startsWith('tunnel') || lower.startsWith('nve')) {
    return 'virtual';
  }
  if (lower.startsWith('hundredgig')) return '100gbase-x-qsfp28';
  if (lower.startsWith('fortygig')) return '40gbase-x-qsfpp';
  if (lower.startsWith('twentyfivegig')) return '25gbase-x-sfp28';
  if (lower.startsWith('tengig') || lower.startsWith('tfgig')) return '10gbase-x-sfpp';
  if (lower.startsWith('fastethernet')) return '100base-tx';

  if (speedKbps !== null) {
    if (speedKbps >= 100000000) return '100gbase-x-qsfp28';
    if (speedKbps >= 40000000) return '40gbase-x-qsfpp';
    if (speedKbps >= 25000000) return '25gbase-x-sfp28';
    if (speedKbps >= 10000000) return '10gbase-x-sfpp';
    if (speedKbps <= 100000) return '100base-tx';
  }
  return '1000base-t';
}

/**
 * Split `10.0.0.1/24` into address and prefix length
 *
 * A separate mask (`255.255.255.0`) or prefix field may be given when the
 * address carries none. Returns null when no prefix can be determined.
 */
export function parseCidr(address: unknown, mask?: unknown): { address: string; prefixLength: number } | null {
  const text = readText(address);
  if (!text) return null;

  const [host, prefix] = text.split('/', 2);
  if (prefix !== undefined) {
    const length = readInt(prefix) ?? maskToPrefix(prefix);
    return length === null ? null : { address: host, prefixLength: length };
  }

  const fromMask = readInt(mask) ?? maskToPrefix(readText(mask));
  return fromMask === null ? null : { address: host, prefixLength: fromMask };
}

function maskToPrefix(mask: string | null): number | null {
  if (!mask) return null;
  const octets = mask.split('.').map((octet) => Number.parseInt(octet, 10));
  if (octets.length !== 4 || octets.some((octet) => Number.isNaN(octet) || octet < 0 || octet > 255)) {
    return null;
  }
  const bits = octets.map((octet) => octet.toString(2).padStart(8, '0')).join('');
  if (!/^1*0*$/.test(bits)) return null;
  return bits.indexOf('0') === -1 ? 32 : bits.indexOf('0');
}
