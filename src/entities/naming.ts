/**
 * Interface and hostname normalization
 *
 * Vendors and protocols report the same port as `GigabitEthernet0/1`,
 * `Gi0/1`, `Gig 0/1` or `gi0/1`. Identity keys are built from the long form
 * so all of these resolve to the same entity.
 */

// =============================================================================
// Name Tables
// =============================================================================

/**
 * Long prefix (lowercase) → short prefix. Longer prefixes must come first.
 */
const SHORT_FORMS: ReadonlyArray<readonly [string, string]> = [
  ['twentyfivegigabitethernet', 'Twe'],
  ['twentyfivegige', 'Twe'],
  ['hundredgigabitethernet', 'Hu'],
  ['hundredgige', 'Hu'],
  ['fortygigabitethernet', 'Fo'],
  ['tfgigabitethernet', 'TF'],
  ['tengigabitethernet', 'Te'],
  ['gigabitethernet', 'Gi'],
  ['fastethernet', 'Fa'],
  ['aggregateport', 'Ag'],
  ['ethernet', 'Eth'],
  ['port-channel', 'Po'],
  ['vlan', 'Vl'],
  ['loopback', 'Lo'],
  ['eth', 'Eth'],
  ['twe', 'Twe'],
  ['ten', 'Te'],
  ['gig', 'Gi'],
];

/**
 * Short prefix → long prefix. Longer short forms come first so `Twe` wins
 * over `Te`.
 */
const LONG_FORMS: ReadonlyArray<readonly [string, string]> = [
  ['Twe', 'TwentyFiveGigE'],
  ['Eth', 'Ethernet'],
  ['Gig', 'GigabitEthernet'],
  ['Ten', 'TenGigabitEthernet'],
  ['Gi', 'GigabitEthernet'],
  ['Fa', 'FastEthernet'],
  ['Te', 'TenGigabitEthernet'],
  ['TF', 'TFGigabitEthernet'],
  ['Fo', 'FortyGigabitEthernet'],
  ['Hu', 'HundredGigE'],
  ['Et', 'Ethernet'],
  ['Ag', 'AggregatePort'],
  ['Po', 'Port-channel'],
  ['Vl', 'Vlan'],
  ['Lo', 'Loopback'],
];

const LAG_LONG_PREFIXES = ['port-channel', 'aggregateport'];
const LAG_SHORT_PREFIXES = ['po', 'ag'];

// =============================================================================
// Interfaces
// =============================================================================

function stripSpaces(name: string): string {
  return name.replace(/\s+/g, '').trim();
}

function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

/**
 * Shorten an interface name: `GigabitEthernet0/1` → `Gi0/1`, `Ten 1/1/4` → `Te1/1/4`
 */
export function shortInterfaceName(name: string): string {
  if (!name) return '';
  const compact = stripSpaces(name);
  const lower = compact.toLowerCase();

  for (const [long, short] of SHORT_FORMS) {
    if (lower.startsWith(long)) {
      return short + compact.slice(long.length);
    }
  }
  return compact;
}

/**
 * Expand an interface name: `Gi0/1` → `GigabitEthernet0/1`
 *
 * Names already in long form (or unknown prefixes) are returned without spaces.
 */
export function longInterfaceName(name: string): string {
  if (!name) return '';
  const compact = stripSpaces(name);

  for (const [short, long] of LONG_FORMS) {
    if (
      compact.toLowerCase().startsWith(short.toLowerCase()) &&
      !compact.toLowerCase().startsWith(long.toLowerCase()) &&
      isDigit(compact[short.length])
    ) {
      return long + compact.slice(short.length);
    }
  }

  // Canonical casing for long forms reported in lowercase
  const lower = compact.toLowerCase();
  for (const [, long] of LONG_FORMS) {
    if (lower.startsWith(long.toLowerCase()) && isDigit(compact[long.length])) {
      return long + compact.slice(long.length);
    }
  }
  return compact;
}

/**
 * Case-insensitive identity form of an interface name
 */
export function interfaceKey(name: string): string {
  return longInterfaceName(name).toLowerCase();
}

/**
 * True for link-aggregation interfaces: Port-channel1, Po1, AggregatePort 1, Ag1
 */
export function isLagName(name: string): boolean {
  if (!name) return false;
  const lower = stripSpaces(name).toLowerCase();
  if (LAG_LONG_PREFIXES.some((prefix) => lower.startsWith(prefix))) {
    return true;
  }
  return LAG_SHORT_PREFIXES.some(
    (prefix) => lower.startsWith(prefix) && isDigit(lower[prefix.length])
  );
}

/**
 * True for VLAN interfaces (SVIs)
 */
export function isSviName(name: string): boolean {
  return /^(vlan|vl)\d+$/i.test(stripSpaces(name));
}

/**
 * VLAN id of an SVI name (`Vlan10` → 10), or null
 */
export function sviVlanId(name: string): number | null {
  const match = /^(?:vlan|vl)(\d+)$/i.exec(stripSpaces(name));
  return match ? Number.parseInt(match[1], 10) : null;
}

// =============================================================================
// Hostnames
// =============================================================================

/**
 * Strip the domain suffix from a neighbor-reported hostname
 *
 * `sw1.corp.example.net` → `sw1`. IPv4 literals are kept as they are.
 * CDP serial suffixes like `sw1(FOC123)` are dropped as well.
 */
export function shortHostname(hostname: string): string {
  const trimmed = hostname.trim().replace(/\(.*\)$/, '');
  if (/^\d{1,3}(\.\d{1,3}){3}$/.test(trimmed)) {
    return trimmed;
  }
  const dot = trimmed.indexOf('.');
  return dot > 0 ? trimmed.slice(0, dot) : trimmed;
}

/**
 * Case-insensitive identity form of a hostname
 */
export function hostnameKey(hostname: string): string {
  return shortHostname(hostname).toLowerCase();
}
