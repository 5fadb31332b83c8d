/**
 * Entity model: types, naming normalization, identity keys and record mappers
 */

export type {
  InterfaceMode,
  Duplex,
  InterfaceStatus,
  EnabledMode,
  FlatRecord,
  Device,
  Interface,
  IPAddress,
  Vlan,
  CableEndpoint,
  Cable,
  InventoryItem,
  MacEntry,
  ConfigBackup,
  EntityCategory,
  EntityByCategory,
} from './types.js';

export {
  shortInterfaceName,
  longInterfaceName,
  interfaceKey,
  isLagName,
  isSviName,
  sviVlanId,
  shortHostname,
  hostnameKey,
} from './naming.js';

export {
  readText,
  readInt,
  pickText,
  parseSpeed,
  parseDuplex,
  parseStatus,
  isEnabled,
  parseVlanList,
  isAllVlans,
  parseMode,
  normalizeMac,
  inferInterfaceType,
  parseCidr,
} from './parsers.js';

export { deviceKey, interfaceIdentity, ipAddressKey, vlanKey, cableKey, inventoryKey, cableLabel } from './keys.js';

export {
  toDevices,
  toInterfaces,
  toCables,
  toInventoryItems,
  toMacEntries,
  toConfigBackups,
  deriveIpAddresses,
  deriveVlans,
  truncateInventoryName,
  INVENTORY_NAME_MAX,
} from './mappers.js';

export type { MappedEntities } from './mappers.js';
