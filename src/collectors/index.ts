/**
 * Collectors module
 */

export { COLLECTOR_NAMES, isCollectorName } from './types.js';
export type {
  CollectorName,
  CollectedEntity,
  Collector,
  CollectOptions,
  Credentials,
  DeviceTarget,
} from './types.js';
export { COLLECTOR_MAPPERS, mapCollected, withTargetDefaults } from './mapping.js';
export { RecordFileCollector, CollectorError } from './file.js';
