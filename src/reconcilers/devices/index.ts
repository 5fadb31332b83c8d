/**
 * Device reconciler exports
 */

export { deviceSpec, diffDevices, withScopeDefaults, DEVICE_DEFAULTS, UNKNOWN_MODEL } from './diff.js';
export { syncDevices } from './sync.js';
