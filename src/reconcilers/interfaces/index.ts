/**
 * Interface reconciler exports
 */

export { interfaceSpec, diffInterfaces } from './diff.js';
export { syncInterfaces, dropUnknownVlans } from './sync.js';
