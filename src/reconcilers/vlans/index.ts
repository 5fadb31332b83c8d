/**
 * VLAN reconciler exports
 */

export { vlanSpec, diffVlans } from './diff.js';
export { syncVlans } from './sync.js';
