/**
 * IP address reconciler exports
 */

export { ipAddressSpec, diffIpAddresses, remoteIpAddressKey } from './diff.js';
export { syncIpAddresses } from './sync.js';
