export { cableSpec, diffCables, remoteCableKey, remoteCableEnds } from './diff.js';
export type { ResolvedCable } from './diff.js';
export { syncCables } from './sync.js';
