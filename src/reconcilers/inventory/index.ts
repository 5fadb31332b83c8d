export { inventorySpec, diffInventory } from './diff.js';
export { syncInventory } from './sync.js';
