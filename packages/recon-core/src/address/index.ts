export * from './codec.js';
export * from './inventory-address.js';
export * from './rtu-map.js';
