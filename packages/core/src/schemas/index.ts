export * from './address.js';
export * from './amount.js';
export * from './consensus-config.js';
