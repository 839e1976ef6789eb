export * from './errors/index.js';
export * from './value-objects/amount.js';
export * from './schemas/index.js';
export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
export * from './utils/zod-utils.js';
