export * from './errors/index.js';
export * from './schemas/mutation.js';
export * from './types/error-policy.js';
export * from './types/identifiers.js';
export * from './types/ledger.js';
export * from './types/mutation.js';
export * from './utils/amount-utils.js';
export * from './value-objects/amount.js';
