export * from './errors/index.js';
export * from './types/chain.js';
export * from './utils/address-utils.js';
export * from './utils/block-ref-utils.js';
export * from './utils/concurrency-utils.js';
export * from './utils/type-guard-utils.js';
