// Functional core exports
// Pure functions for retry and classification logic

export * from './backoff.js';
export * from './classifier.js';
export * from './http-utils.js';
export * from './retry-after.js';
export * from './types.js';
