// Retrying, concurrency-bounded HTTP client
export * from './client.js';
export * from './concurrency-gate.js';
export * from './config.js';
export * from './diagnostics.js';

export * from './types.js';

// Export pure functional core functions
export * from './core/index.js';
