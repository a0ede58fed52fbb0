// Functional core exports

export * from './awaitable.js';
export * from './http-utils.js';
export * from './types.js';
