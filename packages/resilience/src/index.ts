export * from './retry/backoff.js';
export * from './retry/stop.js';
export * from './retry/when.js';
export * from './retry/retry-policy.js';

export * from './rate-limit/types.js';
export * from './rate-limit/token-bucket.js';
export * from './rate-limit/rate-limiter.js';
export * from './rate-limit/rate-limit-template.js';

export { parseOptions } from './options.js';
