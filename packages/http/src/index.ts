// Request execution framework: taxonomy, client adapters, strategies and the request state machine
export * from './errors.js';
export * from './config.js';

export * from './exceptions/exception-triple.js';
export * from './exceptions/exception-table.js';
export * from './exceptions/undici-exceptions.js';
export * from './exceptions/blocking-exceptions.js';

export * from './io/interfaces.js';
export * as transitions from './io/transitions.js';
export type { Transition, TransitionKind } from './io/transitions.js';
export * from './io/state.js';
export * from './io/templates.js';
export * from './io/execution-context.js';
export * from './io/blocking-strategy.js';
export * from './io/cooperative-strategy.js';
export * from './io/threaded-strategy.js';
export * from './io/worker-pool.js';
export * from './io/runtime.js';
export * from './io/execute.js';

export * from './clients/interfaces.js';
export * from './clients/session-errors.js';
export * from './clients/blocking-session.js';
export * from './clients/fetch-worker-session.js';
export * from './clients/owned-session.js';
export * from './clients/blocking-client.js';
export * from './clients/threaded-response.js';
export * from './clients/undici-client.js';
export * from './clients/threaded-client.js';
export * from './clients/register.js';
export * from './clients/with-client.js';

export * from './instrumentation.js';

// Pure functional core
export * from './core/index.js';
