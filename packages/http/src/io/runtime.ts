import { UnsupportedConfigurationError } from '../errors.js';

// Runtime availability checks, run once when a component is constructed.

/** The cooperative model needs the microtask queue that promises resolve on. */
export function assertCooperativeRuntime(component: string): void {
  if (typeof globalThis.queueMicrotask !== 'function') {
    throw new UnsupportedConfigurationError(
      `${component} requires the cooperative runtime, but queueMicrotask is not available`
    );
  }
}

/** The thread-offload model dispatches work to later macrotasks. */
export function assertOffloadRuntime(component: string): void {
  if (typeof globalThis.setImmediate !== 'function') {
    throw new UnsupportedConfigurationError(
      `${component} requires the thread-offload runtime, but setImmediate is not available`
    );
  }
}
