import { transitions, type RequestTemplate, type Transition } from '@wirecall/http';

import type { RateLimiter } from './rate-limiter.js';

/**
 * The limiter has no slot free and the template was told not to wait.
 */
export class RateLimitExceeded extends Error {
  constructor(
    readonly limiter: string,
    readonly retryAfterMs: number
  ) {
    super(`Rate limit of ${limiter} exceeded; next slot in ${retryAfterMs}ms`);
    this.name = 'RateLimitExceeded';
  }
}

export interface RateLimitTemplateOptions {
  limiter: RateLimiter;
  /** Fail with RateLimitExceeded instead of waiting for a slot */
  raiseOnLimit?: boolean | undefined;
}

/**
 * Holds each attempt back until the limiter has a slot for it. Waiting goes
 * through the `retry` transition, so it sleeps in the strategy's own idiom.
 */
export class RateLimitTemplate<Req = unknown, Res = unknown> implements RequestTemplate<Req, Res> {
  private readonly limiter: RateLimiter;
  private readonly raiseOnLimit: boolean;

  constructor(options: RateLimitTemplateOptions) {
    this.limiter = options.limiter;
    this.raiseOnLimit = options.raiseOnLimit ?? false;
  }

  beforeRequest(_request: Req): Transition<Req, Res> | undefined {
    const waitMs = this.limiter.tryAcquire();
    if (waitMs === 0) {
      return undefined;
    }
    if (this.raiseOnLimit) {
      return transitions.fail(new RateLimitExceeded(this.limiter.name, waitMs));
    }
    return transitions.retry(waitMs);
  }
}
