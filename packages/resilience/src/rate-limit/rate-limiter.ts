import { getLogger, type Logger } from '@wirecall/logger';

import { calculateWaitTime, consumeToken, getRateLimitStatus } from './token-bucket.js';
import { createInitialRateLimitState, type RateLimitConfig, type RateLimitState, type RateLimitStatus } from './types.js';

export interface RateLimiterOptions {
  now?: (() => number) | undefined;
}

/**
 * Multi-window rate limiter: a token bucket plus per-second, per-minute and
 * per-hour sliding windows. Share one instance between every request to
 * the same service.
 */
export class RateLimiter {
  private readonly logger: Logger;
  private readonly now: () => number;
  private state: RateLimitState;

  constructor(
    readonly name: string,
    config: RateLimitConfig,
    options: RateLimiterOptions = {}
  ) {
    this.state = createInitialRateLimitState(config);
    this.now = options.now ?? Date.now;
    this.logger = getLogger(`RateLimiter:${name}`);
    this.logger.debug({ ...config }, 'Rate limiter initialized');
  }

  /**
   * Take a slot for one request if one is free now.
   * @returns 0 when the request may go out, otherwise how long to wait in ms
   */
  tryAcquire(): number {
    const now = this.now();
    const waitMs = calculateWaitTime(this.state, now);
    if (waitMs > 0) {
      this.logger.debug({ waitMs }, 'Rate limit reached');
      return waitMs;
    }
    this.state = consumeToken(this.state, now);
    return 0;
  }

  getStatus(): RateLimitStatus {
    return getRateLimitStatus(this.state, this.now());
  }
}
