import { z } from 'zod';

import { parseOptions } from '../options.js';

export const rateLimitConfigSchema = z.object({
  /** Requests the bucket holds at most; also its starting level */
  burstLimit: z.number().positive().finite().optional(),
  requestsPerHour: z.number().positive().finite().optional(),
  requestsPerMinute: z.number().positive().finite().optional(),
  /** Refill rate of the token bucket, and the per-second window limit */
  requestsPerSecond: z.number().positive().finite(),
});

export type RateLimitConfig = z.input<typeof rateLimitConfigSchema>;

/**
 * Rate limiter state (immutable)
 */
export interface RateLimitState {
  readonly burstLimit: number;
  /** 0 until the first refill */
  readonly lastRefill: number;
  readonly requestTimestamps: readonly number[];
  readonly requestsPerHour: number | undefined;
  readonly requestsPerMinute: number | undefined;
  readonly requestsPerSecond: number;
  readonly tokens: number;
}

export interface RateLimitStatus {
  maxTokens: number;
  requestsInLastHour: number;
  requestsInLastMinute: number;
  requestsInLastSecond: number;
  requestsPerHour: number | undefined;
  requestsPerMinute: number | undefined;
  requestsPerSecond: number;
  tokens: number;
}

export function createInitialRateLimitState(config: RateLimitConfig): RateLimitState {
  const parsed = parseOptions(rateLimitConfigSchema, 'rate limit', config);
  const burstLimit = parsed.burstLimit ?? 1;

  return {
    burstLimit,
    lastRefill: 0,
    requestTimestamps: [],
    requestsPerHour: parsed.requestsPerHour,
    requestsPerMinute: parsed.requestsPerMinute,
    requestsPerSecond: parsed.requestsPerSecond,
    tokens: burstLimit,
  };
}
