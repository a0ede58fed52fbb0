import {
  calculateExponentialBackoff,
  parseRateLimitHeaders,
  type ExceptionTriple,
  type HeaderSource,
} from '@wirecall/http';
import { z } from 'zod';

import { parseOptions } from '../options.js';

/**
 * What a backoff sees when choosing the pause before the next attempt.
 * `attempt` counts the attempts made so far, starting at 1.
 */
export interface BackoffContext {
  attempt: number;
  failure?: ExceptionTriple | undefined;
  now: number;
  response?: unknown;
}

/** Returns the pause, in milliseconds, before the next attempt */
export type Backoff = (context: BackoffContext) => number;

const exponentialOptionsSchema = z
  .object({
    baseMs: z.number().nonnegative().finite().default(100),
    maxMs: z.number().positive().finite().default(30_000),
  })
  .refine((options) => options.baseMs <= options.maxMs, { message: 'baseMs must not exceed maxMs' });

export type ExponentialOptions = z.input<typeof exponentialOptionsSchema>;

/** Doubles the pause after every attempt, capped at `maxMs` */
export function exponential(options: ExponentialOptions = {}): Backoff {
  const { baseMs, maxMs } = parseOptions(exponentialOptionsSchema, 'exponential backoff', options);
  return ({ attempt }) => calculateExponentialBackoff(attempt, baseMs, maxMs);
}

export interface JitteredOptions extends ExponentialOptions {
  /** Source of randomness in [0, 1) */
  random?: (() => number) | undefined;
}

/**
 * Full jitter: a uniformly random pause between zero and the exponential one.
 */
export function jittered(options: JitteredOptions = {}): Backoff {
  const { random = Math.random, ...bounds } = options;
  const ceiling = exponential(bounds);
  return (context) => Math.floor(random() * ceiling(context));
}

export function fixed(delayMs: number): Backoff {
  const delay = parseOptions(z.number().nonnegative().finite(), 'fixed backoff', delayMs);
  return () => delay;
}

/**
 * Honours the delay a server asks for through Retry-After or rate-limit reset
 * headers; falls back to `fallback` when the response names none.
 */
export function retryAfter(fallback: Backoff = exponential()): Backoff {
  return (context) => {
    const headers = headersOf(context.response);
    if (headers !== undefined) {
      const { delayMs } = parseRateLimitHeaders(headers, context.now);
      if (delayMs !== undefined) {
        return delayMs;
      }
    }
    return fallback(context);
  };
}

function headersOf(response: unknown): HeaderSource | undefined {
  if (typeof response !== 'object' || response === null || !('headers' in response)) {
    return undefined;
  }
  const { headers } = response;
  if (typeof headers !== 'object' || headers === null) {
    return undefined;
  }
  if ('get' in headers && typeof headers.get === 'function') {
    const get = headers.get;
    return {
      get: (name: string) => {
        const value: unknown = get.call(headers, name);
        return typeof value === 'string' ? value : null;
      },
    };
  }

  const record: Record<string, string> = {};
  for (const [name, value] of Object.entries(headers)) {
    if (typeof value === 'string') {
      record[name] = value;
    }
  }
  return record;
}
