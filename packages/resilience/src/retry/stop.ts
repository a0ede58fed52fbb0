import { z } from 'zod';

import { parseOptions } from '../options.js';

/**
 * What a stop condition sees after an attempt the policy would retry.
 */
export interface StopContext {
  /** Attempts made so far, including the one that just ended */
  attempt: number;
  /** Time since the first attempt started */
  elapsedMs: number;
  /** Pause the backoff chose before the next attempt */
  nextDelayMs: number;
}

/** Returns true to give up retrying */
export type StopCondition = (context: StopContext) => boolean;

export function stopAfterAttempt(attempts: number): StopCondition {
  const limit = parseOptions(z.number().int().positive(), 'stopAfterAttempt', attempts);
  return ({ attempt }) => attempt >= limit;
}

/**
 * Gives up once the next attempt would start later than `delayMs` after the first.
 */
export function stopAfterDelay(delayMs: number): StopCondition {
  const limit = parseOptions(z.number().nonnegative().finite(), 'stopAfterDelay', delayMs);
  return ({ elapsedMs, nextDelayMs }) => elapsedMs + nextDelayMs > limit;
}

export const stopNever: StopCondition = () => false;

export function anyStop(...conditions: StopCondition[]): StopCondition {
  return (context) => conditions.some((condition) => condition(context));
}
