// Pure rate limiting functions: each takes a state and returns a new one

import type { RateLimitState, RateLimitStatus } from './types.js';

const SECOND_MS = 1000;
const MINUTE_MS = 60_000;
const HOUR_MS = 3_600_000;

// Added to a window wait so the oldest request has left the window when it ends
const WINDOW_MARGIN_MS = 10;

interface WindowLimit {
  limit: number;
  windowMs: number;
}

const windowLimits = (state: RateLimitState): WindowLimit[] => {
  const windows: WindowLimit[] = [{ limit: state.requestsPerSecond, windowMs: SECOND_MS }];
  if (state.requestsPerMinute !== undefined) {
    windows.push({ limit: state.requestsPerMinute, windowMs: MINUTE_MS });
  }
  if (state.requestsPerHour !== undefined) {
    windows.push({ limit: state.requestsPerHour, windowMs: HOUR_MS });
  }
  return windows;
};

/**
 * Add the tokens earned since the last refill, up to the burst limit.
 * The first call only starts the clock.
 */
export const refillTokens = (state: RateLimitState, currentTime: number): RateLimitState => {
  if (state.lastRefill === 0) {
    return { ...state, lastRefill: currentTime };
  }

  const elapsedSeconds = (currentTime - state.lastRefill) / SECOND_MS;
  if (elapsedSeconds <= 0) {
    return state;
  }

  return {
    ...state,
    lastRefill: currentTime,
    tokens: Math.min(state.burstLimit, state.tokens + elapsedSeconds * state.requestsPerSecond),
  };
};

export const getRequestCountInWindow = (
  requestTimestamps: readonly number[],
  currentTime: number,
  windowMs: number
): number => {
  const windowStart = currentTime - windowMs;
  return requestTimestamps.filter((ts) => ts >= windowStart).length;
};

export const canMakeRequestInAllWindows = (state: RateLimitState, currentTime: number): boolean =>
  windowLimits(state).every(
    ({ limit, windowMs }) => getRequestCountInWindow(state.requestTimestamps, currentTime, windowMs) < limit
  );

/**
 * Drop timestamps older than the longest window
 */
export const cleanOldTimestamps = (requestTimestamps: readonly number[], currentTime: number): number[] =>
  requestTimestamps.filter((ts) => ts >= currentTime - HOUR_MS);

export const shouldAllowRequest = (state: RateLimitState, currentTime: number): boolean => {
  const refilled = refillTokens(state, currentTime);
  return refilled.tokens >= 1 && canMakeRequestInAllWindows(refilled, currentTime);
};

const waitForWindow = (
  requestTimestamps: readonly number[],
  currentTime: number,
  { limit, windowMs }: WindowLimit
): number => {
  if (getRequestCountInWindow(requestTimestamps, currentTime, windowMs) < limit) {
    return 0;
  }

  const windowStart = currentTime - windowMs;
  const oldestInWindow = requestTimestamps.find((ts) => ts >= windowStart);
  if (oldestInWindow === undefined) {
    return 0;
  }
  return oldestInWindow + windowMs - currentTime + WINDOW_MARGIN_MS;
};

/**
 * How long to wait before the next request may go out; 0 when it may go now
 */
export const calculateWaitTime = (state: RateLimitState, currentTime: number): number => {
  const refilled = refillTokens(state, currentTime);
  const tokenWait = refilled.tokens < 1 ? ((1 - refilled.tokens) / state.requestsPerSecond) * SECOND_MS : 0;
  const windowWaits = windowLimits(refilled).map((window) =>
    waitForWindow(refilled.requestTimestamps, currentTime, window)
  );

  return Math.ceil(Math.max(tokenWait, ...windowWaits));
};

/**
 * Spend a token and record the request
 */
export const consumeToken = (state: RateLimitState, currentTime: number): RateLimitState => {
  const refilled = refillTokens(state, currentTime);

  return {
    ...refilled,
    requestTimestamps: [...cleanOldTimestamps(refilled.requestTimestamps, currentTime), currentTime],
    tokens: Math.max(0, refilled.tokens - 1),
  };
};

export const getRateLimitStatus = (state: RateLimitState, currentTime: number): RateLimitStatus => {
  const refilled = refillTokens(state, currentTime);

  return {
    maxTokens: state.burstLimit,
    requestsInLastHour: getRequestCountInWindow(refilled.requestTimestamps, currentTime, HOUR_MS),
    requestsInLastMinute: getRequestCountInWindow(refilled.requestTimestamps, currentTime, MINUTE_MS),
    requestsInLastSecond: getRequestCountInWindow(refilled.requestTimestamps, currentTime, SECOND_MS),
    requestsPerHour: state.requestsPerHour,
    requestsPerMinute: state.requestsPerMinute,
    requestsPerSecond: state.requestsPerSecond,
    tokens: refilled.tokens,
  };
};
