// Pure HTTP utility functions
// All functions are pure - no side effects

import type { HeaderSource, RateLimitHeaderInfo } from './types.js';

const MAX_SERVER_DELAY_MS = 30_000;

/**
 * Join a base URL and an endpoint. Absolute endpoints are returned unchanged.
 */
export const buildUrl = (baseUrl: string | undefined, endpoint: string): string => {
  if (baseUrl === undefined || /^[a-z][a-z0-9+.-]*:\/\//i.test(endpoint)) {
    return endpoint;
  }

  const cleanBaseUrl = baseUrl.endsWith('/') ? baseUrl.slice(0, -1) : baseUrl;
  if (endpoint === '' || endpoint === '/') {
    return cleanBaseUrl;
  }

  const cleanEndpoint = endpoint.startsWith('/') ? endpoint : `/${endpoint}`;
  return `${cleanBaseUrl}${cleanEndpoint}`;
};

/**
 * Append query parameters to a URL, keeping the ones it already has
 */
export const withQuery = (url: string, query: Readonly<Record<string, string | number | boolean>> | undefined): string => {
  const entries = Object.entries(query ?? {});
  if (entries.length === 0) {
    return url;
  }

  const search = new URLSearchParams(entries.map(([key, value]): [string, string] => [key, String(value)])).toString();
  return `${url}${url.includes('?') ? '&' : '?'}${search}`;
};

/**
 * Sanitize URL for logging (redact sensitive query parameters)
 */
export const sanitizeUrl = (url: string): string => {
  try {
    const urlObj = new URL(url);
    const sensitiveParams = ['token', 'key', 'apikey', 'api_key', 'secret', 'password'];

    for (const param of sensitiveParams) {
      if (urlObj.searchParams.has(param)) {
        urlObj.searchParams.set(param, '***');
      }
    }

    return urlObj.toString();
  } catch {
    // Relative targets are not parseable; nothing to redact from a base URL we do not know
    return url;
  }
};

/**
 * Read a header case-insensitively from any supported header source
 */
export const readHeader = (headers: HeaderSource, name: string): string | undefined => {
  if ('get' in headers && typeof headers.get === 'function') {
    return headers.get(name) ?? undefined;
  }

  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(headers)) {
    if (key.toLowerCase() === wanted && typeof value === 'string') {
      return value;
    }
  }
  return undefined;
};

/**
 * Parse Retry-After header value
 * Supports both delay-seconds and HTTP-date formats
 */
export const parseRetryAfter = (value: string, currentTime: number): number | undefined => {
  const seconds = parseInt(value, 10);
  if (!isNaN(seconds)) {
    if (seconds === 0) {
      // Zero means "now"; keep a minimal pause so a retry loop cannot spin
      return 1000;
    }

    if (seconds > 0) {
      return Math.min(seconds * 1000, MAX_SERVER_DELAY_MS);
    }
  }

  const date = new Date(value);
  if (!isNaN(date.getTime())) {
    const delayMs = Math.max(0, date.getTime() - currentTime);
    if (delayMs > 0) {
      return Math.min(delayMs, MAX_SERVER_DELAY_MS);
    }
  }

  return undefined;
};

/**
 * Parse Unix timestamp (seconds) and calculate delay in milliseconds
 */
export const parseUnixTimestamp = (value: string, currentTime: number): number | undefined => {
  const timestamp = parseInt(value, 10);
  if (isNaN(timestamp) || timestamp <= 0) {
    return undefined;
  }

  const now = Math.floor(currentTime / 1000);
  const delaySeconds = Math.max(0, timestamp - now);
  if (delaySeconds > 0) {
    return Math.min(delaySeconds * 1000, MAX_SERVER_DELAY_MS);
  }

  return undefined;
};

const parseDeltaSeconds = (value: string): number | undefined => {
  const seconds = parseInt(value, 10);
  return !isNaN(seconds) && seconds >= 0 ? Math.min(seconds * 1000, MAX_SERVER_DELAY_MS) : undefined;
};

/**
 * Headers consulted for a server-requested delay, in order of preference
 */
const RATE_LIMIT_HEADERS: readonly {
  name: Exclude<RateLimitHeaderInfo['source'], 'default'>;
  parse: (value: string, currentTime: number) => number | undefined;
}[] = [
  { name: 'Retry-After', parse: parseRetryAfter },
  { name: 'X-RateLimit-Reset', parse: parseUnixTimestamp },
  { name: 'X-Rate-Limit-Reset', parse: parseUnixTimestamp },
  { name: 'RateLimit-Reset', parse: parseDeltaSeconds },
];

/**
 * Parse rate limit headers to determine retry delay
 */
export const parseRateLimitHeaders = (headers: HeaderSource, currentTime: number): RateLimitHeaderInfo => {
  for (const { name, parse } of RATE_LIMIT_HEADERS) {
    const value = readHeader(headers, name);
    if (!value) {
      continue;
    }

    const delayMs = parse(value, currentTime);
    if (delayMs !== undefined) {
      return { delayMs, source: name };
    }
  }

  return { source: 'default' };
};

/**
 * Calculate exponential backoff delay for a 1-based attempt number
 */
export const calculateExponentialBackoff = (attempt: number, baseDelayMs: number, maxDelayMs: number): number => {
  const delay = baseDelayMs * Math.pow(2, attempt - 1);
  return Math.min(delay, maxDelayMs);
};
