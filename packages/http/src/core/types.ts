// Pure types for the functional core

/**
 * Result of reading a server's rate-limit headers
 */
export interface RateLimitHeaderInfo {
  delayMs?: number | undefined;
  source: RateLimitHeaderSource;
}

export type RateLimitHeaderSource =
  | 'Retry-After'
  | 'X-RateLimit-Reset'
  | 'X-Rate-Limit-Reset'
  | 'RateLimit-Reset'
  | 'default';

/**
 * Anything headers can be read from: a fetch `Headers`, an undici response's
 * headers, or a plain record as the blocking session produces.
 */
export type HeaderSource = { get(name: string): string | null } | Readonly<Record<string, string>>;
