import type { Awaitable } from '../core/awaitable.js';

/**
 * Run `fn` with the client and close the client afterwards, whether `fn`
 * succeeds or throws.
 */
export async function withClient<C extends { close(): Awaitable<void> }, T>(
  client: C,
  fn: (client: C) => Awaitable<T>
): Promise<T> {
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
