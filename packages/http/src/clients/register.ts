import { Dispatcher } from 'undici';

import { BlockingClient } from './blocking-client.js';
import { isBlockingSession } from './blocking-session.js';
import { HttpClientAdapter, type AnyClientAdapter } from './interfaces.js';
import { UndiciClient } from './undici-client.js';

/** A concrete adapter class the registry can instantiate without arguments */
export type ClientAdapterClass = new () => AnyClientAdapter;

/** What `setDefaultClient` accepts: an adapter, or a class to instantiate per lookup */
export type DefaultClient = AnyClientAdapter | ClientAdapterClass;

/** Returns an adapter for a key it recognizes, otherwise undefined */
export type ClientHandler = (key: unknown) => AnyClientAdapter | undefined;

const handlers: ClientHandler[] = [];
let defaultClient: DefaultClient = UndiciClient;

function isAdapterClass(key: unknown): key is ClientAdapterClass {
  return typeof key === 'function' && key.prototype instanceof HttpClientAdapter;
}

/**
 * Resolve a key (an adapter, an adapter class, or a transport session) to
 * a client adapter. A session keeps its caller as owner.
 */
export function getClient(key?: unknown): AnyClientAdapter | undefined {
  if (key === undefined) {
    return getClient(defaultClient);
  }
  if (key instanceof HttpClientAdapter) {
    return key;
  }
  if (isAdapterClass(key)) {
    return new key();
  }
  if (key instanceof Dispatcher) {
    return new UndiciClient({ session: key });
  }
  if (isBlockingSession(key)) {
    return new BlockingClient({ session: key });
  }
  for (const handler of handlers) {
    const client = handler(key);
    if (client !== undefined) {
      return client;
    }
  }
  return undefined;
}

/** Handlers are consulted in registration order after the built-in ones */
export function registerClientHandler(handler: ClientHandler): void {
  handlers.push(handler);
}

export function unregisterClientHandler(handler: ClientHandler): void {
  const index = handlers.indexOf(handler);
  if (index !== -1) {
    handlers.splice(index, 1);
  }
}

export function getDefaultClient(): DefaultClient {
  return defaultClient;
}

export function setDefaultClient(client: DefaultClient): void {
  defaultClient = client;
}
