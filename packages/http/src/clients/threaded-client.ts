import type { Awaitable } from '../core/awaitable.js';
import type { ExceptionTable } from '../exceptions/exception-table.js';
import { assertOffloadRuntime } from '../io/runtime.js';
import { ThreadedStrategy } from '../io/threaded-strategy.js';
import { WorkerPool } from '../io/worker-pool.js';

import { BlockingClient } from './blocking-client.js';
import type { AnyClientAdapter, ClientRequest } from './interfaces.js';
import { HttpClientAdapter } from './interfaces.js';
import { getClient } from './register.js';

export interface ThreadedClientOptions {
  /** Pool sends and callbacks are dispatched on */
  pool?: WorkerPool | undefined;
  /**
   * Blocking adapter to wrap, or a session the registry resolves to one.
   * Defaults to a new BlockingClient.
   */
  session?: unknown;
}

/**
 * Offloads a blocking adapter: sends and callbacks run on a bounded pool
 * and come back as promises. A wrapped BlockingClient sends through its
 * worker without parking the event loop.
 */
export class ThreadedClient extends HttpClientAdapter<ClientRequest, unknown> {
  readonly pool: WorkerPool;
  private readonly proxy: AnyClientAdapter;

  constructor(options: ThreadedClientOptions = {}) {
    super();
    assertOffloadRuntime('ThreadedClient');

    this.pool = options.pool ?? new WorkerPool();
    this.proxy = resolveProxy(options.session);
  }

  get exceptions(): ExceptionTable {
    return this.proxy.exceptions;
  }

  send(request: ClientRequest): Promise<unknown> {
    const proxy = this.proxy;
    return this.pool.run(() =>
      proxy instanceof BlockingClient ? proxy.sendOffloaded(request) : proxy.send(request)
    );
  }

  applyCallback<T>(callback: (response: unknown) => Awaitable<T>, response: unknown): Promise<T> {
    return this.pool.run<T>(() => callback(response));
  }

  /** Waits for every dispatched send and callback before closing the wrapped adapter */
  async close(): Promise<void> {
    await this.pool.drain();
    await this.proxy.close();
  }

  io(): ThreadedStrategy {
    return new ThreadedStrategy();
  }
}

function resolveProxy(session: unknown): AnyClientAdapter {
  if (session === undefined) {
    return new BlockingClient();
  }
  const client = getClient(session);
  if (client === undefined) {
    throw new TypeError(`No client adapter is registered for session ${String(session)}`);
  }
  return client;
}
