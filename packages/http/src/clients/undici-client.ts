import { types } from 'node:util';

import { Agent, fetch, type Dispatcher, type RequestInit, type Response } from 'undici';

import { buildUrl, withQuery } from '../core/http-utils.js';
import { undiciExceptions } from '../exceptions/undici-exceptions.js';
import { CooperativeStrategy } from '../io/cooperative-strategy.js';
import { assertCooperativeRuntime } from '../io/runtime.js';
import { WorkerPool } from '../io/worker-pool.js';

import { HttpClientAdapter, type ClientRequest } from './interfaces.js';
import { OwnedSession } from './owned-session.js';
import {
  threadedCallback,
  type AsyncResponseCallback,
  type BodyReader,
  type SyncResponseCallback,
  type Unwrapped,
} from './threaded-response.js';

export type UndiciResponseCallback<T> = AsyncResponseCallback<T> | SyncResponseCallback<T>;

/** Turns a synchronous callback into one the event loop can await */
export type SyncCallbackAdapter = <T>(callback: SyncResponseCallback<T>) => AsyncResponseCallback<Unwrapped<T>>;

export interface UndiciClientOptions {
  /** Options for the Agent created when no session is supplied */
  agent?: Agent.Options | undefined;
  /** Prefix for relative request URLs */
  baseUrl?: string | undefined;
  /** Headers sent with every request; per-request headers win */
  headers?: Readonly<Record<string, string>> | undefined;
  /** Body readers the default sync callback adapter settles (default: text) */
  preparedFields?: readonly BodyReader[] | undefined;
  /** Caller-owned dispatcher; never closed by the client */
  session?: Dispatcher | undefined;
  syncCallbackAdapter?: SyncCallbackAdapter | undefined;
}

function isAsyncCallback<T>(callback: UndiciResponseCallback<T>): callback is AsyncResponseCallback<T> {
  return types.isAsyncFunction(callback);
}

/**
 * Cooperative adapter over undici. Sends suspend on the event loop;
 * synchronous response callbacks are moved off it.
 */
export class UndiciClient extends HttpClientAdapter<ClientRequest, Response> {
  readonly exceptions = undiciExceptions;
  private readonly session: OwnedSession<Dispatcher>;
  private readonly baseUrl: string | undefined;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly syncCallbackAdapter: SyncCallbackAdapter;
  private callbackPool: WorkerPool | undefined;

  constructor(options: UndiciClientOptions = {}) {
    super();
    assertCooperativeRuntime('UndiciClient');

    this.session = new OwnedSession('undici', () => UndiciClient.createSession(options.agent), options.session);
    this.baseUrl = options.baseUrl;
    this.headers = options.headers ?? {};
    this.syncCallbackAdapter =
      options.syncCallbackAdapter ??
      (<T>(callback: SyncResponseCallback<T>) =>
        threadedCallback(callback, { fields: options.preparedFields, pool: this.getCallbackPool() }));
  }

  /** Builds the dispatcher used when none is supplied */
  static createSession(options: Agent.Options = {}): Dispatcher {
    return new Agent(options);
  }

  async send(request: ClientRequest): Promise<Response> {
    const [method, url, extras] = request;
    const init: RequestInit = {
      dispatcher: this.session.get(),
      headers: { ...this.headers, ...extras.headers },
      method,
    };
    if (extras.body !== undefined) {
      init.body = extras.body;
    }
    if (extras.timeoutMs !== undefined) {
      init.signal = AbortSignal.timeout(extras.timeoutMs);
    }

    try {
      return await fetch(withQuery(buildUrl(this.baseUrl, url), extras.query), init);
    } catch (error) {
      throw this.exceptions.translate(error);
    }
  }

  /**
   * Asynchronous callbacks are returned as they are; synchronous ones go
   * through the sync callback adapter.
   */
  wrapCallback<T>(callback: AsyncResponseCallback<T>): AsyncResponseCallback<T>;
  wrapCallback<T>(callback: SyncResponseCallback<T>): AsyncResponseCallback<Unwrapped<T>>;
  wrapCallback<T>(callback: UndiciResponseCallback<T>): AsyncResponseCallback<T> | AsyncResponseCallback<Unwrapped<T>> {
    return isAsyncCallback(callback) ? callback : this.syncCallbackAdapter(callback);
  }

  applyCallback<T>(callback: AsyncResponseCallback<T>, response: Response): Promise<T>;
  applyCallback<T>(callback: SyncResponseCallback<T>, response: Response): Promise<Unwrapped<T>>;
  applyCallback<T>(callback: UndiciResponseCallback<T>, response: Response): Promise<T | Unwrapped<T>> {
    return isAsyncCallback(callback) ? callback(response) : this.syncCallbackAdapter(callback)(response);
  }

  async close(): Promise<void> {
    await this.session.release((dispatcher) => dispatcher.close());
    await this.callbackPool?.drain();
  }

  io(): CooperativeStrategy {
    return new CooperativeStrategy();
  }

  private getCallbackPool(): WorkerPool {
    this.callbackPool ??= new WorkerPool();
    return this.callbackPool;
  }
}
