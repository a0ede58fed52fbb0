import { blockingExceptions } from '../exceptions/blocking-exceptions.js';
import { BlockingStrategy } from '../io/blocking-strategy.js';

import type { BlockingResponse, BlockingSession } from './blocking-session.js';
import { FetchWorkerSession, type FetchWorkerSessionOptions } from './fetch-worker-session.js';
import { HttpClientAdapter, type ClientRequest } from './interfaces.js';
import { OwnedSession } from './owned-session.js';

export interface BlockingClientOptions extends FetchWorkerSessionOptions {
  /** Caller-owned session; never closed by the client */
  session?: BlockingSession | undefined;
}

/**
 * Adapter for the blocking transport. Every call completes before it returns.
 */
export class BlockingClient extends HttpClientAdapter<ClientRequest, BlockingResponse> {
  readonly exceptions = blockingExceptions;
  private readonly session: OwnedSession<BlockingSession>;

  constructor(options: BlockingClientOptions = {}) {
    super();
    const { session, ...sessionOptions } = options;
    this.session = new OwnedSession('blocking', () => BlockingClient.createSession(sessionOptions), session);
  }

  /** Builds the session used when none is supplied */
  static createSession(options: FetchWorkerSessionOptions): BlockingSession {
    return new FetchWorkerSession(options);
  }

  send(request: ClientRequest): BlockingResponse {
    const [method, url, extras] = request;
    try {
      return this.session.get().request(method, url, extras);
    } catch (error) {
      throw this.exceptions.translate(error);
    }
  }

  /**
   * Send for an offloading caller. Uses the session's non-parking request
   * when it has one, so the thread running the offload stays free.
   */
  async sendOffloaded(request: ClientRequest): Promise<BlockingResponse> {
    const [method, url, extras] = request;
    const session = this.session.get();
    try {
      return session.requestAsync
        ? await session.requestAsync(method, url, extras)
        : session.request(method, url, extras);
    } catch (error) {
      throw this.exceptions.translate(error);
    }
  }

  applyCallback<T>(callback: (response: BlockingResponse) => T, response: BlockingResponse): T {
    return callback(response);
  }

  close(): void {
    this.session.release((session) => session.close());
  }

  io(): BlockingStrategy {
    return new BlockingStrategy();
  }
}
