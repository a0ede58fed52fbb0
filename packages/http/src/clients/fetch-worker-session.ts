import { MessageChannel, receiveMessageOnPort, Worker, type MessagePort } from 'node:worker_threads';

import { getLogger } from '@wirecall/logger';
import { z } from 'zod';

import { getHttpConfig } from '../config.js';
import { sanitizeUrl, withQuery } from '../core/http-utils.js';
import { CONNECTION_ERROR_CODES, INVALID_URL_CODES, TLS_ERROR_CODES } from '../exceptions/system-codes.js';

import { BufferedResponse, type BlockingSession } from './blocking-session.js';
import type { RequestExtras } from './interfaces.js';
import {
  SessionConnectTimeoutError,
  SessionConnectionError,
  SessionError,
  SessionInvalidURLError,
  SessionReadTimeoutError,
  SessionSSLError,
} from './session-errors.js';

// Runs in the worker. Performs each fetch and posts the buffered outcome,
// either to the request's own reply port or to the session port, waking the
// blocked caller through the shared signal.
const WORKER_SOURCE = `
const { workerData } = require('node:worker_threads');
const { port } = workerData;

port.on('message', async ({ id, signal, replyPort, method, url, headers, body }) => {
  let reply;
  try {
    const response = await fetch(url, { method, headers, body });
    reply = {
      id,
      ok: true,
      status: response.status,
      statusText: response.statusText,
      url: response.url,
      headers: Object.fromEntries(response.headers),
      body: await response.text(),
    };
  } catch (error) {
    const cause = error && error.cause;
    reply = {
      id,
      ok: false,
      name: String((error && error.name) || 'Error'),
      message: String((error && error.message) || error),
      code: (cause && typeof cause.code === 'string' && cause.code) || (error && typeof error.code === 'string' && error.code) || undefined,
    };
  }
  if (replyPort) {
    replyPort.postMessage(reply);
    replyPort.close();
    return;
  }
  port.postMessage(reply);
  Atomics.store(signal, 0, 1);
  Atomics.notify(signal, 0);
});
`;

const replySchema = z.discriminatedUnion('ok', [
  z.object({
    body: z.string(),
    headers: z.record(z.string()),
    id: z.number(),
    ok: z.literal(true),
    status: z.number(),
    statusText: z.string(),
    url: z.string(),
  }),
  z.object({
    code: z.string().optional(),
    id: z.number(),
    message: z.string(),
    name: z.string(),
    ok: z.literal(false),
  }),
]);

type Reply = z.infer<typeof replySchema>;
type FailureReply = Extract<Reply, { ok: false }>;

const CONNECT_TIMEOUT_CODES = ['UND_ERR_CONNECT_TIMEOUT', 'ETIMEDOUT'];
const READ_TIMEOUT_CODES = ['UND_ERR_HEADERS_TIMEOUT', 'UND_ERR_BODY_TIMEOUT'];
const SOCKET_CODES = [...CONNECTION_ERROR_CODES, 'UND_ERR_SOCKET'];

export interface FetchWorkerSessionOptions {
  /** Headers sent with every request; per-request headers win */
  headers?: Readonly<Record<string, string>> | undefined;
  /** Default wait for a reply; falls back to WIRECALL_BLOCKING_TIMEOUT_MS */
  timeoutMs?: number | undefined;
}

/**
 * Blocking session backed by `fetch` on a dedicated worker thread. The
 * calling thread waits on a shared signal until the worker has posted the
 * fully buffered reply.
 */
export class FetchWorkerSession implements BlockingSession {
  private readonly logger = getLogger('FetchWorkerSession');
  private readonly worker: Worker;
  private readonly port: MessagePort;
  private readonly headers: Readonly<Record<string, string>>;
  private readonly timeoutMs: number;
  private nextId = 0;
  private closed = false;

  constructor(options: FetchWorkerSessionOptions = {}) {
    const { port1, port2 } = new MessageChannel();
    this.worker = new Worker(WORKER_SOURCE, { eval: true, transferList: [port2], workerData: { port: port2 } });
    this.worker.unref();
    this.port = port1;
    this.headers = options.headers ?? {};
    this.timeoutMs = options.timeoutMs ?? getHttpConfig().blockingTimeoutMs;
  }

  request(method: string, url: string, extras: RequestExtras): BufferedResponse {
    if (this.closed) {
      throw new SessionError('Session is closed');
    }

    const id = this.nextId++;
    const signal = new Int32Array(new SharedArrayBuffer(4));
    const timeoutMs = extras.timeoutMs ?? this.timeoutMs;

    this.port.postMessage({
      body: extras.body,
      headers: { ...this.headers, ...extras.headers },
      id,
      method,
      signal,
      url: withQuery(url, extras.query),
    });

    if (Atomics.wait(signal, 0, 0, timeoutMs) === 'timed-out') {
      throw timedOut(method, url, timeoutMs);
    }

    return toResponse(this.receive(id));
  }

  /**
   * Same exchange without parking the calling thread: the reply comes back
   * on a port of its own and settles the returned promise.
   */
  requestAsync(method: string, url: string, extras: RequestExtras): Promise<BufferedResponse> {
    if (this.closed) {
      return Promise.reject(new SessionError('Session is closed'));
    }

    const id = this.nextId++;
    const timeoutMs = extras.timeoutMs ?? this.timeoutMs;
    const { port1: replies, port2: replyPort } = new MessageChannel();

    return new Promise<BufferedResponse>((resolve, reject) => {
      const timer = setTimeout(() => {
        replies.close();
        reject(timedOut(method, url, timeoutMs));
      }, timeoutMs);

      replies.once('message', (message: unknown) => {
        clearTimeout(timer);
        replies.close();
        const parsed = replySchema.safeParse(message);
        if (!parsed.success) {
          reject(new SessionError(`Fetch worker sent a malformed reply to request ${id}`));
          return;
        }
        try {
          resolve(toResponse(parsed.data));
        } catch (error) {
          reject(error);
        }
      });

      this.logger.trace({ id, method, url: sanitizeUrl(url) }, 'Posting request to fetch worker');
      this.port.postMessage(
        {
          body: extras.body,
          headers: { ...this.headers, ...extras.headers },
          id,
          method,
          replyPort,
          url: withQuery(url, extras.query),
        },
        [replyPort]
      );
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.port.close();
    this.worker.terminate().catch((error: unknown) => {
      this.logger.warn({ error }, 'Failed to terminate fetch worker');
    });
  }

  // Replies to requests that timed out earlier may still be queued; skip them.
  private receive(id: number): Reply {
    for (;;) {
      const received = receiveMessageOnPort(this.port);
      if (received === undefined) {
        throw new SessionError(`Fetch worker signalled without replying to request ${id}`);
      }
      const reply = replySchema.parse(received.message);
      if (reply.id === id) {
        return reply;
      }
      this.logger.debug({ id: reply.id }, 'Discarding stale fetch worker reply');
    }
  }
}

function timedOut(method: string, url: string, timeoutMs: number): SessionReadTimeoutError {
  return new SessionReadTimeoutError(`No response from ${method} ${sanitizeUrl(url)} within ${timeoutMs}ms`);
}

function toResponse(reply: Reply): BufferedResponse {
  if (!reply.ok) {
    throw toSessionError(reply);
  }
  return new BufferedResponse(reply);
}

function toSessionError(reply: FailureReply): SessionError {
  const { code, message } = reply;
  if (code === undefined) {
    return new SessionError(message);
  }
  if (INVALID_URL_CODES.includes(code)) {
    return new SessionInvalidURLError(message, code);
  }
  if (TLS_ERROR_CODES.includes(code)) {
    return new SessionSSLError(message, code);
  }
  if (CONNECT_TIMEOUT_CODES.includes(code)) {
    return new SessionConnectTimeoutError(message, code);
  }
  if (READ_TIMEOUT_CODES.includes(code)) {
    return new SessionReadTimeoutError(message, code);
  }
  if (SOCKET_CODES.includes(code)) {
    return new SessionConnectionError(message, code);
  }
  return new SessionError(message, code);
}
