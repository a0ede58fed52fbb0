import type { Awaitable } from '../core/awaitable.js';
import type { ExceptionTable } from '../exceptions/exception-table.js';
import type { Client, ExecutionStrategy } from '../io/interfaces.js';

export interface RequestExtras {
  body?: string | undefined;
  headers?: Readonly<Record<string, string>> | undefined;
  query?: Readonly<Record<string, string | number | boolean>> | undefined;
  /** Per-request timeout; transports fall back to their session default */
  timeoutMs?: number | undefined;
}

/**
 * Opaque request value handed between lifecycle stages. Adapters read it;
 * the state machine never does.
 */
export type ClientRequest = readonly [method: string, url: string, extras: RequestExtras];

/**
 * Normalizes one transport's send, response, close and error behaviour.
 * Concrete adapters also provide `applyCallback`, typed for the responses
 * their callbacks receive.
 *
 * An adapter built around a caller-supplied session never closes it; an
 * adapter that created its own session closes it on `close()`.
 */
export abstract class HttpClientAdapter<Req = ClientRequest, Res = unknown> implements Client<Req, Res> {
  /** Translation table for this transport; the sanctioned way to branch on failure kind */
  abstract readonly exceptions: ExceptionTable;

  abstract send(request: Req): Awaitable<Res>;

  abstract close(): Awaitable<void>;

  /** The strategy matching this adapter's concurrency model */
  abstract io(): ExecutionStrategy;
}

export type AnyClientAdapter = HttpClientAdapter<ClientRequest, unknown>;
