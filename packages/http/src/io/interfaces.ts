import type { Awaitable } from '../core/awaitable.js';
import type { ExceptionTriple } from '../exceptions/exception-triple.js';

import type { Transition } from './transitions.js';

/**
 * Resumes a running execution after a send
 */
export interface SendCallback<Res> {
  onSuccess(response: Res): void;
  onFailure(failure: ExceptionTriple): void;
}

/**
 * Resumes a running execution after an intended pause
 */
export interface SleepCallback {
  onSuccess(): void;
  onFailure(failure: ExceptionTriple): void;
}

/**
 * Anything that performs one request/response exchange. Client adapters
 * satisfy it; so does any test double with a `send` method.
 */
export interface Client<Req, Res> {
  send(request: Req): Awaitable<Res>;
}

export type ExecutionStep<T> = { readonly done: false } | { readonly done: true; readonly value: T };

/**
 * Something a strategy can drive to completion one step at a time.
 */
export interface Executable<T> {
  execute(): Awaitable<ExecutionStep<T>>;
}

/**
 * Adapter binding the request lifecycle to one concurrency model.
 */
export interface ExecutionStrategy {
  /** Short label used in logs */
  readonly model: 'blocking' | 'cooperative' | 'thread-offload';

  /**
   * Send `request` with `client`, then invoke exactly one of the callback's
   * handlers. Client failures never escape; they reach `onFailure`.
   */
  send<Req, Res>(client: Client<Req, Res>, request: Req, callback: SendCallback<Res>): Awaitable<void>;

  sleep(durationMs: number, callback: SleepCallback): Awaitable<void>;

  finish<Res>(response: Res): Awaitable<Res>;

  /** Propagate the failure the way this model propagates errors */
  fail(failure: ExceptionTriple): Awaitable<never>;

  execute<T>(executable: Executable<T>): Awaitable<T>;
}

/**
 * Hooks for redirecting the lifecycle of a request. Return `undefined` (or
 * the `none` transition) to keep the default behaviour of the hook point:
 * send, finish and fail respectively.
 */
export interface RequestTemplate<Req = unknown, Res = unknown> {
  beforeRequest?(request: Req): Transition<Req, Res> | undefined;
  afterResponse?(request: Req, response: Res): Transition<Req, Res> | undefined;
  afterException?(request: Req, failure: ExceptionTriple): Transition<Req, Res> | undefined;
}
