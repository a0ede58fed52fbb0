import { toExceptionTriple, type ExceptionTriple } from '../exceptions/exception-triple.js';

// Tagged transitions a RequestTemplate hook may return to redirect the
// request lifecycle. The state machine interprets the tag.

export interface NoneTransition {
  readonly kind: 'none';
}

export interface PrepareTransition<Req> {
  readonly kind: 'prepare';
  readonly request: Req;
}

export interface SendTransition<Req> {
  readonly kind: 'send';
  readonly request: Req;
}

export interface RetryTransition {
  readonly kind: 'retry';
  readonly delayMs: number;
}

export interface FinishTransition<Res> {
  readonly kind: 'finish';
  readonly response: Res;
}

export interface FailTransition {
  readonly kind: 'fail';
  readonly failure: ExceptionTriple;
}

export type Transition<Req = unknown, Res = unknown> =
  | NoneTransition
  | PrepareTransition<Req>
  | SendTransition<Req>
  | RetryTransition
  | FinishTransition<Res>
  | FailTransition;

export type TransitionKind = Transition['kind'];

/** Keep the default lifecycle */
export const none: NoneTransition = { kind: 'none' };

/** Go (back) to preparing the given request */
export const prepare = <Req>(request: Req): PrepareTransition<Req> => ({ kind: 'prepare', request });

/** Send the given request, possibly a rewritten one */
export const send = <Req>(request: Req): SendTransition<Req> => ({ kind: 'send', request });

/** Pause for `delayMs`, then prepare the request again */
export const retry = (delayMs: number): RetryTransition => {
  if (!Number.isFinite(delayMs) || delayMs < 0) {
    throw new RangeError(`Retry delay must be a non-negative finite number, got ${delayMs}`);
  }
  return { delayMs, kind: 'retry' };
};

/** Complete with the given (possibly synthesized) response */
export const finish = <Res>(response: Res): FinishTransition<Res> => ({ kind: 'finish', response });

/** Fail with the given error */
export const fail = (error: unknown): FailTransition => ({ failure: toExceptionTriple(error), kind: 'fail' });

/** Fail with an already normalized failure */
export const failWith = (failure: ExceptionTriple): FailTransition => ({ failure, kind: 'fail' });
