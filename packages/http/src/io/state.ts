import { settle, type Awaitable } from '../core/awaitable.js';
import { IllegalRequestStateTransition } from '../errors.js';
import type { ExceptionTriple } from '../exceptions/exception-triple.js';

import type { Client, ExecutionStep, ExecutionStrategy, RequestTemplate } from './interfaces.js';
import { failWith, finish, send, type Transition } from './transitions.js';

export type RequestStateName = 'Created' | 'Prepared' | 'Sending' | 'Sleeping' | 'Finished' | 'Failed';

/**
 * What a state needs from the execution that owns it.
 */
export interface StateExecution<Req, Res> {
  readonly client: Client<Req, Res>;
  readonly strategy: ExecutionStrategy;
  readonly template: RequestTemplate<Req, Res>;
  transitionTo(next: RequestState<Req, Res>): void;
}

const CONTINUE = { done: false } as const;

/**
 * One immutable stage of a request's lifecycle. Every transition method
 * throws unless the concrete state overrides it, so a template asking for an
 * unreachable transition fails loudly.
 */
export abstract class RequestState<Req, Res> {
  abstract readonly name: RequestStateName;

  constructor(readonly request: Req) {}

  get terminal(): boolean {
    return false;
  }

  prepare(_request: Req): RequestState<Req, Res> {
    throw new IllegalRequestStateTransition(this.name, 'prepare');
  }

  send(_request: Req): RequestState<Req, Res> {
    throw new IllegalRequestStateTransition(this.name, 'send');
  }

  sleep(_durationMs: number): RequestState<Req, Res> {
    throw new IllegalRequestStateTransition(this.name, 'sleep');
  }

  finish(_response: Res): RequestState<Req, Res> {
    throw new IllegalRequestStateTransition(this.name, 'finish');
  }

  fail(_failure: ExceptionTriple): RequestState<Req, Res> {
    throw new IllegalRequestStateTransition(this.name, 'fail');
  }

  /** Perform this state's single step */
  abstract execute(execution: StateExecution<Req, Res>): Awaitable<ExecutionStep<Res>>;

  toString(): string {
    return this.name;
  }
}

export class Created<Req, Res> extends RequestState<Req, Res> {
  readonly name = 'Created';

  override prepare(request: Req): RequestState<Req, Res> {
    return new Prepared(request);
  }

  execute(execution: StateExecution<Req, Res>): ExecutionStep<Res> {
    execution.transitionTo(this.prepare(this.request));
    return CONTINUE;
  }
}

export class Prepared<Req, Res> extends RequestState<Req, Res> {
  readonly name = 'Prepared';

  override send(request: Req): RequestState<Req, Res> {
    return new Sending(request);
  }

  override sleep(durationMs: number): RequestState<Req, Res> {
    return new Sleeping(this.request, durationMs);
  }

  override finish(response: Res): RequestState<Req, Res> {
    return new Finished(this.request, response);
  }

  override fail(failure: ExceptionTriple): RequestState<Req, Res> {
    return new Failed(this.request, failure);
  }

  execute(execution: StateExecution<Req, Res>): ExecutionStep<Res> {
    const transition = execution.template.beforeRequest?.(this.request);
    execution.transitionTo(applyTransition(this, orDefault(transition, send(this.request))));
    return CONTINUE;
  }
}

export class Sending<Req, Res> extends RequestState<Req, Res> {
  readonly name = 'Sending';

  override finish(response: Res): RequestState<Req, Res> {
    return new Finished(this.request, response);
  }

  override fail(failure: ExceptionTriple): RequestState<Req, Res> {
    return new Failed(this.request, failure);
  }

  override sleep(durationMs: number): RequestState<Req, Res> {
    return new Sleeping(this.request, durationMs);
  }

  execute(execution: StateExecution<Req, Res>): Awaitable<ExecutionStep<Res>> {
    const { request } = this;
    const { template } = execution;
    const sent = execution.strategy.send(execution.client, request, {
      onFailure: (failure) => {
        const transition = template.afterException?.(request, failure);
        execution.transitionTo(applyTransition(this, orDefault(transition, failWith(failure))));
      },
      onSuccess: (response) => {
        const transition = template.afterResponse?.(request, response);
        execution.transitionTo(applyTransition(this, orDefault(transition, finish(response))));
      },
    });
    return settle(sent, () => CONTINUE);
  }
}

export class Sleeping<Req, Res> extends RequestState<Req, Res> {
  readonly name = 'Sleeping';

  constructor(
    request: Req,
    readonly durationMs: number
  ) {
    super(request);
  }

  override prepare(request: Req): RequestState<Req, Res> {
    return new Prepared(request);
  }

  override fail(failure: ExceptionTriple): RequestState<Req, Res> {
    return new Failed(this.request, failure);
  }

  execute(execution: StateExecution<Req, Res>): Awaitable<ExecutionStep<Res>> {
    const slept = execution.strategy.sleep(this.durationMs, {
      onFailure: (failure) => execution.transitionTo(this.fail(failure)),
      onSuccess: () => execution.transitionTo(this.prepare(this.request)),
    });
    return settle(slept, () => CONTINUE);
  }
}

export class Finished<Req, Res> extends RequestState<Req, Res> {
  readonly name = 'Finished';

  constructor(
    request: Req,
    readonly response: Res
  ) {
    super(request);
  }

  override get terminal(): boolean {
    return true;
  }

  override sleep(durationMs: number): RequestState<Req, Res> {
    return new Sleeping(this.request, durationMs);
  }

  execute(execution: StateExecution<Req, Res>): Awaitable<ExecutionStep<Res>> {
    return settle(execution.strategy.finish(this.response), (value) => ({ done: true, value }) as const);
  }
}

export class Failed<Req, Res> extends RequestState<Req, Res> {
  readonly name = 'Failed';

  constructor(
    request: Req,
    readonly failure: ExceptionTriple
  ) {
    super(request);
  }

  override get terminal(): boolean {
    return true;
  }

  override sleep(durationMs: number): RequestState<Req, Res> {
    return new Sleeping(this.request, durationMs);
  }

  execute(execution: StateExecution<Req, Res>): Awaitable<never> {
    return execution.strategy.fail(this.failure);
  }
}

function orDefault<Req, Res>(
  transition: Transition<Req, Res> | undefined,
  fallback: Transition<Req, Res>
): Transition<Req, Res> {
  return transition === undefined || transition.kind === 'none' ? fallback : transition;
}

/**
 * Interpret a template's transition against the current state.
 * @throws IllegalRequestStateTransition when the state does not support it
 */
export function applyTransition<Req, Res>(
  state: RequestState<Req, Res>,
  transition: Transition<Req, Res>
): RequestState<Req, Res> {
  switch (transition.kind) {
    case 'none':
      return state;
    case 'prepare':
      return state.prepare(transition.request);
    case 'send':
      return state.send(transition.request);
    case 'retry':
      return state.sleep(transition.delayMs);
    case 'finish':
      return state.finish(transition.response);
    case 'fail':
      return state.fail(transition.failure);
  }
}
