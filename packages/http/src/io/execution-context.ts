import { getLogger } from '@wirecall/logger';

import { isPromiseLike, settle, type Awaitable } from '../core/awaitable.js';
import { IllegalRequestStateTransition } from '../errors.js';

import type { Client, Executable, ExecutionStrategy, RequestTemplate } from './interfaces.js';
import { Created, Failed, type RequestState, type StateExecution } from './state.js';

export interface ExecutionContextOptions<Req, Res> {
  client: Client<Req, Res>;
  request: Req;
  strategy: ExecutionStrategy;
  template?: RequestTemplate<Req, Res> | undefined;
}

/** One step of an execution: the state it left the machine in, or the terminal value */
export type ContextStep<Req, Res> =
  | { readonly done: false; readonly state: RequestState<Req, Res> }
  | { readonly done: true; readonly value: Res };

/**
 * Drives a single request through its lifecycle, one state per step.
 *
 * The context owns exactly one live state and replaces it wholesale on every
 * transition. A step requested while an asynchronous step is still running
 * is queued behind it, so concurrent callers observe the steps in order.
 * Once the terminal step has been consumed, further steps throw
 * IllegalRequestStateTransition.
 */
export class ExecutionContext<Req, Res>
  implements Executable<Res>, StateExecution<Req, Res>, AsyncIterable<ContextStep<Req, Res>>
{
  readonly client: Client<Req, Res>;
  readonly strategy: ExecutionStrategy;
  readonly template: RequestTemplate<Req, Res>;

  private readonly logger = getLogger('ExecutionContext');
  private current: RequestState<Req, Res>;
  private inFlight: Promise<ContextStep<Req, Res>> | undefined;
  private consumed = false;

  constructor(options: ExecutionContextOptions<Req, Res>) {
    this.client = options.client;
    this.strategy = options.strategy;
    this.template = options.template ?? {};
    this.current = new Created(options.request);
  }

  get state(): RequestState<Req, Res> {
    return this.current;
  }

  transitionTo(next: RequestState<Req, Res>): void {
    if (next instanceof Failed) {
      this.logger.warn(
        { from: this.current.name, kind: next.failure.kind, model: this.strategy.model },
        `Request failed: ${next.failure.error.message}`
      );
    } else {
      this.logger.debug({ from: this.current.name, model: this.strategy.model, to: next.name }, 'Request state transition');
    }
    this.current = next;
  }

  /** Perform exactly one step */
  execute(): Awaitable<ContextStep<Req, Res>> {
    if (this.inFlight) {
      return this.track(
        this.inFlight.then(
          () => this.step(),
          () => this.step()
        )
      );
    }

    const result = this.step();
    return isPromiseLike(result) ? this.track(result) : result;
  }

  /** Drive the execution to its terminal value with the bound strategy */
  run(): Awaitable<Res> {
    return this.strategy.execute(this);
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<ContextStep<Req, Res>, void, undefined> {
    for (;;) {
      const step = await this.execute();
      yield step;
      if (step.done) {
        return;
      }
    }
  }

  private step(): Awaitable<ContextStep<Req, Res>> {
    const state = this.current;
    if (this.consumed) {
      throw new IllegalRequestStateTransition(state.name, 'execute');
    }
    if (state.terminal) {
      this.consumed = true;
    }

    return settle(state.execute(this), (outcome): ContextStep<Req, Res> =>
      outcome.done ? outcome : { done: false, state: this.current }
    );
  }

  private track(pending: PromiseLike<ContextStep<Req, Res>>): Promise<ContextStep<Req, Res>> {
    const tracked = new Promise<ContextStep<Req, Res>>((resolve) => resolve(pending));
    this.inFlight = tracked;

    const clear = () => {
      if (this.inFlight === tracked) {
        this.inFlight = undefined;
      }
    };
    void tracked.then(clear, clear);
    return tracked;
  }
}
