import { toExceptionTriple, type ExceptionTriple } from '../exceptions/exception-triple.js';

import { BlockingStrategy } from './blocking-strategy.js';
import type {
  Client,
  Executable,
  ExecutionStrategy,
  SendCallback,
  SleepCallback,
} from './interfaces.js';
import { assertOffloadRuntime } from './runtime.js';
import { WorkerPool } from './worker-pool.js';

export interface ThreadedStrategyOptions {
  /** Wrapped strategy that finishes and fails on the pool */
  blocking?: BlockingStrategy | undefined;
  delay?: ((ms: number) => Promise<void>) | undefined;
  /**
   * Pool the strategy dispatches on. Do not share a single-slot pool with a
   * ThreadedClient: the strategy holds a slot while the client's send waits for one.
   */
  pool?: WorkerPool | undefined;
}

/**
 * Strategy for the thread-offload model: sends, callback continuations,
 * finish and fail are dispatched on a bounded pool and yield promises.
 */
export class ThreadedStrategy implements ExecutionStrategy {
  readonly model = 'thread-offload';
  readonly pool: WorkerPool;
  private readonly blocking: BlockingStrategy;
  private readonly delay: (ms: number) => Promise<void>;

  constructor(options: ThreadedStrategyOptions = {}) {
    assertOffloadRuntime('ThreadedStrategy');

    this.pool = options.pool ?? new WorkerPool();
    this.blocking = options.blocking ?? new BlockingStrategy();
    this.delay = options.delay ?? ((ms: number) => new Promise((resolve) => setTimeout(resolve, ms)));
  }

  send<Req, Res>(client: Client<Req, Res>, request: Req, callback: SendCallback<Res>): Promise<void> {
    return this.pool.run<Res>(() => client.send(request)).then(
      (response) => this.pool.run(() => callback.onSuccess(response)),
      (error: unknown) => this.pool.run(() => callback.onFailure(toExceptionTriple(error)))
    );
  }

  sleep(durationMs: number, callback: SleepCallback): Promise<void> {
    return new Promise<void>((resolve) => resolve(this.delay(durationMs))).then(
      () => this.pool.run(() => callback.onSuccess()),
      (error: unknown) => this.pool.run(() => callback.onFailure(toExceptionTriple(error)))
    );
  }

  finish<Res>(response: Res): Promise<Res> {
    return this.pool.run(() => this.blocking.finish(response));
  }

  fail(failure: ExceptionTriple): Promise<never> {
    return this.pool.run<never>(() => this.blocking.fail(failure));
  }

  // Steps are awaited here rather than dispatched: a step already holds pool
  // slots for its own work, and nesting it would exhaust a small pool.
  async execute<T>(executable: Executable<T>): Promise<T> {
    for (;;) {
      const step = await executable.execute();
      if (step.done) {
        return step.value;
      }
    }
  }
}
