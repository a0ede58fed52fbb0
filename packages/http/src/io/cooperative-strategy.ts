import { toExceptionTriple, type ExceptionTriple } from '../exceptions/exception-triple.js';

import type {
  Client,
  Executable,
  ExecutionStrategy,
  SendCallback,
  SleepCallback,
} from './interfaces.js';
import { assertCooperativeRuntime } from './runtime.js';

export interface CooperativeEffects {
  delay: (ms: number) => Promise<void>;
}

/**
 * Strategy for the event loop: every operation is a suspension point and
 * returns a promise.
 */
export class CooperativeStrategy implements ExecutionStrategy {
  readonly model = 'cooperative';
  private readonly effects: CooperativeEffects;

  constructor(effects?: Partial<CooperativeEffects>) {
    assertCooperativeRuntime('CooperativeStrategy');

    this.effects = {
      delay: (ms: number) => new Promise((resolve) => setTimeout(resolve, ms)),
      ...effects,
    };
  }

  send<Req, Res>(client: Client<Req, Res>, request: Req, callback: SendCallback<Res>): Promise<void> {
    // The rejection handler only sees send failures, never errors thrown by onSuccess
    return new Promise<Res>((resolve) => resolve(client.send(request))).then(
      (response) => callback.onSuccess(response),
      (error: unknown) => callback.onFailure(toExceptionTriple(error))
    );
  }

  sleep(durationMs: number, callback: SleepCallback): Promise<void> {
    return new Promise<void>((resolve) => resolve(this.effects.delay(durationMs))).then(
      () => callback.onSuccess(),
      (error: unknown) => callback.onFailure(toExceptionTriple(error))
    );
  }

  async finish<Res>(response: Res): Promise<Res> {
    return response;
  }

  async fail(failure: ExceptionTriple): Promise<never> {
    throw failure.error;
  }

  async execute<T>(executable: Executable<T>): Promise<T> {
    for (;;) {
      const step = await executable.execute();
      if (step.done) {
        return step.value;
      }
    }
  }
}
