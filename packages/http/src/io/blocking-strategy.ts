import { getLogger } from '@wirecall/logger';

import { isPromiseLike, type Awaitable } from '../core/awaitable.js';
import { UnsupportedConfigurationError } from '../errors.js';
import { toExceptionTriple, type ExceptionTriple } from '../exceptions/exception-triple.js';

import type {
  Client,
  Executable,
  ExecutionStrategy,
  SendCallback,
  SleepCallback,
} from './interfaces.js';

export interface BlockingEffects {
  /** Blocks the calling thread for the given milliseconds */
  sleepSync: (ms: number) => void;
}

const logger = getLogger('BlockingStrategy');

const blockingSleep = (ms: number): void => {
  Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
};

/**
 * Strategy for the blocking model: every operation completes on the calling
 * stack before it returns.
 */
export class BlockingStrategy implements ExecutionStrategy {
  readonly model = 'blocking';
  private readonly effects: BlockingEffects;

  constructor(effects?: Partial<BlockingEffects>) {
    this.effects = {
      sleepSync: blockingSleep,
      ...effects,
    };
  }

  send<Req, Res>(client: Client<Req, Res>, request: Req, callback: SendCallback<Res>): void {
    let response: Res;
    try {
      response = expectValue(client.send(request), 'Client.send');
    } catch (error) {
      if (error instanceof UnsupportedConfigurationError) {
        throw error;
      }
      callback.onFailure(toExceptionTriple(error));
      return;
    }
    // Outside the try: a template error raised while handling the response is not a send failure
    callback.onSuccess(response);
  }

  sleep(durationMs: number, callback: SleepCallback): void {
    try {
      this.effects.sleepSync(durationMs);
    } catch (error) {
      callback.onFailure(toExceptionTriple(error));
      return;
    }
    callback.onSuccess();
  }

  finish<Res>(response: Res): Res {
    return response;
  }

  fail(failure: ExceptionTriple): never {
    throw failure.error;
  }

  execute<T>(executable: Executable<T>): T {
    for (;;) {
      const step = expectValue(executable.execute(), 'Executable.execute');
      if (step.done) {
        return step.value;
      }
    }
  }
}

function expectValue<T>(value: Awaitable<T>, source: string): T {
  if (isPromiseLike(value)) {
    // The work behind the refused promise is already under way; observe its outcome
    Promise.resolve(value).then(undefined, (error: unknown) => {
      logger.warn({ error, source }, 'Promise refused by the blocking strategy was rejected');
    });
    throw new UnsupportedConfigurationError(
      `${source} returned a promise under the blocking strategy; use a cooperative or thread-offload strategy for asynchronous clients`
    );
  }
  return value;
}
