import { transitions, type ExceptionTriple, type RequestTemplate, type Transition } from '@wirecall/http';
import { getLogger } from '@wirecall/logger';
import { z } from 'zod';

import { parseOptions } from '../options.js';

import { exponential, type Backoff } from './backoff.js';
import { anyStop, stopAfterAttempt, stopAfterDelay, type StopCondition } from './stop.js';
import { raises, type RetryCondition, type RetryOutcome } from './when.js';

const retryLimitsSchema = z.object({
  maxAttempts: z.number().int().positive().default(3),
  maxElapsedMs: z.number().positive().finite().optional(),
});

export interface RetryPolicyOptions {
  backoff?: Backoff | undefined;
  /** Attempts in total, the first included. Ignored when `stop` is given. */
  maxAttempts?: number | undefined;
  /** Upper bound on the time from the first attempt to the next one. Ignored when `stop` is given. */
  maxElapsedMs?: number | undefined;
  now?: (() => number) | undefined;
  stop?: StopCondition | undefined;
  /** Defaults to retrying every translated transport failure */
  when?: RetryCondition | undefined;
}

interface ResolvedRetryPolicy {
  backoff: Backoff;
  now: () => number;
  stop: StopCondition;
  when: RetryCondition;
}

/**
 * Reusable retry configuration. Templates track the attempts of one request,
 * so take a fresh one per request from `createTemplate()`.
 */
export class RetryPolicy {
  private readonly resolved: ResolvedRetryPolicy;

  constructor(options: RetryPolicyOptions = {}) {
    const limits = parseOptions(retryLimitsSchema, 'retry policy', {
      maxAttempts: options.maxAttempts,
      maxElapsedMs: options.maxElapsedMs,
    });
    const defaultStop =
      limits.maxElapsedMs === undefined
        ? stopAfterAttempt(limits.maxAttempts)
        : anyStop(stopAfterAttempt(limits.maxAttempts), stopAfterDelay(limits.maxElapsedMs));

    this.resolved = {
      backoff: options.backoff ?? exponential(),
      now: options.now ?? Date.now,
      stop: options.stop ?? defaultStop,
      when: options.when ?? raises(),
    };
  }

  createTemplate<Req, Res>(): RetryTemplate<Req, Res> {
    return new RetryTemplate(this.resolved);
  }
}

/**
 * Claims the outcomes its policy selects and asks for a pause before the
 * next attempt, until the stop condition gives up. Everything else is left
 * to the default lifecycle.
 */
export class RetryTemplate<Req, Res> implements RequestTemplate<Req, Res> {
  private readonly logger = getLogger('RetryTemplate');
  private attempt = 0;
  private startedAt: number | undefined;

  constructor(private readonly policy: ResolvedRetryPolicy) {}

  /** Attempts started so far */
  get attempts(): number {
    return this.attempt;
  }

  beforeRequest(_request: Req): undefined {
    this.startedAt ??= this.policy.now();
    this.attempt++;
    return undefined;
  }

  afterResponse(_request: Req, response: Res): Transition<Req, Res> {
    return this.evaluate({ kind: 'response', response });
  }

  afterException(_request: Req, failure: ExceptionTriple): Transition<Req, Res> {
    return this.evaluate({ failure, kind: 'failure' });
  }

  private evaluate(outcome: RetryOutcome): Transition<Req, Res> {
    if (!this.policy.when(outcome)) {
      return transitions.none;
    }

    const now = this.policy.now();
    const nextDelayMs = this.policy.backoff({
      attempt: this.attempt,
      failure: outcome.kind === 'failure' ? outcome.failure : undefined,
      now,
      response: outcome.kind === 'response' ? outcome.response : undefined,
    });
    const elapsedMs = now - (this.startedAt ?? now);

    if (this.policy.stop({ attempt: this.attempt, elapsedMs, nextDelayMs })) {
      this.logger.debug({ attempt: this.attempt, elapsedMs }, 'Giving up retrying');
      return transitions.none;
    }

    this.logger.debug(
      { attempt: this.attempt, delayMs: nextDelayMs, reason: outcome.kind === 'failure' ? outcome.failure.kind : 'response' },
      'Retrying request'
    );
    if (outcome.kind === 'response') {
      this.discardBody(outcome.response);
    }
    return transitions.retry(nextDelayMs);
  }

  // A streamed body holds its connection until it is read or cancelled
  private discardBody(response: unknown): void {
    if (typeof response !== 'object' || response === null || !('body' in response)) {
      return;
    }
    const { body } = response;
    if (typeof body !== 'object' || body === null || !('cancel' in body) || typeof body.cancel !== 'function') {
      return;
    }
    const cancel = body.cancel;
    Promise.resolve(cancel.call(body)).then(undefined, (error: unknown) => {
      this.logger.debug({ error }, 'Failed to discard the body of a retried response');
    });
  }
}
