import { BaseClientException, type ExceptionTriple } from '@wirecall/http';

/** The outcome of one attempt, as a retry condition sees it */
export type RetryOutcome =
  | { readonly kind: 'failure'; readonly failure: ExceptionTriple }
  | { readonly kind: 'response'; readonly response: unknown };

/** Returns true when the outcome should be retried */
export type RetryCondition = (outcome: RetryOutcome) => boolean;

export type ErrorClass = abstract new (...args: never[]) => Error;

/**
 * Retries failures that are instances of any of the given classes. Use the
 * taxonomy classes (or an adapter's `exceptions` table) to stay transport-agnostic.
 */
export function raises(...classes: ErrorClass[]): RetryCondition {
  const matched: readonly ErrorClass[] = classes.length === 0 ? [BaseClientException] : classes;
  return (outcome) =>
    outcome.kind === 'failure' && matched.some((errorClass) => outcome.failure.error instanceof errorClass);
}

/** Retries responses whose status code is one of `codes` */
export function status(...codes: number[]): RetryCondition {
  const wanted = new Set(codes);
  return (outcome) => {
    if (outcome.kind !== 'response') {
      return false;
    }
    const code = statusOf(outcome.response);
    return code !== undefined && wanted.has(code);
  };
}

export function anyWhen(...conditions: RetryCondition[]): RetryCondition {
  return (outcome) => conditions.some((condition) => condition(outcome));
}

function statusOf(response: unknown): number | undefined {
  if (typeof response !== 'object' || response === null || !('status' in response)) {
    return undefined;
  }
  return typeof response.status === 'number' ? response.status : undefined;
}
