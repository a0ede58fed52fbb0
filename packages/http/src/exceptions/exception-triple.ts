/**
 * Normalized failure handed from a strategy to the state machine:
 * the error's kind (its class name), the error itself and its stack.
 */
export interface ExceptionTriple {
  readonly kind: string;
  readonly error: Error;
  readonly trace: string | undefined;
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

export function toExceptionTriple(value: unknown): ExceptionTriple {
  const error = toError(value);
  return { error, kind: error.name, trace: error.stack };
}
