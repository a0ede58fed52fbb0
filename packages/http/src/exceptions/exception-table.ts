import {
  BaseClientException,
  ConnectionError,
  ConnectionTimeout,
  InvalidURL,
  SSLError,
  ServerTimeout,
  taxonomy,
  type TaxonomyKind,
} from '../errors.js';

import { toError } from './exception-triple.js';

/**
 * One entry of a translation table. Rules are evaluated in order, so a table
 * lists the most specific native errors first and its transport's root
 * error last.
 */
export interface ExceptionRule {
  readonly kind: TaxonomyKind;
  readonly matches: (error: unknown) => boolean;
}

/** Rule matching instances of a native error class, directly or through `cause` */
export function whenInstanceOf(
  kind: TaxonomyKind,
  nativeClass: abstract new (...args: never[]) => unknown
): ExceptionRule {
  return { kind, matches: (error) => causeChain(error).some((link) => link instanceof nativeClass) };
}

/** Rule matching errors (or their causes) carrying one of the given `code` values */
export function whenCode(kind: TaxonomyKind, codes: readonly string[]): ExceptionRule {
  const lookup = new Set(codes);
  return { kind, matches: (error) => causeChain(error).some((link) => lookup.has(errorCode(link) ?? '')) };
}

/** Rule matching errors (or their causes) by `name`, for errors without an exported class */
export function whenName(kind: TaxonomyKind, names: readonly string[]): ExceptionRule {
  return { kind, matches: (error) => causeChain(error).some((link) => link instanceof Error && names.includes(link.name)) };
}

export function errorCode(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('code' in error)) {
    return undefined;
  }
  return typeof error.code === 'string' ? error.code : undefined;
}

/** The error followed by its `cause` links, bounded to avoid cycles */
export function causeChain(error: unknown, maxDepth = 5): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = error;
  while (current !== undefined && current !== null && chain.length < maxDepth && !chain.includes(current)) {
    chain.push(current);
    current = current instanceof Error ? current.cause : undefined;
  }
  return chain;
}

/**
 * Per-transport translation table from native errors to the shared taxonomy.
 *
 * The taxonomy classes are exposed as properties so calling code can branch
 * on failure kind through `client.exceptions` without importing the
 * transport.
 */
export class ExceptionTable {
  readonly BaseClientException = BaseClientException;
  readonly ConnectionError = ConnectionError;
  readonly ConnectionTimeout = ConnectionTimeout;
  readonly ServerTimeout = ServerTimeout;
  readonly SSLError = SSLError;
  readonly InvalidURL = InvalidURL;

  constructor(
    readonly transport: string,
    private readonly rules: readonly ExceptionRule[]
  ) {}

  /** Most specific taxonomy kind for a native error, undefined when it is not a transport error */
  classify(error: unknown): TaxonomyKind | undefined {
    return this.rules.find((rule) => rule.matches(error))?.kind;
  }

  isTransportError(error: unknown): boolean {
    return error instanceof BaseClientException || this.classify(error) !== undefined;
  }

  /**
   * Translate a thrown value. Taxonomy errors and non-transport errors are
   * returned unchanged; transport errors are wrapped in their taxonomy class
   * with the native error as `cause`.
   */
  translate(error: unknown): Error {
    if (error instanceof BaseClientException) {
      return error;
    }

    const kind = this.classify(error);
    if (kind === undefined) {
      return toError(error);
    }

    const TaxonomyClass = taxonomy[kind];
    return new TaxonomyClass(toError(error).message, { cause: error, transport: this.transport });
  }
}
