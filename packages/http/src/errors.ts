// Shared, transport-independent failure taxonomy

export type TaxonomyKind =
  | 'BaseClientException'
  | 'ConnectionError'
  | 'ConnectionTimeout'
  | 'ServerTimeout'
  | 'SSLError'
  | 'InvalidURL';

export interface ClientExceptionOptions {
  /** Native transport error this exception was translated from */
  cause?: unknown;
  /** Label of the transport whose table produced the translation */
  transport?: string | undefined;
}

/**
 * Root of the taxonomy. Catching it catches every translated transport failure.
 */
export class BaseClientException extends Error {
  readonly kind: TaxonomyKind = 'BaseClientException';
  readonly transport: string | undefined;

  constructor(message: string, options: ClientExceptionOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BaseClientException';
    this.transport = options.transport;
  }
}

export class ConnectionError extends BaseClientException {
  override readonly kind: TaxonomyKind = 'ConnectionError';

  constructor(message: string, options?: ClientExceptionOptions) {
    super(message, options);
    this.name = 'ConnectionError';
  }
}

export class ConnectionTimeout extends ConnectionError {
  override readonly kind: TaxonomyKind = 'ConnectionTimeout';

  constructor(message: string, options?: ClientExceptionOptions) {
    super(message, options);
    this.name = 'ConnectionTimeout';
  }
}

export class ServerTimeout extends BaseClientException {
  override readonly kind: TaxonomyKind = 'ServerTimeout';

  constructor(message: string, options?: ClientExceptionOptions) {
    super(message, options);
    this.name = 'ServerTimeout';
  }
}

export class SSLError extends ConnectionError {
  override readonly kind: TaxonomyKind = 'SSLError';

  constructor(message: string, options?: ClientExceptionOptions) {
    super(message, options);
    this.name = 'SSLError';
  }
}

export class InvalidURL extends BaseClientException {
  override readonly kind: TaxonomyKind = 'InvalidURL';

  constructor(message: string, options?: ClientExceptionOptions) {
    super(message, options);
    this.name = 'InvalidURL';
  }
}

export type TaxonomyClass = new (message: string, options?: ClientExceptionOptions) => BaseClientException;

export const taxonomy: Readonly<Record<TaxonomyKind, TaxonomyClass>> = {
  BaseClientException,
  ConnectionError,
  ConnectionTimeout,
  ServerTimeout,
  SSLError,
  InvalidURL,
};

/**
 * A state was asked for a transition it does not support. Indicates a defect
 * in a RequestTemplate (or a caller stepping a finished execution), never a
 * network condition.
 */
export class IllegalRequestStateTransition extends Error {
  constructor(
    public readonly state: string,
    public readonly transition: string
  ) {
    super(
      `Illegal transition [${transition}] from request state [${state}]: ` +
        'this is possibly due to a badly designed RequestTemplate.'
    );
    this.name = 'IllegalRequestStateTransition';
  }
}

/**
 * A runtime the requested adapter or strategy depends on is missing, or two
 * concurrency models were mixed in one execution.
 */
export class UnsupportedConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UnsupportedConfigurationError';
  }
}
