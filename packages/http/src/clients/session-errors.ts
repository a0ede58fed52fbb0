// Native error hierarchy of the built-in blocking session

export class SessionError extends Error {
  constructor(
    message: string,
    public readonly code?: string | undefined
  ) {
    super(message);
    this.name = 'SessionError';
  }
}

export class SessionConnectionError extends SessionError {
  constructor(message: string, code?: string | undefined) {
    super(message, code);
    this.name = 'SessionConnectionError';
  }
}

export class SessionConnectTimeoutError extends SessionConnectionError {
  constructor(message: string, code?: string | undefined) {
    super(message, code);
    this.name = 'SessionConnectTimeoutError';
  }
}

export class SessionSSLError extends SessionConnectionError {
  constructor(message: string, code?: string | undefined) {
    super(message, code);
    this.name = 'SessionSSLError';
  }
}

export class SessionReadTimeoutError extends SessionError {
  constructor(message: string, code?: string | undefined) {
    super(message, code);
    this.name = 'SessionReadTimeoutError';
  }
}

export class SessionInvalidURLError extends SessionError {
  constructor(message: string, code?: string | undefined) {
    super(message, code);
    this.name = 'SessionInvalidURLError';
  }
}
