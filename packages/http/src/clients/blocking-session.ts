import type { RequestExtras } from './interfaces.js';

/**
 * Fully buffered response returned by blocking sessions. Reading the body
 * never blocks or suspends.
 */
export interface BlockingResponse {
  readonly headers: Readonly<Record<string, string>>;
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  json(): unknown;
  text(): string;
}

/**
 * Native session of the blocking transport: one synchronous exchange per
 * call, raising the session's own error hierarchy on failure.
 */
export interface BlockingSession {
  request(method: string, url: string, extras: RequestExtras): BlockingResponse;
  /** Same exchange without parking the calling thread, where the session can do that */
  requestAsync?(method: string, url: string, extras: RequestExtras): Promise<BlockingResponse>;
  close(): void;
}

export interface BufferedResponseInit {
  body: string;
  headers?: Readonly<Record<string, string>> | undefined;
  status: number;
  statusText?: string | undefined;
  url: string;
}

export class BufferedResponse implements BlockingResponse {
  readonly headers: Readonly<Record<string, string>>;
  readonly status: number;
  readonly statusText: string;
  readonly url: string;
  private readonly body: string;

  constructor(init: BufferedResponseInit) {
    this.body = init.body;
    this.headers = Object.fromEntries(Object.entries(init.headers ?? {}).map(([key, value]) => [key.toLowerCase(), value]));
    this.status = init.status;
    this.statusText = init.statusText ?? '';
    this.url = init.url;
  }

  get ok(): boolean {
    return this.status >= 200 && this.status < 300;
  }

  json(): unknown {
    return JSON.parse(this.body);
  }

  text(): string {
    return this.body;
  }
}

export function isBlockingSession(value: unknown): value is BlockingSession {
  return (
    typeof value === 'object' &&
    value !== null &&
    'request' in value &&
    typeof value.request === 'function' &&
    'close' in value &&
    typeof value.close === 'function'
  );
}
