import { Response } from 'undici';

import { WorkerPool } from '../io/worker-pool.js';

export type BodyReader = 'arrayBuffer' | 'json' | 'text';

interface PreparedBodies {
  arrayBuffer?: ArrayBuffer;
  json?: { value: unknown };
  text?: string;
}

/**
 * Synchronous view of an undici response for callbacks that cannot await.
 *
 * The body readers named at preparation are read to completion beforehand,
 * so calling them here returns their value directly. Everything else reads
 * through to the wrapped response.
 */
export class ThreadedResponse {
  private constructor(
    private readonly response: Response,
    private readonly bodies: PreparedBodies
  ) {}

  /**
   * Settle the given body readers on clones of the response, leaving the
   * original body unread. Values that are not undici responses, such as one
   * a template finished with, are wrapped without preparing anything.
   */
  static async prepare(response: Response, fields: readonly BodyReader[] = ['text']): Promise<ThreadedResponse> {
    const bodies: PreparedBodies = {};
    if (!(response instanceof Response)) {
      return new ThreadedResponse(response, bodies);
    }
    for (const field of new Set(fields)) {
      const copy = response.clone();
      switch (field) {
        case 'arrayBuffer':
          bodies.arrayBuffer = await copy.arrayBuffer();
          break;
        case 'json':
          bodies.json = { value: await copy.json() };
          break;
        case 'text':
          bodies.text = await copy.text();
          break;
      }
    }
    return new ThreadedResponse(response, bodies);
  }

  get headers(): Response['headers'] {
    return this.response.headers;
  }

  get ok(): boolean {
    return this.response.ok;
  }

  get redirected(): boolean {
    return this.response.redirected;
  }

  get status(): number {
    return this.response.status;
  }

  get statusText(): string {
    return this.response.statusText;
  }

  get url(): string {
    return this.response.url;
  }

  arrayBuffer(): ArrayBuffer {
    if (this.bodies.arrayBuffer === undefined) {
      throw notPrepared('arrayBuffer');
    }
    return this.bodies.arrayBuffer;
  }

  json(): unknown {
    if (this.bodies.json === undefined) {
      throw notPrepared('json');
    }
    return this.bodies.json.value;
  }

  text(): string {
    if (this.bodies.text === undefined) {
      throw notPrepared('text');
    }
    return this.bodies.text;
  }

  /** The wrapped response, body still unread */
  unwrap(): Response {
    return this.response;
  }
}

function notPrepared(field: BodyReader): Error {
  return new Error(`Response body reader '${field}' was not prepared; list it in the prepared fields`);
}

export type AsyncResponseCallback<T> = (response: Response) => Promise<T>;
export type SyncResponseCallback<T> = (response: ThreadedResponse) => T;

/** What a sync callback's result settles to: a returned view becomes the response it wraps */
export type Unwrapped<T> = T extends ThreadedResponse ? Response : T;

export function unwrapView<T>(value: T): Unwrapped<T>;
export function unwrapView(value: unknown): unknown {
  return value instanceof ThreadedResponse ? value.unwrap() : value;
}

export interface ThreadedCallbackOptions {
  fields?: readonly BodyReader[] | undefined;
  pool?: WorkerPool | undefined;
}

/**
 * Adapt a synchronous callback for cooperative use: the response's body
 * readers are settled and the callback runs on the bounded pool, never on
 * the caller's turn of the event loop. A callback that returns its view
 * resolves to the original response.
 */
export function threadedCallback<T>(
  callback: SyncResponseCallback<T>,
  options: ThreadedCallbackOptions = {}
): AsyncResponseCallback<Unwrapped<T>> {
  const pool = options.pool ?? new WorkerPool();
  return (response) =>
    pool.run(() => ThreadedResponse.prepare(response, options.fields).then((view) => unwrapView(callback(view))));
}
