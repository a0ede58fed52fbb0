import { createServer, type Server } from 'node:http';

import { errors, MockAgent, Response } from 'undici';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';

import { BlockingClient } from '../clients/blocking-client.js';
import { BufferedResponse, type BlockingSession } from '../clients/blocking-session.js';
import { FetchWorkerSession } from '../clients/fetch-worker-session.js';
import type { ClientRequest } from '../clients/interfaces.js';
import { SessionConnectTimeoutError, SessionInvalidURLError, SessionReadTimeoutError } from '../clients/session-errors.js';
import { ThreadedClient } from '../clients/threaded-client.js';
import { ThreadedResponse, threadedCallback, unwrapView } from '../clients/threaded-response.js';
import { UndiciClient, type SyncCallbackAdapter } from '../clients/undici-client.js';
import { withClient } from '../clients/with-client.js';
import { ConnectionError, ConnectionTimeout, InvalidURL } from '../errors.js';
import { blockingExceptions } from '../exceptions/blocking-exceptions.js';
import { ThreadedStrategy } from '../io/threaded-strategy.js';
import { WorkerPool } from '../io/worker-pool.js';

const REQUEST: ClientRequest = ['GET', 'http://api.test/x', {}];

function createFakeSession(response = new BufferedResponse({ body: 'pong', status: 200, url: 'http://api.test/x' })) {
  return {
    close: vi.fn(),
    request: vi.fn<BlockingSession['request']>(() => response),
  };
}

function createMockAgent(): MockAgent {
  const agent = new MockAgent();
  agent.disableNetConnect();
  return agent;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('BlockingClient', () => {
  it('should hand the request parts to the session', () => {
    const session = createFakeSession();
    const client = new BlockingClient({ session });

    const response = client.send(['POST', 'http://api.test/x', { body: '{}' }]);

    expect(response.text()).toBe('pong');
    expect(session.request).toHaveBeenCalledWith('POST', 'http://api.test/x', { body: '{}' });
  });

  it('should translate session errors into the taxonomy', () => {
    const session = createFakeSession();
    session.request.mockImplementation(() => {
      throw new SessionConnectTimeoutError('connect timed out', 'ETIMEDOUT');
    });
    const client = new BlockingClient({ session });

    expect(() => client.send(REQUEST)).toThrow(ConnectionTimeout);
  });

  it('should leave a supplied session open', () => {
    const session = createFakeSession();
    const client = new BlockingClient({ session });

    client.send(REQUEST);
    client.close();

    expect(session.close).not.toHaveBeenCalled();
  });

  it('should close the session it created exactly once', () => {
    const session = createFakeSession();
    const createSession = vi.spyOn(BlockingClient, 'createSession').mockReturnValue(session);
    const client = new BlockingClient();

    client.send(REQUEST);
    client.close();
    client.close();

    expect(createSession).toHaveBeenCalledTimes(1);
    expect(session.close).toHaveBeenCalledTimes(1);
  });

  it('should refuse to send after closing', () => {
    const client = new BlockingClient({ session: createFakeSession() });
    client.close();

    expect(() => client.send(REQUEST)).toThrow('blocking session is closed');
  });

  it('should apply callbacks directly', () => {
    const client = new BlockingClient({ session: createFakeSession() });

    expect(client.applyCallback((response) => response.status, client.send(REQUEST))).toBe(200);
  });
});

describe('FetchWorkerSession', () => {
  it('should raise the session error for an unparseable URL', () => {
    const session = new FetchWorkerSession({ timeoutMs: 10_000 });
    try {
      expect(() => session.request('GET', 'not a url', {})).toThrow(SessionInvalidURLError);
    } finally {
      session.close();
    }
  });

  it('should give up waiting after the request timeout', () => {
    const session = new FetchWorkerSession();
    try {
      expect(() => session.request('GET', 'not a url', { timeoutMs: 1 })).toThrow(SessionReadTimeoutError);
    } finally {
      session.close();
    }
  });

  it('should be translated as an invalid URL by the blocking client', () => {
    const client = new BlockingClient({ timeoutMs: 10_000 });
    try {
      expect(() => client.send(['GET', 'not a url', {}])).toThrow(InvalidURL);
    } finally {
      client.close();
    }
  });
});

describe('UndiciClient', () => {
  it('should send through the supplied dispatcher with base URL and query', async () => {
    const agent = createMockAgent();
    agent
      .get('http://api.test')
      .intercept({ method: 'GET', path: '/users?page=2' })
      .reply(200, { id: 1 }, { headers: { 'content-type': 'application/json' } });
    const client = new UndiciClient({ baseUrl: 'http://api.test', session: agent });

    const response = await client.send(['GET', '/users', { query: { page: 2 } }]);

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ id: 1 });
  });

  it('should translate socket failures into connection errors', async () => {
    const agent = createMockAgent();
    agent
      .get('http://api.test')
      .intercept({ method: 'GET', path: '/x' })
      .replyWithError(new errors.SocketError('other side closed'));
    const client = new UndiciClient({ session: agent });

    await expect(client.send(REQUEST)).rejects.toBeInstanceOf(ConnectionError);
  });

  it('should leave a supplied dispatcher open', async () => {
    const agent = createMockAgent();
    const close = vi.spyOn(agent, 'close');
    const client = new UndiciClient({ session: agent });

    await client.close();

    expect(close).not.toHaveBeenCalled();
  });

  it('should close the dispatcher it created exactly once', async () => {
    const agent = createMockAgent();
    agent.get('http://api.test').intercept({ method: 'GET', path: '/x' }).reply(204, '');
    const close = vi.spyOn(agent, 'close');
    vi.spyOn(UndiciClient, 'createSession').mockReturnValue(agent);
    const client = new UndiciClient();

    await client.send(REQUEST);
    await client.close();
    await client.close();

    expect(close).toHaveBeenCalledTimes(1);
  });

  it('should pass asynchronous callbacks through unchanged', () => {
    const client = new UndiciClient({ session: createMockAgent() });
    const callback = async (response: Response) => response.status;

    expect(client.wrapCallback(callback)).toBe(callback);
  });

  it('should run synchronous callbacks against a prepared response', async () => {
    const client = new UndiciClient({ session: createMockAgent() });
    const wrapped = client.wrapCallback((view: ThreadedResponse) => `${view.status}:${view.text()}`);

    await expect(wrapped(new Response('hello', { status: 201 }))).resolves.toBe('201:hello');
  });

  it('should prepare the configured body readers for synchronous callbacks', async () => {
    const client = new UndiciClient({ preparedFields: ['json'], session: createMockAgent() });

    const value = await client.applyCallback((view: ThreadedResponse) => view.json(), new Response('{"a":1}'));

    expect(value).toEqual({ a: 1 });
  });

  it('should use a custom sync callback adapter', async () => {
    let adapted = 0;
    const syncCallbackAdapter: SyncCallbackAdapter = (callback) => {
      adapted++;
      return (response) => ThreadedResponse.prepare(response).then((view) => unwrapView(callback(view)));
    };
    const client = new UndiciClient({ session: createMockAgent(), syncCallbackAdapter });

    const text = await client.applyCallback((view: ThreadedResponse) => view.text(), new Response('x'));

    expect(text).toBe('x');
    expect(adapted).toBe(1);
  });

  it('should resolve to the original response when a synchronous callback returns its view', async () => {
    const client = new UndiciClient({ session: createMockAgent() });
    const original = new Response('x', { status: 202 });

    const value = await client.applyCallback((view: ThreadedResponse) => view, original);

    expect(value).toBe(original);
    await expect(value.text()).resolves.toBe('x');
  });

  it('should hand values that are not responses to synchronous callbacks unprepared', async () => {
    const client = new UndiciClient({ session: createMockAgent() });
    const cached: Response = JSON.parse('{"status":204}');

    await expect(client.applyCallback((view: ThreadedResponse) => view.status, cached)).resolves.toBe(204);
    await expect(client.applyCallback((view: ThreadedResponse) => view, cached)).resolves.toBe(cached);
    await expect(client.applyCallback((view: ThreadedResponse) => view.text(), cached)).rejects.toThrow(
      "Response body reader 'text' was not prepared; list it in the prepared fields"
    );
  });

  it('should apply asynchronous callbacks to the raw response', async () => {
    const client = new UndiciClient({ session: createMockAgent() });

    const status = await client.applyCallback(
      async (response: Response) => response.status,
      new Response('x', { status: 201 })
    );

    expect(status).toBe(201);
  });
});

describe('ThreadedResponse', () => {
  it('should serve prepared body readers synchronously', async () => {
    const response = new Response('{"a":1}', { headers: { 'x-id': '7' }, status: 201 });

    const view = await ThreadedResponse.prepare(response, ['json', 'text']);

    expect(view.json()).toEqual({ a: 1 });
    expect(view.text()).toBe('{"a":1}');
    expect(view.status).toBe(201);
    expect(view.ok).toBe(true);
    expect(view.headers.get('x-id')).toBe('7');
    expect(view.headers).toBe(response.headers);
  });

  it('should refuse readers that were not prepared', async () => {
    const view = await ThreadedResponse.prepare(new Response('x'));

    expect(() => view.arrayBuffer()).toThrow(
      "Response body reader 'arrayBuffer' was not prepared; list it in the prepared fields"
    );
  });

  it('should leave the wrapped body unread', async () => {
    const response = new Response('payload');

    const view = await ThreadedResponse.prepare(response);

    expect(view.unwrap()).toBe(response);
    await expect(view.unwrap().text()).resolves.toBe('payload');
  });

  it('should run adapted callbacks on the given pool', async () => {
    const pool = new WorkerPool(1);
    const run = vi.spyOn(pool, 'run');
    const callback = threadedCallback((view) => view.text().toUpperCase(), { pool });

    await expect(callback(new Response('quiet'))).resolves.toBe('QUIET');
    expect(run).toHaveBeenCalledTimes(1);
  });
});

describe('ThreadedClient', () => {
  it('should resolve to what the wrapped adapter returns', async () => {
    const response = new BufferedResponse({ body: 'pong', status: 200, url: 'http://api.test/x' });
    const proxy = new BlockingClient({ session: createFakeSession(response) });
    const client = new ThreadedClient({ pool: new WorkerPool(2), session: proxy });

    await expect(client.send(REQUEST)).resolves.toBe(proxy.send(REQUEST));
  });

  it('should reject with the translated failure', async () => {
    const session = createFakeSession();
    session.request.mockImplementation(() => {
      throw new SessionConnectTimeoutError('connect timed out');
    });
    const client = new ThreadedClient({ session });

    await expect(client.send(REQUEST)).rejects.toBeInstanceOf(ConnectionTimeout);
  });

  it('should wait for dispatched work before closing the wrapped adapter', async () => {
    const events: string[] = [];
    const session = createFakeSession();
    session.request.mockImplementation(() => {
      events.push('request');
      return new BufferedResponse({ body: '', status: 204, url: 'http://api.test/x' });
    });
    const proxy = new BlockingClient({ session });
    vi.spyOn(proxy, 'close').mockImplementation(() => {
      events.push('close');
    });
    const client = new ThreadedClient({ pool: new WorkerPool(1), session: proxy });

    const sent = client.send(REQUEST);
    await client.close();
    await sent;

    expect(events).toEqual(['request', 'close']);
  });

  it('should apply callbacks on its pool', async () => {
    const pool = new WorkerPool(1);
    const run = vi.spyOn(pool, 'run');
    const client = new ThreadedClient({ pool, session: createFakeSession() });

    await expect(client.applyCallback((value) => String(value), 42)).resolves.toBe('42');
    expect(run).toHaveBeenCalledTimes(1);
  });

  it("should expose the wrapped adapter's exceptions and the thread-offload strategy", () => {
    const client = new ThreadedClient({ session: createFakeSession() });

    expect(client.exceptions).toBe(blockingExceptions);
    expect(client.io()).toBeInstanceOf(ThreadedStrategy);
  });

  it('should reject sessions no adapter recognizes', () => {
    expect(() => new ThreadedClient({ session: 42 })).toThrow('No client adapter is registered for session 42');
  });
});

describe('offloaded sends over the fetch worker', () => {
  let server: Server;
  let baseUrl = '';

  beforeEach(async () => {
    // Answers from the test's own event loop, so a parked loop could never reply
    server = createServer((request, response) => {
      if (request.url?.startsWith('/slow')) {
        return;
      }
      response.end('pong');
    });
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('Expected a TCP address');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('should get a response from a server on the same event loop', async () => {
    const client = new ThreadedClient({ session: new BlockingClient({ timeoutMs: 5000 }) });
    try {
      const response = await client.send(['GET', `${baseUrl}/ping`, {}]);

      expect(response).toBeInstanceOf(BufferedResponse);
      expect(response instanceof BufferedResponse && response.text()).toBe('pong');
    } finally {
      await client.close();
    }
  });

  it('should resolve the async request without parking the caller', async () => {
    const session = new FetchWorkerSession({ timeoutMs: 5000 });
    try {
      const response = await session.requestAsync('GET', `${baseUrl}/ping`, { query: { page: 2 } });

      expect(response.status).toBe(200);
      expect(response.text()).toBe('pong');
    } finally {
      session.close();
    }
  });

  it('should time out an async request with the secret query redacted', async () => {
    const session = new FetchWorkerSession();
    try {
      await expect(session.requestAsync('GET', `${baseUrl}/slow?token=test-secret`, { timeoutMs: 50 })).rejects.toThrow(
        `No response from GET ${baseUrl}/slow?token=*** within 50ms`
      );
    } finally {
      session.close();
    }
  });
});

describe('withClient', () => {
  it('should close the client after the block returns', async () => {
    const client = { close: vi.fn() };

    await expect(withClient(client, () => 'done')).resolves.toBe('done');
    expect(client.close).toHaveBeenCalledTimes(1);
  });

  it('should close the client when the block throws', async () => {
    const client = { close: vi.fn() };

    await expect(
      withClient(client, () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');
    expect(client.close).toHaveBeenCalledTimes(1);
  });
});
