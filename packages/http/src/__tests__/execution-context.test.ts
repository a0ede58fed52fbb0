import { describe, expect, it, vi } from 'vitest';

import { BlockingClient } from '../clients/blocking-client.js';
import { BufferedResponse, type BlockingSession } from '../clients/blocking-session.js';
import type { ClientRequest } from '../clients/interfaces.js';
import { SessionConnectionError } from '../clients/session-errors.js';
import { ThreadedClient } from '../clients/threaded-client.js';
import { ConnectionError, IllegalRequestStateTransition, ServerTimeout } from '../errors.js';
import { BlockingStrategy } from '../io/blocking-strategy.js';
import { CooperativeStrategy } from '../io/cooperative-strategy.js';
import { ExecutionContext } from '../io/execution-context.js';
import type { Client, RequestTemplate } from '../io/interfaces.js';
import { ThreadedStrategy } from '../io/threaded-strategy.js';
import { WorkerPool } from '../io/worker-pool.js';
import { CompositeRequestTemplate } from '../io/templates.js';
import { finish, none, prepare, retry } from '../io/transitions.js';

const REQUEST: ClientRequest = ['GET', '/x', {}];

function deferred<T>() {
  let settle: (value: T) => void = () => undefined;
  const promise = new Promise<T>((resolve) => {
    settle = resolve;
  });
  return { promise, resolve: (value: T) => settle(value) };
}

function cooperative(delay = vi.fn().mockResolvedValue(undefined)) {
  return new CooperativeStrategy({ delay });
}

describe('ExecutionContext', () => {
  it('should return the raw transport response under the blocking strategy', () => {
    const response = new BufferedResponse({ body: 'pong', status: 200, url: 'http://api.test/x' });
    const client: Client<ClientRequest, BufferedResponse> = { send: vi.fn(() => response) };
    const context = new ExecutionContext({
      client,
      request: REQUEST,
      strategy: new BlockingStrategy({ sleepSync: vi.fn() }),
    });

    expect(context.run()).toBe(response);
    expect(client.send).toHaveBeenCalledWith(REQUEST);
  });

  it('should advance one state per step and refuse to step past the end', async () => {
    const client: Client<ClientRequest, string> = { send: () => 'pong' };
    const context = new ExecutionContext({ client, request: REQUEST, strategy: cooperative() });

    expect(context.state.name).toBe('Created');
    expect(await context.execute()).toMatchObject({ done: false, state: { name: 'Prepared' } });
    expect(await context.execute()).toMatchObject({ done: false, state: { name: 'Sending' } });
    expect(await context.execute()).toMatchObject({ done: false, state: { name: 'Finished' } });
    expect(await context.execute()).toEqual({ done: true, value: 'pong' });

    await expect((async () => context.execute())()).rejects.toMatchObject({
      state: 'Finished',
      transition: 'execute',
    });
  });

  it('should retry through a sleep when a template claims the failure', async () => {
    const send = vi
      .fn<(request: ClientRequest) => string>()
      .mockImplementationOnce(() => {
        throw new ConnectionError('connection refused');
      })
      .mockReturnValue('pong');
    const delay = vi.fn().mockResolvedValue(undefined);
    const observer = { afterException: vi.fn(() => none) };
    let retries = 0;
    const retrying: RequestTemplate<ClientRequest, string> = {
      afterException: () => (retries++ < 1 ? retry(50) : undefined),
    };
    const context = new ExecutionContext({
      client: { send },
      request: REQUEST,
      strategy: cooperative(delay),
      template: new CompositeRequestTemplate(observer, retrying),
    });

    const names: string[] = [];
    for await (const step of context) {
      names.push(step.done ? 'done' : step.state.name);
    }

    expect(names).toEqual(['Prepared', 'Sending', 'Sleeping', 'Prepared', 'Sending', 'Finished', 'done']);
    expect(send).toHaveBeenCalledTimes(2);
    expect(delay).toHaveBeenCalledWith(50);
    expect(observer.afterException).toHaveBeenCalledTimes(1);
  });

  it('should reject when a template asks for an illegal transition', async () => {
    const template: RequestTemplate<ClientRequest, string> = {
      afterResponse: (request) => prepare(request),
    };
    const context = new ExecutionContext({
      client: { send: () => 'pong' },
      request: REQUEST,
      strategy: cooperative(),
      template,
    });

    const rejection = Promise.resolve(context.run());

    await expect(rejection).rejects.toBeInstanceOf(IllegalRequestStateTransition);
    await expect(rejection).rejects.toMatchObject({ state: 'Sending', transition: 'prepare' });
  });

  it('should finish without sending when beforeRequest supplies the response', async () => {
    const send = vi.fn(() => 'pong');
    const context = new ExecutionContext<ClientRequest, string>({
      client: { send },
      request: REQUEST,
      strategy: cooperative(),
      template: { beforeRequest: () => finish('cached') },
    });

    await expect(Promise.resolve(context.run())).resolves.toBe('cached');
    expect(send).not.toHaveBeenCalled();
  });

  it('should propagate an unclaimed failure', async () => {
    const error = new ServerTimeout('read timed out');
    const context = new ExecutionContext<ClientRequest, string>({
      client: {
        send: () => {
          throw error;
        },
      },
      request: REQUEST,
      strategy: cooperative(),
    });

    await expect(Promise.resolve(context.run())).rejects.toBe(error);
    expect(context.state.name).toBe('Failed');
  });

  it('should queue a step requested while another is still running', async () => {
    const gate = deferred<string>();
    const send = vi.fn(() => gate.promise);
    const context = new ExecutionContext<ClientRequest, string>({
      client: { send },
      request: REQUEST,
      strategy: cooperative(),
    });
    await context.execute();
    await context.execute();

    const sending = context.execute();
    const finishing = context.execute();

    expect(context.state.name).toBe('Sending');
    gate.resolve('pong');

    expect(await sending).toMatchObject({ done: false, state: { name: 'Finished' } });
    expect(await finishing).toEqual({ done: true, value: 'pong' });
    expect(send).toHaveBeenCalledTimes(1);
  });

  it('should yield each step through async iteration', async () => {
    const context = new ExecutionContext<ClientRequest, string>({
      client: { send: () => 'pong' },
      request: REQUEST,
      strategy: cooperative(),
    });

    const names: string[] = [];
    for await (const step of context) {
      names.push(step.done ? 'done' : step.state.name);
    }

    expect(names).toEqual(['Prepared', 'Sending', 'Finished', 'done']);
  });

  it('should retry and finish on the thread-offload pairing, closing only after the pool drains', async () => {
    const events: string[] = [];
    const request = vi
      .fn<BlockingSession['request']>()
      .mockImplementationOnce(() => {
        events.push('refused');
        throw new SessionConnectionError('connection refused', 'ECONNREFUSED');
      })
      .mockImplementation(() => {
        events.push('sent');
        return new BufferedResponse({ body: 'pong', status: 200, url: 'http://api.test/x' });
      });
    const proxy = new BlockingClient({ session: { close: vi.fn(), request } });
    vi.spyOn(proxy, 'close').mockImplementation(() => {
      events.push('close');
    });
    const client = new ThreadedClient({ pool: new WorkerPool(1), session: proxy });
    const delay = vi.fn().mockResolvedValue(undefined);
    const template: RequestTemplate<ClientRequest, unknown> = {
      afterException: (_request, failure) =>
        failure.error instanceof ConnectionError && events.length === 1 ? retry(25) : undefined,
    };
    const context = new ExecutionContext<ClientRequest, unknown>({
      client,
      request: REQUEST,
      strategy: new ThreadedStrategy({ delay, pool: new WorkerPool(1) }),
      template,
    });

    const names: string[] = [];
    let result: unknown;
    for await (const step of context) {
      if (step.done) {
        result = step.value;
      }
      names.push(step.done ? 'done' : step.state.name);
    }

    expect(names).toEqual(['Prepared', 'Sending', 'Sleeping', 'Prepared', 'Sending', 'Finished', 'done']);
    expect(delay).toHaveBeenCalledWith(25);
    expect(result instanceof BufferedResponse && result.text()).toBe('pong');

    const gate = deferred<void>();
    const applied = client.applyCallback(async () => {
      await gate.promise;
      events.push('callback');
    }, result);
    const closing = client.close();
    await new Promise((resolve) => setImmediate(resolve));

    expect(events).toEqual(['refused', 'sent']);
    gate.resolve();
    await Promise.all([applied, closing]);

    expect(events).toEqual(['refused', 'sent', 'callback', 'close']);
  });
});
