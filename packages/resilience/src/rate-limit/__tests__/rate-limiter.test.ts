import { CooperativeStrategy, ExecutionContext, type ClientRequest } from '@wirecall/http';
import { describe, expect, it, vi } from 'vitest';

import { RateLimitExceeded, RateLimitTemplate } from '../rate-limit-template.js';
import { RateLimiter } from '../rate-limiter.js';

const REQUEST: ClientRequest = ['GET', 'http://api.test/x', {}];

function createLimiter(requestsPerSecond = 1) {
  const clock = { now: 1000 };
  const limiter = new RateLimiter('api', { requestsPerSecond }, { now: () => clock.now });
  return { clock, limiter };
}

describe('RateLimiter', () => {
  it('should hand out a slot, then report the wait for the next one', () => {
    const { clock, limiter } = createLimiter();

    expect(limiter.tryAcquire()).toBe(0);
    expect(limiter.tryAcquire()).toBe(1010);

    clock.now = 2010;
    expect(limiter.tryAcquire()).toBe(0);
  });

  it('should report its status', () => {
    const { limiter } = createLimiter(2);
    limiter.tryAcquire();

    expect(limiter.getStatus()).toMatchObject({ maxTokens: 1, requestsInLastSecond: 1, requestsPerSecond: 2, tokens: 0 });
  });
});

describe('RateLimitTemplate', () => {
  it('should ask for a pause while the limiter is full', () => {
    const { limiter } = createLimiter();
    const template = new RateLimitTemplate({ limiter });

    expect(template.beforeRequest(REQUEST)).toBeUndefined();
    expect(template.beforeRequest(REQUEST)).toEqual({ delayMs: 1010, kind: 'retry' });
  });

  it('should fail instead when configured to raise', () => {
    const { limiter } = createLimiter();
    const template = new RateLimitTemplate({ limiter, raiseOnLimit: true });
    template.beforeRequest(REQUEST);

    const transition = template.beforeRequest(REQUEST);

    expect(transition).toMatchObject({ failure: { kind: 'RateLimitExceeded' }, kind: 'fail' });
    if (transition?.kind === 'fail') {
      expect(transition.failure.error).toBeInstanceOf(RateLimitExceeded);
      expect(transition.failure.error.message).toBe('Rate limit of api exceeded; next slot in 1010ms');
    }
  });

  it('should hold a request back until a slot frees up', async () => {
    const { clock, limiter } = createLimiter();
    limiter.tryAcquire();
    const delay = vi.fn((ms: number) => {
      clock.now += ms;
      return Promise.resolve();
    });
    const send = vi.fn(() => 'pong');
    const context = new ExecutionContext<ClientRequest, string>({
      client: { send },
      request: REQUEST,
      strategy: new CooperativeStrategy({ delay }),
      template: new RateLimitTemplate<ClientRequest, string>({ limiter }),
    });

    await expect(Promise.resolve(context.run())).resolves.toBe('pong');

    expect(delay).toHaveBeenCalledWith(1010);
    expect(send).toHaveBeenCalledTimes(1);
  });
});
