import { afterEach, describe, expect, it, vi } from 'vitest';

import { getHttpConfig, resetHttpConfig, validateHttpEnv } from '../config.js';

describe('validateHttpEnv', () => {
  it('should apply defaults', () => {
    expect(validateHttpEnv({})).toEqual({
      WIRECALL_BLOCKING_TIMEOUT_MS: 30_000,
      WIRECALL_OFFLOAD_POOL_SIZE: 10,
    });
  });

  it('should coerce numeric strings', () => {
    expect(validateHttpEnv({ WIRECALL_BLOCKING_TIMEOUT_MS: '5000' }).WIRECALL_BLOCKING_TIMEOUT_MS).toBe(5000);
  });

  it('should list every invalid variable', () => {
    expect(() => validateHttpEnv({ WIRECALL_BLOCKING_TIMEOUT_MS: 'soon', WIRECALL_OFFLOAD_POOL_SIZE: '0' })).toThrow(
      /Http environment validation failed:\n {2}- WIRECALL_BLOCKING_TIMEOUT_MS: .+\n {2}- WIRECALL_OFFLOAD_POOL_SIZE: /
    );
  });
});

describe('getHttpConfig', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetHttpConfig();
  });

  it('should cache the configuration until reset', () => {
    vi.stubEnv('WIRECALL_OFFLOAD_POOL_SIZE', '4');
    resetHttpConfig();
    const first = getHttpConfig();

    vi.stubEnv('WIRECALL_OFFLOAD_POOL_SIZE', '6');

    expect(getHttpConfig()).toBe(first);
    expect(first.offloadPoolSize).toBe(4);

    resetHttpConfig();
    expect(getHttpConfig().offloadPoolSize).toBe(6);
  });
});
