import { z } from 'zod';

const httpEnvSchema = z.object({
  WIRECALL_BLOCKING_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  WIRECALL_OFFLOAD_POOL_SIZE: z.coerce.number().int().positive().default(10),
});

type HttpEnv = z.infer<typeof httpEnvSchema>;

export interface HttpConfig {
  /** How long the blocking session waits for its worker before raising a read timeout */
  blockingTimeoutMs: number;
  /** Concurrency bound of worker pools created without an explicit size */
  offloadPoolSize: number;
}

let cachedConfig: HttpConfig | undefined;

/**
 * Validate the http package's environment variables.
 * @throws Error listing every invalid variable
 */
export function validateHttpEnv(env: Record<string, string | undefined>): HttpEnv {
  const result = httpEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Http environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Process-wide defaults, validated on first access and cached.
 */
export function getHttpConfig(): HttpConfig {
  if (!cachedConfig) {
    const env = validateHttpEnv(process.env);
    cachedConfig = {
      blockingTimeoutMs: env.WIRECALL_BLOCKING_TIMEOUT_MS,
      offloadPoolSize: env.WIRECALL_OFFLOAD_POOL_SIZE,
    };
  }
  return cachedConfig;
}

/** Drop the cached configuration so the next access re-reads the environment. */
export function resetHttpConfig(): void {
  cachedConfig = undefined;
}
