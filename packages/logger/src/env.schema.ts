import { z } from 'zod';

export const logLevels = ['trace', 'debug', 'info', 'warn', 'error', 'silent'] as const;

export const loggerEnvSchema = z.object({
  LOGGER_LOG_LEVEL: z.enum(logLevels).optional(),
  LOGGER_PRETTY: z
    .string()
    .default('false')
    .transform((val: string) => val === 'true'),
  LOGGER_SERVICE_NAME: z.string().trim().min(1, { message: 'Invalid service name' }).default('wirecall'),
  NODE_ENV: z.enum(['production', 'development', 'test']).default('development'),
});

export type LoggerEnvConfig = z.infer<typeof loggerEnvSchema>;

export function validateLoggerEnv(env: NodeJS.ProcessEnv = process.env): LoggerEnvConfig {
  const result = loggerEnvSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Logger environment validation failed:\n${errors}`);
  }
  return result.data;
}
