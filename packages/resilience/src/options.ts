import type { z } from 'zod';

/**
 * Validate a policy's options.
 * @throws Error listing every invalid option
 */
export function parseOptions<Output, Input>(
  schema: z.ZodType<Output, z.ZodTypeDef, Input>,
  label: string,
  options: Input
): Output {
  const result = schema.safeParse(options);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.') || '(value)'}: ${e.message}`).join('\n');
    throw new Error(`Invalid ${label} options:\n${errors}`);
  }
  return result.data;
}
