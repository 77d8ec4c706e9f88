/**
 * Environment Configuration
 *
 * Process-level settings shared by every package. Parsed once, on first import.
 */

import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  ALIGNER_TMP_DIR: z.string().min(1).optional(),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Parse an environment record, throwing on invalid values
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const parseResult = envSchema.safeParse(source);

  if (!parseResult.success) {
    const issues = parseResult.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${issues}`);
  }

  return parseResult.data;
}

const env = parseEnv(process.env);

export const config = {
  nodeEnv: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,
  tmpDir: env.ALIGNER_TMP_DIR,
} as const;
