import { ERROR_POLICIES } from '@ledgerflow/core';
import { z } from 'zod';

const envSchema = z.object({
  LEDGERFLOW_ERROR_POLICY: z.enum(ERROR_POLICIES).default('abort'),
  LEDGERFLOW_LOG_FILE: z.string().trim().min(1, { message: 'Invalid log file path' }).optional(),
  LEDGERFLOW_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).default('warn'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type LedgerflowEnv = z.infer<typeof envSchema>;

let validatedEnv: LedgerflowEnv | undefined;

/**
 * Validate an environment map.
 * @throws Error listing every invalid variable
 */
export function parseEnv(env: NodeJS.ProcessEnv): LedgerflowEnv {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates process.env on first access and caches the result.
 */
export function getEnv(): LedgerflowEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/** Drop the cached environment (tests). */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}
