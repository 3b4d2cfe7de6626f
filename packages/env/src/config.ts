import { z } from 'zod';

const envSchema = z.object({
  GEOHASH_LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error']).optional(),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Parse an environment object, reporting every invalid variable at once.
 * @throws Error if validation fails
 */
export function parseEnv(env: NodeJS.ProcessEnv): ValidatedEnv {
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
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Log level requested through GEOHASH_LOG_LEVEL, if any.
 */
export function getConfiguredLogLevel(): ValidatedEnv['GEOHASH_LOG_LEVEL'] {
  return validateEnv().GEOHASH_LOG_LEVEL;
}

export function getNodeEnv(): ValidatedEnv['NODE_ENV'] {
  return validateEnv().NODE_ENV;
}

export function isDevelopment(): boolean {
  return getNodeEnv() === 'development';
}
