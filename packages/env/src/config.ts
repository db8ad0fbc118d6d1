import { z } from 'zod';

const optionalInteger = (minimum: number) =>
  z.preprocess((val) => (val === '' ? undefined : val), z.coerce.number().int().min(minimum).optional());

export const envSchema = z.object({
  ENDPOINTKIT_ENVIRONMENT: z.string().trim().min(1).optional(),
  ENDPOINTKIT_MAX_RETRIES: optionalInteger(0),
  ENDPOINTKIT_TIMEOUT_MS: optionalInteger(1),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

export interface ClientSettings {
  environment?: string | undefined;
  maxRetries?: number | undefined;
  timeoutMs?: number | undefined;
}

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates environment variables.
 * @throws Error listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
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
 * Drop the cached configuration so the next read sees the current process.env.
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Client settings taken from the environment. Unset variables stay undefined
 * so callers can apply their own defaults.
 */
export function getClientSettings(): ClientSettings {
  const env = validateEnv();
  return {
    environment: env.ENDPOINTKIT_ENVIRONMENT,
    maxRetries: env.ENDPOINTKIT_MAX_RETRIES,
    timeoutMs: env.ENDPOINTKIT_TIMEOUT_MS,
  };
}
