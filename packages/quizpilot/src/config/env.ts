import { z } from 'zod';
import { ConfigError } from '../errors.js';

const providerSchema = z.enum(['anthropic', 'openai', 'openai-compatible', 'google']);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'staging', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),

  DEFAULT_PROVIDER: providerSchema.default('openai'),
  OPERATOR_PROVIDER: providerSchema.optional(),
  OPERATOR_MODEL: optionalString,
  OPERATOR_BASE_URL: optionalString,
  REASONER_PROVIDER: providerSchema.optional(),
  REASONER_MODEL: optionalString,
  REASONER_BASE_URL: optionalString,
  REASONER_MAX_TOKENS: z.coerce.number().int().positive().optional(),

  ANTHROPIC_API_KEY: optionalString,
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: optionalString,
  GOOGLE_API_KEY: optionalString,

  CDP_URL: z.string().url().default('http://localhost:9222'),
  MAX_ITERATIONS: z.coerce.number().int().positive().default(200),
  TRANSPORT_RETRIES: z.coerce.number().int().min(0).default(2),
  REASONER_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  ACTION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  MAX_ACTION_ATTEMPTS: z.coerce.number().int().positive().default(3),
  TASK_DESCRIPTION: optionalString,
});

export type Env = z.infer<typeof envSchema>;
export type ProviderId = z.infer<typeof providerSchema>;

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = parseEnv(process.env);
  }
  return _env;
}

/**
 * Parse an explicit environment map without touching the cached process env.
 * Invalid values raise ConfigError naming each offending variable.
 */
export function parseEnv(source: Record<string, string | undefined>): Env {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const keys = [...new Set(result.error.issues.map((issue) => String(issue.path[0] ?? '')))].filter(Boolean);
    const details = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${details}`, keys);
  }
  return result.data;
}

export function resetEnvCache(): void {
  _env = null;
}
