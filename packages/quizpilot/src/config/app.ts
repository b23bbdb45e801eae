import { ConfigError } from '../errors.js';
import { getEnv, type Env } from './env.js';
import { AGENT_ROLES, resolveRoleModel, type AgentRole, type LayeredModelSettings, type ResolvedModel } from './models.js';

export interface BrowserConfig {
  /** Chrome DevTools endpoint of the user's already-running browser */
  cdpUrl: string;
}

export interface RunConfig {
  /** Global iteration budget for one run; the outermost circuit breaker */
  maxIterations: number;
  /** Extra reasoner attempts on transient transport failures */
  transportRetries: number;
  reasonerTimeoutMs: number;
  retryBackoffMs: number;
  actionTimeoutMs: number;
  /** Attempts the operator makes per page action or perception */
  maxActionAttempts: number;
}

export interface AppConfig {
  models: LayeredModelSettings;
  browser: BrowserConfig;
  run: RunConfig;
  taskDescription?: string;
}

export const DEFAULT_RUN_CONFIG: RunConfig = {
  maxIterations: 200,
  transportRetries: 2,
  reasonerTimeoutMs: 120_000,
  retryBackoffMs: 1_000,
  actionTimeoutMs: 30_000,
  maxActionAttempts: 3,
};

export function loadAppConfig(env: Env = getEnv()): AppConfig {
  const openAiStyle = env.DEFAULT_PROVIDER === 'openai' || env.DEFAULT_PROVIDER === 'openai-compatible';

  return {
    models: {
      defaults: {
        provider: env.DEFAULT_PROVIDER,
        ...(openAiStyle && env.OPENAI_BASE_URL ? { baseUrl: env.OPENAI_BASE_URL } : {}),
      },
      roles: {
        operator: {
          provider: env.OPERATOR_PROVIDER,
          model: env.OPERATOR_MODEL,
          baseUrl: env.OPERATOR_BASE_URL,
        },
        reasoner: {
          provider: env.REASONER_PROVIDER,
          model: env.REASONER_MODEL,
          baseUrl: env.REASONER_BASE_URL,
          maxTokens: env.REASONER_MAX_TOKENS,
        },
      },
    },
    browser: { cdpUrl: env.CDP_URL },
    run: {
      ...DEFAULT_RUN_CONFIG,
      maxIterations: env.MAX_ITERATIONS,
      transportRetries: env.TRANSPORT_RETRIES,
      reasonerTimeoutMs: env.REASONER_TIMEOUT_MS,
      actionTimeoutMs: env.ACTION_TIMEOUT_MS,
      maxActionAttempts: env.MAX_ACTION_ATTEMPTS,
    },
    ...(env.TASK_DESCRIPTION ? { taskDescription: env.TASK_DESCRIPTION } : {}),
  };
}

/**
 * Resolve both roles and check that the provider of every role in `keyed`
 * has its API key. Throws ConfigError naming each missing variable.
 */
export function validateConfig(
  config: AppConfig,
  keys: Record<string, string | undefined>,
  keyed: readonly AgentRole[] = AGENT_ROLES,
): Record<AgentRole, ResolvedModel> {
  const resolved: Record<AgentRole, ResolvedModel> = {
    operator: resolveRoleModel('operator', config.models),
    reasoner: resolveRoleModel('reasoner', config.models),
  };

  const missing = [...new Set(keyed.map((role) => resolved[role].envKey))].filter((envKey) => !keys[envKey]);
  if (missing.length > 0) {
    throw new ConfigError(`Missing environment variables: ${missing.join(', ')}`, missing);
  }

  return resolved;
}
