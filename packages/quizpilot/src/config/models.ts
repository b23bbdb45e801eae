/**
 * Per-role model resolution.
 *
 * Each agent role (operator, reasoner) gets its own provider/model. Values are
 * resolved in priority order:
 *   1. Role override:   REASONER_PROVIDER / REASONER_MODEL / REASONER_BASE_URL
 *   2. Global default:  DEFAULT_PROVIDER (+ OPENAI_BASE_URL for OpenAI-style providers)
 *   3. Catalog default: models.config.json, per provider and role
 */

import { z } from 'zod';
import { ConfigError } from '../errors.js';
import type { ProviderId } from './env.js';
import catalogJson from './models.config.json' with { type: 'json' };

// -- Types --

export type AgentRole = 'operator' | 'reasoner';

export const AGENT_ROLES: readonly AgentRole[] = ['operator', 'reasoner'];

const roleRecord = <T extends z.ZodTypeAny>(schema: T) => z.object({ operator: schema, reasoner: schema });

const providerEntrySchema = z.object({
  name: z.string(),
  envKey: z.string(),
  docs: z.string(),
  models: roleRecord(z.string().min(1)),
  maxTokens: roleRecord(z.number().int().positive()),
});

const catalogSchema = z.object({
  version: z.number(),
  providers: z.object({
    anthropic: providerEntrySchema,
    openai: providerEntrySchema,
    'openai-compatible': providerEntrySchema,
    google: providerEntrySchema,
  }),
});

export type ModelCatalog = z.infer<typeof catalogSchema>;
export type ProviderEntry = z.infer<typeof providerEntrySchema>;

export interface ModelSettings {
  provider?: ProviderId;
  model?: string;
  baseUrl?: string;
  maxTokens?: number;
}

export interface LayeredModelSettings {
  defaults: ModelSettings & { provider: ProviderId };
  roles: Partial<Record<AgentRole, ModelSettings>>;
}

export interface ResolvedModel {
  role: AgentRole;
  provider: ProviderId;
  /** Provider display name */
  providerName: string;
  /** Full model identifier sent to the API */
  model: string;
  baseUrl?: string;
  /** Environment variable holding the provider's API key */
  envKey: string;
  maxTokens: number;
}

// -- Catalog --

let _catalog: ModelCatalog | null = null;

export function loadModelCatalog(): ModelCatalog {
  if (!_catalog) {
    _catalog = catalogSchema.parse(catalogJson);
  }
  return _catalog;
}

// -- Resolution --

/**
 * Resolve the model a role should use. Role-specific values win; global
 * defaults only apply to a role running on the default provider.
 */
export function resolveRoleModel(
  role: AgentRole,
  settings: LayeredModelSettings,
  catalog: ModelCatalog = loadModelCatalog(),
): ResolvedModel {
  const override = settings.roles[role] ?? {};
  const provider = override.provider ?? settings.defaults.provider;
  const inherits = provider === settings.defaults.provider;
  const entry: ProviderEntry = catalog.providers[provider];

  const model = override.model ?? (inherits ? settings.defaults.model : undefined) ?? entry.models[role];
  const baseUrl = override.baseUrl ?? (inherits ? settings.defaults.baseUrl : undefined);
  const maxTokens = override.maxTokens ?? (inherits ? settings.defaults.maxTokens : undefined) ?? entry.maxTokens[role];

  if (provider === 'openai-compatible' && !baseUrl) {
    throw new ConfigError(`The ${role} role uses an OpenAI-compatible provider but no base URL is configured`);
  }

  return {
    role,
    provider,
    providerName: entry.name,
    model,
    ...(baseUrl ? { baseUrl } : {}),
    envKey: entry.envKey,
    maxTokens,
  };
}
