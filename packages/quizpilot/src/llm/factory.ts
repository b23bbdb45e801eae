import type { ResolvedModel } from '../config/models.js';
import { getLogger } from '../monitoring/logger.js';
import { AnthropicModelClient } from './anthropic.js';
import { GoogleModelClient } from './google.js';
import { OpenAIModelClient } from './openai.js';
import type { ModelClient } from './types.js';

/**
 * Build the client for a resolved role model. `keys` is the environment the
 * API key is looked up in (`resolved.envKey`).
 */
export function createModelClient(resolved: ResolvedModel, keys: Record<string, string | undefined>): ModelClient {
  const apiKey = keys[resolved.envKey];

  switch (resolved.provider) {
    case 'anthropic':
      return new AnthropicModelClient({
        model: resolved.model,
        apiKey,
        baseUrl: resolved.baseUrl,
        maxTokens: resolved.maxTokens,
      });
    case 'openai':
    case 'openai-compatible':
      return new OpenAIModelClient({
        model: resolved.model,
        apiKey,
        baseUrl: resolved.baseUrl,
        maxTokens: resolved.maxTokens,
        compatible: resolved.provider === 'openai-compatible',
      });
    case 'google':
      return new GoogleModelClient({
        model: resolved.model,
        apiKey,
        baseUrl: resolved.baseUrl,
        maxTokens: resolved.maxTokens,
      });
  }
}

export function printModelInfo(resolved: ResolvedModel): void {
  getLogger().info('Resolved model', {
    role: resolved.role,
    provider: resolved.providerName,
    model: resolved.model,
    baseUrl: resolved.baseUrl,
    maxTokens: resolved.maxTokens,
  });
}
