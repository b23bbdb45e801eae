import Anthropic from '@anthropic-ai/sdk';
import { toModelTransportError } from './providerErrors.js';
import { splitSystemPrompt, type ChatMessage, type CompletionOptions, type ModelClient, type ModelIdentity } from './types.js';

export interface AnthropicClientConfig {
  model: string;
  apiKey?: string;
  baseUrl?: string;
  maxTokens: number;
}

export class AnthropicModelClient implements ModelClient {
  readonly identity: ModelIdentity;
  private readonly client: Anthropic;
  private readonly maxTokens: number;

  constructor(config: AnthropicClientConfig) {
    this.identity = { provider: 'anthropic', model: config.model };
    this.maxTokens = config.maxTokens;
    // Retries are owned by the caller's retry policy.
    this.client = new Anthropic({
      apiKey: config.apiKey,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
      maxRetries: 0,
    });
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const { system, turns } = splitSystemPrompt(messages);

    try {
      const response = await this.client.messages.create(
        {
          model: this.identity.model,
          max_tokens: options.maxTokens ?? this.maxTokens,
          ...(system ? { system } : {}),
          messages: turns,
        },
        { signal: options.signal },
      );
      return response.content.flatMap((block) => (block.type === 'text' ? [block.text] : [])).join('');
    } catch (err) {
      if (!(err instanceof Anthropic.APIError)) throw err;
      throw toModelTransportError(err, `anthropic ${this.identity.model}`, err.status, options.signal);
    }
  }
}
