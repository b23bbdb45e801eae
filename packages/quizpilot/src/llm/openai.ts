import OpenAI from 'openai';
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions';
import { toModelTransportError } from './providerErrors.js';
import type { ChatMessage, CompletionOptions, ModelClient, ModelIdentity } from './types.js';

export interface OpenAIClientConfig {
  model: string;
  apiKey?: string;
  /** Required for openai-compatible endpoints */
  baseUrl?: string;
  maxTokens: number;
  compatible?: boolean;
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case 'system':
      return { role: 'system', content: message.content };
    case 'user':
      return { role: 'user', content: message.content };
    case 'assistant':
      return { role: 'assistant', content: message.content };
  }
}

/**
 * Chat-completions client for OpenAI and for any endpoint that speaks the
 * same API (set `baseUrl`).
 */
export class OpenAIModelClient implements ModelClient {
  readonly identity: ModelIdentity;
  private readonly client: OpenAI;
  private readonly maxTokens: number;

  constructor(config: OpenAIClientConfig) {
    this.identity = { provider: config.compatible ? 'openai-compatible' : 'openai', model: config.model };
    this.maxTokens = config.maxTokens;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      ...(config.baseUrl ? { baseURL: config.baseUrl } : {}),
      maxRetries: 0,
    });
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    try {
      const completion = await this.client.chat.completions.create(
        {
          model: this.identity.model,
          messages: messages.map(toOpenAIMessage),
          max_completion_tokens: options.maxTokens ?? this.maxTokens,
        },
        { signal: options.signal },
      );
      return completion.choices[0]?.message.content ?? '';
    } catch (err) {
      if (!(err instanceof OpenAI.APIError)) throw err;
      throw toModelTransportError(err, `${this.identity.provider} ${this.identity.model}`, err.status, options.signal);
    }
  }
}
