import { GoogleGenAI } from '@google/genai';
import { errorMessage, RunCancelledError, TransportError } from '../errors.js';
import { isTransientStatus, statusOf } from './providerErrors.js';
import { splitSystemPrompt, type ChatMessage, type CompletionOptions, type ModelClient, type ModelIdentity } from './types.js';

export interface GoogleClientConfig {
  model: string;
  apiKey?: string;
  /** Proxy or regional endpoint in place of the public Gemini API */
  baseUrl?: string;
  maxTokens: number;
}

export class GoogleModelClient implements ModelClient {
  readonly identity: ModelIdentity;
  private readonly client: GoogleGenAI;
  private readonly maxTokens: number;

  constructor(config: GoogleClientConfig) {
    this.identity = { provider: 'google', model: config.model };
    this.maxTokens = config.maxTokens;
    this.client = new GoogleGenAI({
      apiKey: config.apiKey,
      ...(config.baseUrl ? { httpOptions: { baseUrl: config.baseUrl } } : {}),
    });
  }

  async complete(messages: readonly ChatMessage[], options: CompletionOptions = {}): Promise<string> {
    const { system, turns } = splitSystemPrompt(messages);

    try {
      const response = await this.client.models.generateContent({
        model: this.identity.model,
        contents: turns.map((turn) => ({
          role: turn.role === 'assistant' ? 'model' : 'user',
          parts: [{ text: turn.content }],
        })),
        config: {
          maxOutputTokens: options.maxTokens ?? this.maxTokens,
          ...(system ? { systemInstruction: system } : {}),
          ...(options.signal ? { abortSignal: options.signal } : {}),
        },
      });
      return response.text ?? '';
    } catch (err) {
      if (options.signal?.aborted) throw new RunCancelledError();
      // The SDK surfaces HTTP failures as ApiError (with status) and network
      // failures as plain fetch errors.
      const status = statusOf(err);
      if (!(err instanceof Error)) throw err;
      throw new TransportError(`google ${this.identity.model}: ${errorMessage(err)}`, 'model', isTransientStatus(status), status);
    }
  }
}
