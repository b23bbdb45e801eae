import type { ProviderId } from '../config/env.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

export interface CompletionOptions {
  /** Aborts the in-flight request (run cancellation or per-call timeout) */
  signal?: AbortSignal;
  maxTokens?: number;
}

export interface ModelIdentity {
  provider: ProviderId;
  model: string;
}

/**
 * One request/response round-trip against a chat model.
 *
 * Implementations throw TransportError for provider failures and
 * RunCancelledError when `signal` aborts.
 */
export interface ModelClient {
  readonly identity: ModelIdentity;
  complete(messages: readonly ChatMessage[], options?: CompletionOptions): Promise<string>;
}

/** Split system messages out for providers that take the system prompt separately. */
export function splitSystemPrompt(messages: readonly ChatMessage[]): {
  system: string | undefined;
  turns: Array<{ role: 'user' | 'assistant'; content: string }>;
} {
  const systemParts: string[] = [];
  const turns: Array<{ role: 'user' | 'assistant'; content: string }> = [];
  for (const message of messages) {
    if (message.role === 'system') {
      systemParts.push(message.content);
    } else {
      turns.push({ role: message.role, content: message.content });
    }
  }
  return { system: systemParts.length ? systemParts.join('\n\n') : undefined, turns };
}
