import type { ParseError } from '../errors.js';
import type { ModelClient, ModelIdentity } from '../llm/types.js';
import { buildCorrectiveMessages, buildSolveMessages } from '../solver/protocol.js';
import type { ReasoningRequest } from '../solver/types.js';
import type { Agent } from './types.js';

/**
 * The reasoning side of the pair. It is handed a ReasoningRequest and
 * nothing else: it has no access to the page, the bindings or the run.
 */
export class ReasoningAgent implements Agent {
  readonly role = 'reasoner' as const;

  constructor(private readonly client: ModelClient) {}

  get model(): ModelIdentity {
    return this.client.identity;
  }

  reason(request: ReasoningRequest, signal?: AbortSignal): Promise<string> {
    return this.client.complete(buildSolveMessages(request), { signal });
  }

  /** Ask again after `previousResponse` failed to parse. */
  reformat(request: ReasoningRequest, previousResponse: string, failure: ParseError, signal?: AbortSignal): Promise<string> {
    return this.client.complete(buildCorrectiveMessages(request, previousResponse, failure), { signal });
  }
}
