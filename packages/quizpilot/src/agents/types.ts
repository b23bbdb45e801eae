import type { AgentRole } from '../config/models.js';
import type { ModelIdentity } from '../llm/types.js';
import type { PageSnapshot } from '../automation/types.js';
import type { QuestionBindings, QuestionKind } from '../solver/types.js';

export type { AgentRole };

/** Capability shared by both agents: a role bound to one model. */
export interface Agent {
  readonly role: AgentRole;
  readonly model: ModelIdentity;
}

/**
 * A question already answered or skipped on the current page. Prompts alone
 * can repeat on one page, so the bound element ids are part of its identity.
 */
export interface HandledQuestion {
  prompt: string;
  affordanceIds: readonly string[];
}

export function toHandledQuestion(question: { prompt: string; bindings: QuestionBindings }): HandledQuestion {
  const { optionAffordances = [], inputAffordance } = question.bindings;
  return { prompt: question.prompt, affordanceIds: inputAffordance ? [...optionAffordances, inputAffordance] : [...optionAffordances] };
}

export function handledKey(handled: HandledQuestion): string {
  return `${handled.prompt}\n${handled.affordanceIds.join(',')}`;
}

/** What the operator should look for on the current page. */
export interface QuestionScope {
  /** Free-text run directive, forwarded to the operator prompt */
  directive?: string;
  /** Questions already answered or skipped on this page; kind filtering is the orchestrator's */
  exclude: readonly HandledQuestion[];
}

/** A question as located on the page, before the operator assigns its id. */
export interface LocatedQuestion {
  prompt: string;
  kind: QuestionKind;
  options?: string[];
  multiSelect?: boolean;
  formatHint?: string;
  bindings: QuestionBindings;
}

/**
 * Finds the next unanswered question in a snapshot. Returns null when the
 * page holds no further question outside `scope.exclude`.
 */
export interface QuestionLocator {
  readonly identity: ModelIdentity;
  locate(snapshot: PageSnapshot, scope: QuestionScope, signal?: AbortSignal): Promise<LocatedQuestion | null>;
}
