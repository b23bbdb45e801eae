import {
  AffordanceNotFoundError,
  BudgetExceededError,
  errorMessage,
  ParseError,
  PerceptionError,
  RunCancelledError,
  SolveError,
  TransportError,
  type AffordanceKind,
} from '../errors.js';
import type { Question, QuestionKind } from '../solver/types.js';

export type FailureKind =
  | 'solve'
  | 'affordance_not_found'
  | 'perception'
  | 'transport'
  | 'budget_exceeded'
  | 'cancelled'
  | 'internal';

/** Why a run ended in Failed. Built from the error that ended it, never guessed. */
export interface FailureCause {
  kind: FailureKind;
  message: string;
  question?: { id: string; prompt: string; kind: QuestionKind };
  attemptedAnswer?: string;
  /** Last reasoner or operator response, when one was received */
  rawResponse?: string;
  /** Parse failure reason, or the affordance that was missing */
  reason?: string;
  affordance?: AffordanceKind;
  questionsAnswered: number;
}

function questionRef(question: Question): FailureCause['question'] {
  return { id: question.id, prompt: question.prompt, kind: question.kind };
}

export function describeFailure(err: unknown, questionsAnswered: number): FailureCause {
  const base = { message: errorMessage(err), questionsAnswered };

  if (err instanceof SolveError) {
    return {
      ...base,
      kind: 'solve',
      question: questionRef(err.question),
      reason: err.cause instanceof ParseError ? err.cause.reason : 'transport',
      ...(err.rawResponse !== undefined ? { rawResponse: err.rawResponse } : {}),
    };
  }
  if (err instanceof AffordanceNotFoundError) {
    return {
      ...base,
      kind: 'affordance_not_found',
      affordance: err.affordance,
      reason: err.affordance,
      ...(err.question ? { question: questionRef(err.question) } : {}),
      ...(err.attemptedAnswer !== undefined ? { attemptedAnswer: err.attemptedAnswer } : {}),
    };
  }
  if (err instanceof PerceptionError) {
    return { ...base, kind: 'perception', ...(err.rawResponse !== undefined ? { rawResponse: err.rawResponse } : {}) };
  }
  if (err instanceof BudgetExceededError) {
    return { ...base, kind: 'budget_exceeded' };
  }
  if (err instanceof RunCancelledError) {
    return { ...base, kind: 'cancelled' };
  }
  if (err instanceof TransportError) {
    return { ...base, kind: 'transport', reason: err.source };
  }
  return { ...base, kind: 'internal' };
}
