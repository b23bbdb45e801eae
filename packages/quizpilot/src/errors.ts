import type { Question } from './solver/types.js';

// --------------------------------------------------------------------------
// Base
// --------------------------------------------------------------------------

export class QuizPilotError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = 'QuizPilotError';
  }
}

// --------------------------------------------------------------------------
// Transport
// --------------------------------------------------------------------------

export type TransportSource = 'model' | 'page';

/**
 * Failure talking to a model provider or the page-automation collaborator.
 * Only `transient` failures are retried.
 */
export class TransportError extends QuizPilotError {
  constructor(
    message: string,
    public readonly source: TransportSource,
    public readonly transient: boolean,
    public readonly status?: number,
  ) {
    super(message, 'transport_error');
    this.name = 'TransportError';
  }
}

// --------------------------------------------------------------------------
// Parsing / solving
// --------------------------------------------------------------------------

export type ParseFailureReason = 'missing' | 'ambiguous' | 'out_of_range';

export class ParseError extends QuizPilotError {
  constructor(
    public readonly reason: ParseFailureReason,
    public readonly detail: string,
  ) {
    super(`Could not parse answer (${reason}): ${detail}`, 'parse_error');
    this.name = 'ParseError';
  }
}

export class SolveError extends QuizPilotError {
  constructor(
    public readonly question: Question,
    public readonly cause: ParseError | TransportError,
    /** Last raw reasoner response, when one was received */
    public readonly rawResponse?: string,
  ) {
    super(`Failed to solve question "${question.prompt}": ${cause.message}`, 'solve_error');
    this.name = 'SolveError';
  }
}

// --------------------------------------------------------------------------
// Page operation
// --------------------------------------------------------------------------

export type AffordanceKind = 'option' | 'input' | 'next' | 'submit';

export class AffordanceNotFoundError extends QuizPilotError {
  constructor(
    public readonly affordance: AffordanceKind,
    detail: string,
    public readonly question?: Question,
    public readonly attemptedAnswer?: string,
  ) {
    super(`Could not locate ${affordance} control: ${detail}`, 'affordance_not_found');
    this.name = 'AffordanceNotFoundError';
  }
}

export class PerceptionError extends QuizPilotError {
  constructor(
    message: string,
    public readonly rawResponse?: string,
  ) {
    super(message, 'perception_error');
    this.name = 'PerceptionError';
  }
}

// --------------------------------------------------------------------------
// Run control
// --------------------------------------------------------------------------

export class BudgetExceededError extends QuizPilotError {
  constructor(
    public readonly iterationsUsed: number,
    public readonly maxIterations: number,
    public readonly questionsAnswered: number,
  ) {
    super(
      `Iteration budget exhausted after ${iterationsUsed}/${maxIterations} iterations (${questionsAnswered} questions answered)`,
      'budget_exceeded',
    );
    this.name = 'BudgetExceededError';
  }
}

export class RunCancelledError extends QuizPilotError {
  constructor(reason = 'Run cancelled') {
    super(reason, 'cancelled');
    this.name = 'RunCancelledError';
  }
}

export class ConfigError extends QuizPilotError {
  constructor(
    message: string,
    public readonly missingKeys: readonly string[] = [],
  ) {
    super(message, 'config_error');
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
