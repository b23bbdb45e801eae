import type { FailureCause } from './failure.js';

export type SessionStateName =
  | 'AwaitingQuestion'
  | 'Answering'
  | 'Applied'
  | 'PageComplete'
  | 'Paginating'
  | 'AllComplete'
  | 'Submitted'
  | 'Failed';

export const TERMINAL_STATES: ReadonlySet<SessionStateName> = new Set(['Submitted', 'Failed']);

export interface SessionState {
  state: SessionStateName;
  /** Zero-based; never decreases */
  pageIndex: number;
  /** Questions answered on the current page. Observability only */
  answeredOnPage: number;
  questionsAnswered: number;
  /** Unknown (null) until evaluated on the current page */
  hasNextPage: boolean | null;
  submitted: boolean;
  iterationsUsed: number;
  maxIterations: number;
  /** Id of the question currently being answered */
  currentQuestionId?: string;
  failure?: FailureCause;
}

export interface TransitionEvent {
  from: SessionStateName;
  to: SessionStateName;
  operation: string;
  snapshot: Readonly<SessionState>;
}
