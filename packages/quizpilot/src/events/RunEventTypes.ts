/**
 * RunEventTypes: canonical event names emitted by the orchestrator and the
 * solve tool.
 *
 * Using typed constants prevents typo bugs and enables autocomplete.
 */

export const RUN_EVENT_TYPES = {
  // Lifecycle
  RUN_STARTED: 'run_started',
  RUN_COMPLETED: 'run_completed',
  RUN_FAILED: 'run_failed',

  // Questions
  QUESTION_IDENTIFIED: 'question_identified',
  QUESTION_SKIPPED: 'question_skipped',
  ANSWER_APPLIED: 'answer_applied',

  // Pages
  PAGE_ADVANCED: 'page_advanced',
  SUBMITTED: 'submitted',
} as const;

export type RunEventType = (typeof RUN_EVENT_TYPES)[keyof typeof RUN_EVENT_TYPES];

export const SOLVE_EVENT_TYPES = {
  SOLVE_STARTED: 'solve_started',
  SOLVE_RETRY: 'solve_retry',
  SOLVE_CORRECTIVE: 'solve_corrective',
  SOLVE_COMPLETED: 'solve_completed',
} as const;

export type SolveEventType = (typeof SOLVE_EVENT_TYPES)[keyof typeof SOLVE_EVENT_TYPES];

/** Payload carried by every run and solve event. */
export interface RunEvent {
  type: RunEventType | SolveEventType;
  at: number;
  data: Record<string, unknown>;
}

/** Listener signature shared by the orchestrator and the solve tool. */
export type RunEventListener = (event: RunEvent) => void;
