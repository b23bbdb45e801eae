// -- Questions --

export type QuestionKind =
  | 'multiple_choice'
  | 'fill_in_blank'
  | 'true_false'
  | 'short_answer'
  | 'unknown';

export const QUESTION_KINDS: readonly QuestionKind[] = [
  'multiple_choice',
  'fill_in_blank',
  'true_false',
  'short_answer',
  'unknown',
];

/**
 * Where the operator applies an answer on the page. Never sent to the reasoner.
 */
export interface QuestionBindings {
  /** Affordance id per option, index-aligned with Question.options */
  optionAffordances?: readonly string[];
  /** Text input for fill-in / short-answer questions */
  inputAffordance?: string;
}

export interface Question {
  /** Stable id assigned by the operator for this run */
  id: string;
  /** Full prompt text as shown on the page */
  prompt: string;
  kind: QuestionKind;
  /** Ordered option texts; identifiers are A, B, C... by position */
  options?: readonly string[];
  /** Multiple-choice question that accepts several options */
  multiSelect?: boolean;
  /** Answer-format requirement stated by the question, e.g. "round to 2 decimals" */
  formatHint?: string;
  bindings: QuestionBindings;
}

/**
 * The restricted view of a Question the reasoning agent is allowed to see.
 */
export interface ReasoningRequest {
  readonly prompt: string;
  readonly kind: QuestionKind;
  readonly options?: readonly string[];
  readonly multiSelect?: boolean;
  readonly formatHint?: string;
}

export function toReasoningRequest(question: Question): ReasoningRequest {
  return {
    prompt: question.prompt,
    kind: question.kind,
    ...(question.options?.length ? { options: [...question.options] } : {}),
    ...(question.multiSelect ? { multiSelect: true } : {}),
    ...(question.formatHint ? { formatHint: question.formatHint } : {}),
  };
}

// -- Answers --

export type AnswerValue =
  | { readonly type: 'option'; readonly index: number; readonly id: string }
  | { readonly type: 'options'; readonly indices: readonly number[]; readonly ids: readonly string[] }
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'boolean'; readonly value: boolean };

export interface Answer {
  readonly kind: QuestionKind;
  readonly value: AnswerValue;
  /** Reasoning trace with the answer marker removed; never truncated */
  readonly rationale: string;
  /** Untouched reasoner response */
  readonly raw: string;
}

/** Option identifier for a zero-based option index (0 -> "A"). */
export function optionId(index: number): string {
  return String.fromCharCode(65 + index);
}

/** Short human-readable rendering of an answer value, used in logs and failure causes. */
export function describeAnswerValue(value: AnswerValue): string {
  switch (value.type) {
    case 'option':
      return value.id;
    case 'options':
      return value.ids.join(', ');
    case 'text':
      return value.text;
    case 'boolean':
      return value.value ? 'true' : 'false';
  }
}
