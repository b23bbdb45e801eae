/**
 * Reasoner answer protocol.
 *
 * The reasoner prompt template and the answer parser agree on one convention:
 * free-form rationale first, then a final line that starts with `ANSWER:`.
 * Any change to the template below needs a matching change in answerParser.ts
 * and a bump of ANSWER_PROTOCOL_VERSION.
 */

import type { ParseError } from '../errors.js';
import type { ChatMessage } from '../llm/types.js';
import { optionId, type QuestionKind, type ReasoningRequest } from './types.js';

export const ANSWER_PROTOCOL_VERSION = 1;

export const ANSWER_DELIMITER = 'ANSWER:';

const KIND_LABELS: Record<QuestionKind, string> = {
  multiple_choice: 'multiple choice',
  fill_in_blank: 'fill in the blank',
  true_false: 'true/false',
  short_answer: 'short answer',
  unknown: 'unspecified type',
};

export const REASONER_SYSTEM_PROMPT = `You are an expert tutor who solves exam questions.
You receive exactly one question. Think it through step by step, then give your final answer.

Output format (protocol v${ANSWER_PROTOCOL_VERSION}):
1. Your reasoning, as long as you need.
2. A final line that starts with "${ANSWER_DELIMITER}" followed by the answer. Nothing may follow the answer.

Answer rules by question type:
- multiple choice: "${ANSWER_DELIMITER} B", the option letter only. For multi-select questions list every letter, e.g. "${ANSWER_DELIMITER} A, C".
- true/false: "${ANSWER_DELIMITER} TRUE" or "${ANSWER_DELIMITER} FALSE".
- fill in the blank / short answer: "${ANSWER_DELIMITER} " followed by the exact text to enter. Plain text, no LaTeX, no markdown.

Write "${ANSWER_DELIMITER}" exactly once.`;

/** Instruction line describing the expected answer shape for a request. */
function answerShapeHint(request: ReasoningRequest): string {
  switch (request.kind) {
    case 'multiple_choice':
      return request.multiSelect
        ? `Select every correct option and answer with their letters, e.g. "${ANSWER_DELIMITER} A, C".`
        : `Select exactly one option and answer with its letter, e.g. "${ANSWER_DELIMITER} B".`;
    case 'true_false':
      return `Answer with "${ANSWER_DELIMITER} TRUE" or "${ANSWER_DELIMITER} FALSE".`;
    default:
      return `Put the exact text to enter after "${ANSWER_DELIMITER}".`;
  }
}

export function renderQuestion(request: ReasoningRequest): string {
  const lines: string[] = [`Question type: ${KIND_LABELS[request.kind]}${request.multiSelect ? ' (multi-select)' : ''}`, '', request.prompt];

  if (request.options?.length) {
    lines.push('');
    request.options.forEach((option, index) => {
      lines.push(`${optionId(index)}. ${option}`);
    });
  }

  if (request.formatHint) {
    lines.push('', `Answer format requirement: ${request.formatHint}`);
  }

  lines.push('', answerShapeHint(request));
  return lines.join('\n');
}

export function buildSolveMessages(request: ReasoningRequest): ChatMessage[] {
  return [
    { role: 'system', content: REASONER_SYSTEM_PROMPT },
    { role: 'user', content: renderQuestion(request) },
  ];
}

/**
 * Follow-up sent once when a response could not be parsed. Carries the
 * question, the rejected response and the parser's reason.
 */
export function buildCorrectiveMessages(
  request: ReasoningRequest,
  previousResponse: string,
  failure: ParseError,
): ChatMessage[] {
  return [
    ...buildSolveMessages(request),
    { role: 'assistant', content: previousResponse },
    {
      role: 'user',
      content: [
        `Your previous response could not be read (${failure.reason}: ${failure.detail}).`,
        `Reply again in the required format: reasoning first, then one final line starting with "${ANSWER_DELIMITER}".`,
        answerShapeHint(request),
      ].join('\n'),
    },
  ];
}
