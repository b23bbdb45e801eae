import type { PageSnapshot } from '../automation/types.js';
import type { QuestionScope } from './types.js';

export const OPERATOR_SYSTEM_PROMPT = `You operate a web page that shows exam or quiz questions.
You do NOT answer questions. Your only job is to find the next unanswered question on the page and describe it precisely.

You receive the page text and a list of interactive elements, each with an id in square brackets.
Reply with a single JSON object and nothing else:

{
  "found": true,
  "question": {
    "prompt": "<full question text, copied verbatim>",
    "kind": "multiple_choice" | "true_false" | "fill_in_blank" | "short_answer" | "unknown",
    "multiSelect": <true when several options may be selected>,
    "formatHint": "<answer-format requirement stated by the question, if any>",
    "options": [{ "text": "<option text without its letter>", "affordanceId": "<element id>" }],
    "inputAffordanceId": "<element id of the text input, for fill-in or short-answer questions>"
  }
}

Rules:
- Options are listed in the order the page shows them.
- true/false questions: list the two choices as options when the page shows clickable choices, otherwise give inputAffordanceId.
- Only use element ids from the list. Never invent one.
- Skip questions listed as already handled. They are identified by prompt and element ids; a question with the same prompt but other elements is a different question.
- Skip questions that already show a selected option or a filled input.
- When no unanswered question is left, reply {"found": false}.`;

function describeAffordance(affordance: PageSnapshot['affordances'][number]): string {
  const parts = [`[${affordance.id}]`, affordance.role];
  if (affordance.inputType) parts.push(`(${affordance.inputType})`);
  parts.push(JSON.stringify(affordance.label));
  if (affordance.group) parts.push(`group=${affordance.group}`);
  if (affordance.checked) parts.push('checked');
  if (affordance.value) parts.push(`value=${JSON.stringify(affordance.value)}`);
  return parts.join(' ');
}

export function buildLocatorPrompt(snapshot: PageSnapshot, scope: QuestionScope): string {
  const lines: string[] = [];

  if (scope.directive) {
    lines.push(`Task: ${scope.directive}`, '');
  }

  lines.push(`Page: ${snapshot.title} (${snapshot.url})`, '', 'Page text:', snapshot.text, '', 'Interactive elements:');
  for (const affordance of snapshot.affordances) {
    lines.push(describeAffordance(affordance));
  }

  if (scope.exclude.length > 0) {
    lines.push('', 'Already handled (skip these):');
    for (const handled of scope.exclude) {
      lines.push(`- ${handled.prompt} [${handled.affordanceIds.join(', ')}]`);
    }
  }

  lines.push('', 'Reply with the JSON object only.');
  return lines.join('\n');
}
