import { z } from 'zod';
import type { PageSnapshot } from '../automation/types.js';
import { PerceptionError } from '../errors.js';
import type { ModelClient, ModelIdentity } from '../llm/types.js';
import { buildLocatorPrompt, OPERATOR_SYSTEM_PROMPT } from './prompts.js';
import type { LocatedQuestion, QuestionLocator, QuestionScope } from './types.js';

const questionKindSchema = z.enum(['multiple_choice', 'fill_in_blank', 'true_false', 'short_answer', 'unknown']);

export const locatorResponseSchema = z.object({
  found: z.boolean(),
  question: z
    .object({
      prompt: z.string().trim().min(1),
      kind: questionKindSchema.catch('unknown'),
      multiSelect: z.boolean().optional(),
      formatHint: z.string().optional(),
      options: z
        .array(z.object({ text: z.string(), affordanceId: z.string() }))
        .max(26)
        .optional(),
      inputAffordanceId: z.string().optional(),
    })
    .nullish(),
});

export type LocatorResponse = z.infer<typeof locatorResponseSchema>;

/** Strip markdown fences and any prose around the outermost JSON object. */
export function extractJsonObject(text: string): string {
  const cleaned = text.replace(/^```(?:json)?\s*\n?/m, '').replace(/\n?```\s*$/m, '').trim();
  const start = cleaned.indexOf('{');
  const end = cleaned.lastIndexOf('}');
  return start >= 0 && end > start ? cleaned.slice(start, end + 1) : cleaned;
}

/**
 * Turn a validated locator response into a LocatedQuestion, checking every
 * binding against the snapshot it was produced from.
 */
export function toLocatedQuestion(response: LocatorResponse, snapshot: PageSnapshot, raw: string): LocatedQuestion | null {
  if (!response.found || !response.question) return null;
  const question = response.question;
  const known = new Set(snapshot.affordances.map((a) => a.id));

  const unknownIds = [
    ...(question.options ?? []).map((o) => o.affordanceId),
    ...(question.inputAffordanceId ? [question.inputAffordanceId] : []),
  ].filter((id) => !known.has(id));
  if (unknownIds.length > 0) {
    throw new PerceptionError(`Operator referenced unknown elements: ${unknownIds.join(', ')}`, raw);
  }

  const options = question.options?.map((o) => o.text.trim());
  const kind = question.kind;

  if (kind === 'multiple_choice' && !options?.length) {
    throw new PerceptionError(`Multiple-choice question without options: "${question.prompt}"`, raw);
  }
  if (!options?.length && !question.inputAffordanceId) {
    throw new PerceptionError(`Question has neither options nor an input: "${question.prompt}"`, raw);
  }

  return {
    prompt: question.prompt,
    kind,
    ...(options?.length ? { options } : {}),
    ...(question.multiSelect && kind === 'multiple_choice' ? { multiSelect: true } : {}),
    ...(question.formatHint?.trim() ? { formatHint: question.formatHint.trim() } : {}),
    bindings: {
      ...(question.options?.length ? { optionAffordances: question.options.map((o) => o.affordanceId) } : {}),
      ...(question.inputAffordanceId ? { inputAffordance: question.inputAffordanceId } : {}),
    },
  };
}

/**
 * Locates questions by asking the operator model to describe the page as
 * JSON. Malformed or inconsistent replies raise PerceptionError; the caller
 * decides whether to try again.
 */
export class ModelQuestionLocator implements QuestionLocator {
  constructor(private readonly client: ModelClient) {}

  get identity(): ModelIdentity {
    return this.client.identity;
  }

  async locate(snapshot: PageSnapshot, scope: QuestionScope, signal?: AbortSignal): Promise<LocatedQuestion | null> {
    const raw = await this.client.complete(
      [
        { role: 'system', content: OPERATOR_SYSTEM_PROMPT },
        { role: 'user', content: buildLocatorPrompt(snapshot, scope) },
      ],
      { signal },
    );

    let json: unknown;
    try {
      json = JSON.parse(extractJsonObject(raw));
    } catch {
      throw new PerceptionError('Operator reply is not valid JSON', raw);
    }

    const parsed = locatorResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new PerceptionError(`Operator reply has the wrong shape: ${parsed.error.issues[0]?.message ?? 'invalid'}`, raw);
    }

    return toLocatedQuestion(parsed.data, snapshot, raw);
  }
}
