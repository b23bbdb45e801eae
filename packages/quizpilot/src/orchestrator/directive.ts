import { QUESTION_KINDS, type QuestionKind } from '../solver/types.js';

export interface RunDirective {
  /** Original free text, forwarded to the operator */
  text?: string;
  /** Question kinds to answer; kinds outside it are skipped */
  kinds: ReadonlySet<QuestionKind>;
}

const KIND_KEYWORDS: Array<{ kind: QuestionKind; patterns: RegExp[] }> = [
  {
    kind: 'multiple_choice',
    patterns: [/multiple[\s-]*choice/i, /\bmcqs?\b/i, /选择题/, /单选/, /多选/],
  },
  {
    kind: 'true_false',
    patterns: [/true\s*(?:\/|or|-)\s*false/i, /\bt\/f\b/i, /判断题/],
  },
  {
    kind: 'fill_in_blank',
    patterns: [/fill[\s-]*in(?:[\s-]*the)?[\s-]*blanks?/i, /填空题/],
  },
  {
    kind: 'short_answer',
    patterns: [/short[\s-]*answers?/i, /简答题/, /问答题/],
  },
];

/**
 * Read the question kinds a directive mentions ("only multiple choice",
 * "选择题和判断题"). No recognised kind puts every kind in scope.
 */
export function parseRunDirective(text?: string): RunDirective {
  const trimmed = text?.trim();
  if (!trimmed) return { kinds: new Set(QUESTION_KINDS) };

  const kinds = new Set<QuestionKind>();
  for (const { kind, patterns } of KIND_KEYWORDS) {
    if (patterns.some((p) => p.test(trimmed))) kinds.add(kind);
  }

  return { text: trimmed, kinds: kinds.size > 0 ? kinds : new Set(QUESTION_KINDS) };
}
