import { ParseError } from '../errors.js';
import { ANSWER_DELIMITER } from './protocol.js';
import { optionId, type Answer, type AnswerValue, type Question } from './types.js';

// ============================================================================
// Marker scanning
// ============================================================================

interface Marker {
  /** Offset of the first character of the marker line */
  lineStart: number;
  /** Offset just past the delimiter */
  valueStart: number;
  /** Content on the marker line after the delimiter, trimmed */
  content: string;
}

const escapedDelimiter = ANSWER_DELIMITER.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

function markerLineRegex(): RegExp {
  return new RegExp(`^[ \\t]*${escapedDelimiter}([^\\n]*)`, 'gm');
}

function findMarkers(text: string): Marker[] {
  const markers: Marker[] = [];
  for (const match of text.matchAll(markerLineRegex())) {
    const lineStart = match.index ?? 0;
    const valueStart = lineStart + match[0].length - match[1].length;
    markers.push({ lineStart, valueStart, content: match[1].trim() });
  }
  return markers;
}

function stripMarkerLines(text: string): string {
  return text.replace(new RegExp(`^[ \\t]*${escapedDelimiter}[^\\n]*(?:\\n|$)`, 'gm'), '').trim();
}

function stripMarkdown(content: string): string {
  return content.replace(/[*_`]/g, '').trim();
}

// ============================================================================
// Option letters
// ============================================================================

const LEAD_IN_RE = /^(?:(?:the\s+)?(?:correct\s+)?(?:answers?|options?|choices?)\s*(?:is|are|[:：])?\s*|选项\s*)/i;
const LETTER_RE = /^\(?([A-Z])\)?(?=$|[\s.,，、:：;)&/])/;
const SEPARATOR_RE = /^\s*(?:[,，、&/;]|and\b|or\b|和|或)\s*/i;
const STANDALONE_NEXT_RE = /^\s+\(?[A-Z]\)?(?=$|[\s,，、&/;])/;
// Lower-case letters only count when nothing else is on the line: "a" in "a city" is a word.
const LONE_LOWER_RE = /^\(?([a-z])\)?\.?$/;
// 1-based option numbers, e.g. "2" or "1, 3", with nothing else on the line.
const NUMBER_LIST_RE = /^\(?\d{1,2}\)?(?:\s*(?:[,，、&/;]|and\b|or\b|和|或)?\s*\(?\d{1,2}\)?)*\.?$/i;

/**
 * Decode the upper-case option letters on one marker line, in order of
 * appearance. "B", "(B)", "B. Paris", "A, C", "A and C", "A C" are recognised;
 * "B. A city" is read as a single letter followed by option text.
 */
function decodeLetters(content: string): string[] {
  let rest = stripMarkdown(content).replace(LEAD_IN_RE, '');
  const first = LETTER_RE.exec(rest);
  if (!first) return [];

  const letters = [first[1]];
  rest = rest.slice(first[0].length);

  for (;;) {
    const separator = SEPARATOR_RE.exec(rest);
    let after: string;
    if (separator) {
      after = rest.slice(separator[0].length);
    } else if (/^\s+/.test(rest)) {
      after = rest.trimStart();
    } else {
      break;
    }
    after = after.replace(LEAD_IN_RE, '');

    const next = LETTER_RE.exec(after);
    if (!next) break;

    if (!separator) {
      // A bare space only joins letters when the letter stands alone.
      const tail = after.slice(next[0].length);
      if (!(tail.trim() === '' || SEPARATOR_RE.test(tail) || STANDALONE_NEXT_RE.test(tail))) break;
    }

    letters.push(next[1]);
    rest = after.slice(next[0].length);
  }

  return letters;
}

/** Zero-based option indices named on one marker line, in order of appearance. */
function decodeSelection(content: string): number[] {
  const text = stripMarkdown(content).replace(LEAD_IN_RE, '').trim();

  const lone = LONE_LOWER_RE.exec(text);
  if (lone) return [lone[1].toUpperCase().charCodeAt(0) - 65];

  if (NUMBER_LIST_RE.test(text)) {
    return [...text.matchAll(/\d+/g)].map((match) => Number(match[0]) - 1);
  }

  return decodeLetters(text).map((letter) => letter.charCodeAt(0) - 65);
}

function describeOption(index: number): string {
  return index >= 0 && index < 26 ? optionId(index) : `#${index + 1}`;
}

function parseChoice(question: Question, markers: Marker[]): AnswerValue {
  const optionCount = question.options?.length ?? 0;
  const selections: number[][] = [];

  for (const marker of markers) {
    const indices = [...new Set(decodeSelection(marker.content))];
    if (indices.length === 0) continue;

    if (!question.multiSelect && indices.length > 1) {
      throw new ParseError('ambiguous', `single-select answer names several options: ${indices.map(describeOption).join(', ')}`);
    }

    const outOfRange = indices.filter((index) => index < 0 || index >= optionCount);
    if (outOfRange.length > 0) {
      throw new ParseError(
        'out_of_range',
        `option ${outOfRange.map(describeOption).join(', ')} does not exist (question has ${optionCount} options)`,
      );
    }
    selections.push([...indices].sort((a, b) => a - b));
  }

  if (selections.length === 0) {
    throw new ParseError('missing', 'no option letter found after the answer delimiter');
  }

  const [chosen] = selections;
  const conflicting = selections.some(
    (selection) => selection.length !== chosen.length || selection.some((index, i) => index !== chosen[i]),
  );
  if (conflicting) {
    throw new ParseError(
      'ambiguous',
      `conflicting answer markers: ${selections.map((s) => s.map(optionId).join('+')).join(' vs ')}`,
    );
  }

  if (question.multiSelect) {
    return { type: 'options', indices: chosen, ids: chosen.map(optionId) };
  }
  return { type: 'option', index: chosen[0], id: optionId(chosen[0]) };
}

// ============================================================================
// Booleans
// ============================================================================

const TRUE_WORDS = new Set(['true', 'yes', 'correct', 'right']);
const FALSE_WORDS = new Set(['false', 'no', 'incorrect', 'wrong']);
const NEGATED_CJK = ['不正确', '不对'];
const FALSE_CJK = ['错误', '错', '×', '✗'];
const TRUE_CJK = ['正确', '对', '√', '✓'];

/** Polarities named on one marker line. */
function decodeBooleans(content: string): Set<boolean> {
  const found = new Set<boolean>();
  let rest = stripMarkdown(content);

  for (const token of NEGATED_CJK) {
    if (rest.includes(token)) {
      found.add(false);
      rest = rest.split(token).join(' ');
    }
  }
  for (const token of FALSE_CJK) {
    if (rest.includes(token)) {
      found.add(false);
      rest = rest.split(token).join(' ');
    }
  }
  for (const token of TRUE_CJK) {
    if (rest.includes(token)) found.add(true);
  }

  for (const word of rest.toLowerCase().split(/[^a-z]+/)) {
    if (TRUE_WORDS.has(word)) found.add(true);
    if (FALSE_WORDS.has(word)) found.add(false);
  }
  return found;
}

function parseBoolean(markers: Marker[]): AnswerValue {
  const polarities = new Set<boolean>();
  for (const marker of markers) {
    for (const polarity of decodeBooleans(marker.content)) polarities.add(polarity);
  }

  if (polarities.size === 0) {
    throw new ParseError('missing', 'no true/false token found after the answer delimiter');
  }
  if (polarities.size > 1) {
    throw new ParseError('ambiguous', 'answer names both true and false');
  }
  const [value] = polarities;
  return { type: 'boolean', value };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Turn a reasoner response into an Answer for `question`.
 *
 * Pure: the same text and question always give the same Answer or the same
 * ParseError.
 */
export function parseAnswer(text: string, question: Question): Answer {
  const markers = findMarkers(text);
  if (markers.length === 0) {
    throw new ParseError('missing', `response has no "${ANSWER_DELIMITER}" line`);
  }

  switch (question.kind) {
    case 'multiple_choice':
      return { kind: question.kind, value: parseChoice(question, markers), rationale: stripMarkerLines(text), raw: text };

    case 'true_false':
      return { kind: question.kind, value: parseBoolean(markers), rationale: stripMarkerLines(text), raw: text };

    case 'fill_in_blank':
    case 'short_answer':
    case 'unknown': {
      const last = markers[markers.length - 1];
      const value = text.slice(last.valueStart).trim();
      if (!value) {
        throw new ParseError('missing', `nothing follows the final "${ANSWER_DELIMITER}"`);
      }
      return {
        kind: question.kind,
        value: { type: 'text', text: value },
        rationale: text.slice(0, last.lineStart).trim(),
        raw: text,
      };
    }
  }
}
