import { MatchParseError } from './quiz.errors';
import { MatchPair, MatchQuestion, MultiQuestion, SingleQuestion } from './question.types';
import { MatchLookup } from './session';

export interface Scored<T> {
  correct: boolean;
  submitted: T;
  expected: T;
}

export type MatchEvaluation = { kind: 'scored'; result: Scored<MatchPair[]> } | { kind: 'retry'; error: MatchParseError };

/** Exact, case-sensitive comparison: button payloads carry the option text verbatim. */
export function evaluateSingle(question: SingleQuestion, chosen: string): Scored<string> {
  return { correct: chosen === question.answer, submitted: chosen, expected: question.answer };
}

export function evaluateMulti(question: MultiQuestion, selection: ReadonlySet<string>): Scored<string[]> {
  const expected = new Set(question.answers);
  const correct = selection.size === expected.size && [...selection].every((option) => expected.has(option));
  return { correct, submitted: [...selection].sort(), expected: [...expected].sort() };
}

/** Adds `option` if absent, removes it if present. */
export function toggleOption(selection: Set<string>, option: string): void {
  if (!selection.delete(option)) {
    selection.add(option);
  }
}

export function buildMatchLookup(displayToCanonical: readonly number[]): MatchLookup {
  const canonicalToDisplay: number[] = new Array<number>(displayToCanonical.length);
  displayToCanonical.forEach((canonical, display) => {
    canonicalToDisplay[canonical] = display;
  });
  return { displayToCanonical: [...displayToCanonical], canonicalToDisplay };
}

export function leftLabel(index: number): string {
  return String.fromCharCode('A'.charCodeAt(0) + index);
}

export function rightLabel(index: number): string {
  return String(index + 1);
}

export type MatchParseResult = { ok: true; pairs: MatchPair[] } | { ok: false; error: MatchParseError };

/**
 * Parses `A-2,B-1,C-3` into zero-based `[left, displayedRight]` pairs.
 * Whitespace and letter case are ignored; a letter may appear only once.
 */
export function parseMatchAnswer(input: string, leftCount: number, rightCount: number): MatchParseResult {
  const letters = Array.from({ length: leftCount }, (_, i) => leftLabel(i));
  const numbers = Array.from({ length: rightCount }, (_, i) => rightLabel(i));
  const tokens = input
    .toUpperCase()
    .replace(/\s+/g, '')
    .split(',')
    .filter((token) => token.length > 0);
  const fail = (reason: string): MatchParseResult => ({ ok: false, error: new MatchParseError(input, reason) });

  if (tokens.length === 0) {
    return fail('No pairs given');
  }

  const pairs: MatchPair[] = [];
  const seen = new Set<number>();
  for (const token of tokens) {
    const dash = token.indexOf('-');
    if (dash < 0) {
      return fail(`"${token}" is not a letter-number pair`);
    }
    const left = letters.indexOf(token.slice(0, dash));
    const right = numbers.indexOf(token.slice(dash + 1));
    if (left < 0 || right < 0) {
      return fail(`"${token}" uses an unknown letter or number`);
    }
    if (seen.has(left)) {
      return fail(`${letters[left]} is paired more than once`);
    }
    seen.add(left);
    pairs.push([left, right]);
  }
  return { ok: true, pairs };
}

function comparePairs(a: MatchPair, b: MatchPair): number {
  return a[0] - b[0] || a[1] - b[1];
}

const pairKey = ([left, right]: MatchPair): string => `${left}:${right}`;

/**
 * Numbers in `input` refer to the displayed order of `matchRight`; they are
 * translated through `lookup` before comparing with the canonical pairs.
 */
export function evaluateMatch(question: MatchQuestion, lookup: MatchLookup, input: string): MatchEvaluation {
  const parsed = parseMatchAnswer(input, question.matchLeft.length, lookup.displayToCanonical.length);
  if (!parsed.ok) {
    return { kind: 'retry', error: parsed.error };
  }

  const submitted = parsed.pairs
    .map(([left, shown]): MatchPair => [left, lookup.displayToCanonical[shown]])
    .sort(comparePairs);
  const expectedByKey = new Map(question.pairs.map((pair) => [pairKey(pair), pair] as const));
  const expected = [...expectedByKey.values()].sort(comparePairs);

  const correct =
    submitted.length === expectedByKey.size && submitted.every((pair) => expectedByKey.has(pairKey(pair)));
  return { kind: 'scored', result: { correct, submitted, expected } };
}

/** Canonical pairs expressed in the labels the user saw, e.g. `A-2, B-1`. */
export function describeMatchPairs(pairs: readonly MatchPair[], lookup: MatchLookup): string {
  return pairs
    .map(([left, right]) => {
      const shown = lookup.canonicalToDisplay[right];
      return `${leftLabel(left)}-${shown === undefined ? '?' : rightLabel(shown)}`;
    })
    .join(', ');
}
