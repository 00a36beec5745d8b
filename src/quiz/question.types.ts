export type Archetype = 'single' | 'multi' | 'match';

/** Topic assigned to bank records that carry none. */
export const DEFAULT_TOPIC = 'No topic';

interface QuestionBase {
  /** Unique within a bank file; duplicates across files are tolerated. */
  readonly id: string;
  readonly topic: string;
  readonly question: string;
  readonly explanation: string;
}

export interface SingleQuestion extends QuestionBase {
  readonly type: 'single';
  readonly options: readonly string[];
  readonly answer: string;
}

export interface MultiQuestion extends QuestionBase {
  readonly type: 'multi';
  readonly options: readonly string[];
  readonly answers: readonly string[];
}

/** Zero-based `[leftIndex, rightIndex]`, both in canonical order. */
export type MatchPair = readonly [left: number, right: number];

export interface MatchQuestion extends QuestionBase {
  readonly type: 'match';
  readonly matchLeft: readonly string[];
  readonly matchRight: readonly string[];
  readonly pairs: readonly MatchPair[];
}

export type QuestionRecord = SingleQuestion | MultiQuestion | MatchQuestion;

export interface TopicSummary {
  topic: string;
  count: number;
}

export function assertNever(value: never): never {
  throw new Error(`Unexpected variant: ${JSON.stringify(value)}`);
}
