export interface LabelledItem {
  label: string;
  text: string;
}

interface DirectiveBase {
  questionId: string;
  /** 1-based. */
  position: number;
  total: number;
  prompt: string;
  /** Whole seconds until the deadline; absent for untimed sessions. */
  secondsLeft?: number;
}

export type RenderDirective =
  | (DirectiveBase & { archetype: 'single'; payload: { options: string[] } })
  | (DirectiveBase & { archetype: 'multi'; payload: { options: string[]; selected: string[] } })
  | (DirectiveBase & { archetype: 'match'; payload: { left: LabelledItem[]; right: LabelledItem[] } });

export type MultiDirective = Extract<RenderDirective, { archetype: 'multi' }>;

/** Raw interaction coming from the transport. */
export type AnswerInput =
  | { kind: 'option'; option: string }
  | { kind: 'toggle'; option: string }
  | { kind: 'confirm' }
  | { kind: 'text'; text: string };

export interface AnswerOutcome {
  correct: boolean;
  /** Correct answer as the user should see it. */
  expected: string;
  explanation: string;
}

export interface SessionFinished {
  kind: 'finished';
  score: number;
  total: number;
  /** The deadline passed before the last question was answered. */
  expired: boolean;
}

export type SessionStep = { kind: 'question'; directive: RenderDirective } | SessionFinished;

export type NoActiveSession = { kind: 'no-session' };

export type StartResult =
  | { kind: 'not-approved' }
  | { kind: 'no-questions' }
  | { kind: 'started'; sessionId: number; topic: string; total: number; timerMinutes: number; step: SessionStep };

export type SubmitResult =
  | NoActiveSession
  /** Input does not fit the pending question, e.g. a stale button. */
  | { kind: 'ignored' }
  | { kind: 'retry'; reason: string }
  | { kind: 'selection'; directive: MultiDirective }
  | { kind: 'answered'; outcome: AnswerOutcome; next: SessionStep }
  | SessionFinished;
