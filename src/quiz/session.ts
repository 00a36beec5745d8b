import { Injectable } from '@nestjs/common';

import { MatchPair, MatchQuestion, MultiQuestion, QuestionRecord, SingleQuestion } from './question.types';

/**
 * Display position <-> canonical `matchRight` index, built once when a match
 * question is rendered and dropped once it is answered.
 */
export interface MatchLookup {
  readonly displayToCanonical: readonly number[];
  readonly canonicalToDisplay: readonly number[];
}

export interface PendingMulti {
  type: 'multi';
  question: MultiQuestion;
  /** Options toggled on so far; evaluated only on confirm. */
  selection: Set<string>;
}

/** What the session is waiting for on the current question. */
export type PendingAnswer =
  | { type: 'single'; question: SingleQuestion }
  | PendingMulti
  | { type: 'match'; question: MatchQuestion; lookup: MatchLookup };

export type TranscriptEntry =
  | { questionId: string; type: 'single'; submitted: string; expected: string; correct: boolean }
  | { questionId: string; type: 'multi'; submitted: string[]; expected: string[]; correct: boolean }
  | { questionId: string; type: 'match'; submitted: MatchPair[]; expected: MatchPair[]; correct: boolean };

export interface SessionState {
  readonly sessionId: number;
  readonly userId: number;
  readonly topic: string;
  /** Sampled and option-shuffled at start; frozen for the session. */
  readonly questions: readonly QuestionRecord[];
  currentIndex: number;
  score: number;
  readonly details: TranscriptEntry[];
  /** Epoch milliseconds, or null for an untimed session. */
  readonly deadline: number | null;
  pending: PendingAnswer | null;
}

export type EngineState =
  | 'AWAITING_QUESTION_TYPE_DECISION'
  | 'AWAITING_SINGLE_ANSWER'
  | 'AWAITING_MULTI_TOGGLE'
  | 'AWAITING_MATCH_ANSWER'
  | 'FINISHED';

export function engineState(session: SessionState | undefined): EngineState {
  if (!session) return 'FINISHED';
  switch (session.pending?.type) {
    case 'single':
      return 'AWAITING_SINGLE_ANSWER';
    case 'multi':
      return 'AWAITING_MULTI_TOGGLE';
    case 'match':
      return 'AWAITING_MATCH_ANSWER';
    case undefined:
      return 'AWAITING_QUESTION_TYPE_DECISION';
  }
}

/** One active session per user. Starting a new one replaces the old. */
@Injectable()
export class SessionStore {
  private readonly sessions = new Map<number, SessionState>();

  get(userId: number): SessionState | undefined {
    return this.sessions.get(userId);
  }

  put(session: SessionState): void {
    this.sessions.set(session.userId, session);
  }

  delete(userId: number): boolean {
    return this.sessions.delete(userId);
  }

  get size(): number {
    return this.sessions.size;
  }
}
