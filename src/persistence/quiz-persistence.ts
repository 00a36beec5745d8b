import { TranscriptEntry } from '../quiz/session';

export const QUIZ_PERSISTENCE = Symbol('QUIZ_PERSISTENCE');

export interface QuizUser {
  userId: number;
  fullName: string;
  approved: boolean;
  points: number;
  registeredAt: Date;
}

export interface LeaderboardRow {
  fullName: string;
  points: number;
}

/**
 * Storage the quiz engine writes to. Implementations may reject; callers of
 * the engine see those rejections unchanged.
 */
export interface QuizPersistence {
  ensureUser(userId: number, fullName?: string): Promise<QuizUser>;
  setUserName(userId: number, fullName: string): Promise<void>;
  getUserApproval(userId: number): Promise<boolean>;
  startSession(userId: number, topic: string, total: number, timerMinutes: number): Promise<number>;
  finishSession(sessionId: number, score: number, details: readonly TranscriptEntry[]): Promise<void>;
  addPoints(userId: number, score: number, topic?: string): Promise<void>;
  getUserPoints(userId: number): Promise<number>;
  /** Approved users only, highest points first, ties by name. */
  topScores(limit: number, topic?: string): Promise<LeaderboardRow[]>;
}
