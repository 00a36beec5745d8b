import { TranscriptEntry } from '../quiz/session';
import { LeaderboardRow, QuizPersistence, QuizUser } from './quiz-persistence';

export interface StoredSession {
  id: number;
  userId: number;
  topic: string;
  total: number;
  timerMinutes: number;
  startedAt: Date;
  finishedAt: Date | null;
  score: number | null;
  details: TranscriptEntry[] | null;
}

/**
 * Process-local storage. Everything is lost on restart; approvals are seeded
 * from `APPROVED_USER_IDS`.
 */
export class InMemoryQuizStore implements QuizPersistence {
  private readonly users = new Map<number, QuizUser>();
  private readonly sessions = new Map<number, StoredSession>();
  // userId -> topic -> points
  private readonly topicPoints = new Map<number, Map<string, number>>();
  private readonly preapproved: Set<number>;
  private nextSessionId = 1;

  constructor(approvedUserIds: readonly number[] = []) {
    this.preapproved = new Set(approvedUserIds);
  }

  async ensureUser(userId: number, fullName = ''): Promise<QuizUser> {
    return { ...this.userRecord(userId, fullName) };
  }

  async setUserName(userId: number, fullName: string): Promise<void> {
    this.userRecord(userId).fullName = fullName;
  }

  async setApproved(userId: number, approved: boolean): Promise<void> {
    this.userRecord(userId).approved = approved;
  }

  async getUserApproval(userId: number): Promise<boolean> {
    return this.users.get(userId)?.approved ?? this.preapproved.has(userId);
  }

  async startSession(userId: number, topic: string, total: number, timerMinutes: number): Promise<number> {
    const id = this.nextSessionId++;
    this.sessions.set(id, {
      id,
      userId,
      topic,
      total,
      timerMinutes,
      startedAt: new Date(),
      finishedAt: null,
      score: null,
      details: null,
    });
    return id;
  }

  async finishSession(sessionId: number, score: number, details: readonly TranscriptEntry[]): Promise<void> {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new Error(`Unknown session ${sessionId}`);
    }
    session.finishedAt = new Date();
    session.score = score;
    session.details = [...details];
  }

  async addPoints(userId: number, score: number, topic?: string): Promise<void> {
    this.userRecord(userId).points += score;

    if (topic) {
      const perTopic = this.topicPoints.get(userId) ?? new Map<string, number>();
      perTopic.set(topic, (perTopic.get(topic) ?? 0) + score);
      this.topicPoints.set(userId, perTopic);
    }
  }

  async getUserPoints(userId: number): Promise<number> {
    return this.users.get(userId)?.points ?? 0;
  }

  async topScores(limit: number, topic?: string): Promise<LeaderboardRow[]> {
    const rows: LeaderboardRow[] = [];
    for (const user of this.users.values()) {
      if (!user.approved) continue;
      if (topic === undefined) {
        rows.push({ fullName: user.fullName, points: user.points });
        continue;
      }
      const points = this.topicPoints.get(user.userId)?.get(topic);
      if (points !== undefined) rows.push({ fullName: user.fullName, points });
    }

    return rows
      .sort((a, b) => b.points - a.points || (a.fullName < b.fullName ? -1 : a.fullName > b.fullName ? 1 : 0))
      .slice(0, Math.max(0, limit));
  }

  private userRecord(userId: number, fullName = ''): QuizUser {
    const existing = this.users.get(userId);
    if (existing) {
      if (!existing.fullName && fullName) existing.fullName = fullName;
      return existing;
    }

    const user: QuizUser = {
      userId,
      fullName,
      approved: this.preapproved.has(userId),
      points: 0,
      registeredAt: new Date(),
    };
    this.users.set(userId, user);
    return user;
  }

  findSession(sessionId: number): StoredSession | undefined {
    const session = this.sessions.get(sessionId);
    return session && { ...session };
  }
}
