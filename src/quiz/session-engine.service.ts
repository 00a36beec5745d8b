import { Inject, Injectable, Logger } from '@nestjs/common';

import { QUIZ_PERSISTENCE, QuizPersistence } from '../persistence/quiz-persistence';
import {
  buildMatchLookup,
  describeMatchPairs,
  evaluateMatch,
  evaluateMulti,
  evaluateSingle,
  leftLabel,
  rightLabel,
  toggleOption,
} from './answer-evaluator';
import { QuestionSelectorService } from './question-selector.service';
import { assertNever, QuestionRecord } from './question.types';
import { engineState, PendingAnswer, PendingMulti, SessionState, SessionStore, TranscriptEntry } from './session';
import {
  AnswerInput,
  AnswerOutcome,
  MultiDirective,
  NoActiveSession,
  RenderDirective,
  SessionFinished,
  SessionStep,
  StartResult,
  SubmitResult,
} from './session-engine.types';
import { RANDOM_SOURCE, RandomSource, shuffle } from './shuffle';

const MINUTE_MS = 60_000;

/**
 * Drives one user at a time through a quiz.
 *
 * The session lives in {@link SessionStore} between interactions; every call
 * here is a fresh dispatch on that stored state. Deadlines are checked lazily,
 * before a question is rendered and before an answer is evaluated.
 */
@Injectable()
export class SessionEngineService {
  private readonly logger = new Logger(SessionEngineService.name);

  constructor(
    private readonly selector: QuestionSelectorService,
    private readonly sessions: SessionStore,
    @Inject(QUIZ_PERSISTENCE) private readonly persistence: QuizPersistence,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
  ) {}

  /**
   * Starts a quiz, replacing any unfinished one of the same user. The replaced
   * session is dropped without a transcript.
   */
  async startSession(userId: number, topic: string, n: number, timerMinutes: number): Promise<StartResult> {
    if (!(await this.persistence.getUserApproval(userId))) {
      return { kind: 'not-approved' };
    }

    const questions = this.selector.select(topic, n);
    if (questions.length === 0) {
      return { kind: 'no-questions' };
    }

    const minutes = timerMinutes > 0 ? timerMinutes : 0;
    const sessionId = await this.persistence.startSession(userId, topic, questions.length, minutes);

    if (this.sessions.get(userId)) {
      this.logger.log(`User ${userId} abandoned an unfinished session`);
    }
    const session: SessionState = {
      sessionId,
      userId,
      topic,
      questions,
      currentIndex: 0,
      score: 0,
      details: [],
      deadline: minutes > 0 ? Date.now() + minutes * MINUTE_MS : null,
      pending: null,
    };
    this.sessions.put(session);
    this.logger.log(`Session ${sessionId} started: user ${userId}, "${topic}", ${questions.length} questions`);

    return {
      kind: 'started',
      sessionId,
      topic,
      total: questions.length,
      timerMinutes: minutes,
      step: await this.advance(session),
    };
  }

  /** Re-renders the pending question, or finishes the session if time is up. */
  async currentStep(userId: number): Promise<SessionStep | NoActiveSession> {
    const session = this.sessions.get(userId);
    if (!session) return { kind: 'no-session' };
    if (this.isExpired(session)) return this.finish(session, true);
    if (!session.pending) return this.advance(session);
    return { kind: 'question', directive: this.directive(session, session.pending) };
  }

  hasActiveSession(userId: number): boolean {
    return this.sessions.get(userId) !== undefined;
  }

  /**
   * Option text behind button `index` of the question at `position`. Undefined
   * once that question is no longer the pending one, or when it has no buttons.
   */
  optionAt(userId: number, position: number, index: number): string | undefined {
    const session = this.sessions.get(userId);
    const pending = session?.pending;
    if (!session || !pending || pending.type === 'match') return undefined;
    if (session.currentIndex + 1 !== position) return undefined;
    return pending.question.options[index];
  }

  async submitAnswer(userId: number, input: AnswerInput): Promise<SubmitResult> {
    const session = this.sessions.get(userId);
    const pending = session?.pending;
    if (!session || !pending) {
      return { kind: 'no-session' };
    }
    if (this.isExpired(session)) {
      return this.finish(session, true);
    }

    this.logger.debug(`User ${userId} in ${engineState(session)}: ${input.kind}`);

    switch (pending.type) {
      case 'single': {
        if (input.kind !== 'option') return { kind: 'ignored' };
        const scored = evaluateSingle(pending.question, input.option);
        return this.record(
          session,
          { questionId: pending.question.id, type: 'single', ...scored },
          { correct: scored.correct, expected: scored.expected, explanation: pending.question.explanation },
        );
      }

      case 'multi': {
        if (input.kind === 'toggle') {
          if (!pending.question.options.includes(input.option)) return { kind: 'ignored' };
          toggleOption(pending.selection, input.option);
          return { kind: 'selection', directive: this.multiDirective(session, pending) };
        }
        if (input.kind !== 'confirm') return { kind: 'ignored' };
        const scored = evaluateMulti(pending.question, pending.selection);
        return this.record(
          session,
          { questionId: pending.question.id, type: 'multi', ...scored },
          {
            correct: scored.correct,
            expected: pending.question.answers.join(', '),
            explanation: pending.question.explanation,
          },
        );
      }

      case 'match': {
        if (input.kind !== 'text') return { kind: 'ignored' };
        const evaluation = evaluateMatch(pending.question, pending.lookup, input.text);
        if (evaluation.kind === 'retry') {
          this.logger.warn(`Unparseable match answer from user ${userId}: ${evaluation.error.message}`);
          return { kind: 'retry', reason: evaluation.error.message };
        }
        const scored = evaluation.result;
        return this.record(
          session,
          { questionId: pending.question.id, type: 'match', ...scored },
          {
            correct: scored.correct,
            expected: describeMatchPairs(scored.expected, pending.lookup),
            explanation: pending.question.explanation,
          },
        );
      }

      default:
        return assertNever(pending);
    }
  }

  private async record(session: SessionState, entry: TranscriptEntry, outcome: AnswerOutcome): Promise<SubmitResult> {
    session.details.push(entry);
    if (entry.correct) session.score++;
    session.currentIndex++;
    session.pending = null;

    return { kind: 'answered', outcome, next: await this.advance(session) };
  }

  private async advance(session: SessionState): Promise<SessionStep> {
    if (session.currentIndex >= session.questions.length) {
      return this.finish(session, false);
    }
    if (this.isExpired(session)) {
      return this.finish(session, true);
    }

    const pending = this.pendingFor(session.questions[session.currentIndex]);
    session.pending = pending;
    return { kind: 'question', directive: this.directive(session, pending) };
  }

  private pendingFor(question: QuestionRecord): PendingAnswer {
    switch (question.type) {
      case 'single':
        return { type: 'single', question };
      case 'multi':
        return { type: 'multi', question, selection: new Set<string>() };
      case 'match': {
        const displayOrder = shuffle(
          question.matchRight.map((_, index) => index),
          this.random,
        );
        return { type: 'match', question, lookup: buildMatchLookup(displayOrder) };
      }
    }
  }

  private directive(session: SessionState, pending: PendingAnswer): RenderDirective {
    switch (pending.type) {
      case 'single':
        return {
          ...this.directiveBase(session, pending.question),
          archetype: 'single',
          payload: { options: [...pending.question.options] },
        };
      case 'multi':
        return this.multiDirective(session, pending);
      case 'match': {
        const { question, lookup } = pending;
        return {
          ...this.directiveBase(session, question),
          archetype: 'match',
          payload: {
            left: question.matchLeft.map((text, index) => ({ label: leftLabel(index), text })),
            right: lookup.displayToCanonical.map((canonical, index) => ({
              label: rightLabel(index),
              text: question.matchRight[canonical],
            })),
          },
        };
      }
    }
  }

  private multiDirective(session: SessionState, pending: PendingMulti): MultiDirective {
    const { question, selection } = pending;
    return {
      ...this.directiveBase(session, question),
      archetype: 'multi',
      payload: {
        options: [...question.options],
        selected: question.options.filter((option) => selection.has(option)),
      },
    };
  }

  private directiveBase(session: SessionState, question: QuestionRecord) {
    return {
      questionId: question.id,
      position: session.currentIndex + 1,
      total: session.questions.length,
      prompt: question.question,
      ...(session.deadline === null
        ? {}
        : { secondsLeft: Math.max(0, Math.floor((session.deadline - Date.now()) / 1000)) }),
    };
  }

  private isExpired(session: SessionState): boolean {
    return session.deadline !== null && Date.now() >= session.deadline;
  }

  /**
   * Terminal transition. The session leaves the store before anything is
   * written, so at most one finish is ever persisted for it.
   */
  private async finish(session: SessionState, expired: boolean): Promise<SessionFinished> {
    if (this.sessions.get(session.userId) === session) {
      this.sessions.delete(session.userId);
    }
    session.pending = null;

    const total = session.questions.length;
    this.logger.log(
      `Session ${session.sessionId} finished: ${session.score}/${total}${expired ? ' (deadline passed)' : ''}`,
    );
    await this.persistence.finishSession(session.sessionId, session.score, session.details);
    await this.persistence.addPoints(session.userId, session.score, session.topic);

    return { kind: 'finished', score: session.score, total, expired };
  }
}
