import { Inject, Injectable } from '@nestjs/common';

import { QuestionBankService } from './question-bank.service';
import { QuestionRecord } from './question.types';
import { RANDOM_SOURCE, RandomSource, shuffle } from './shuffle';

@Injectable()
export class QuestionSelectorService {
  constructor(
    private readonly bank: QuestionBankService,
    @Inject(RANDOM_SOURCE) private readonly random: RandomSource,
  ) {}

  /**
   * Up to `n` distinct questions of `topic` in random order. A smaller pool
   * yields fewer questions rather than an error.
   *
   * Options of single/multi questions are shuffled on a copy; bank records
   * are never mutated.
   */
  select(topic: string, n: number): QuestionRecord[] {
    const pool = this.bank.load(topic);
    const count = Math.max(0, Math.min(Math.floor(n), pool.length));

    return shuffle(pool, this.random)
      .slice(0, count)
      .map((question) => this.withShuffledOptions(question));
  }

  private withShuffledOptions(question: QuestionRecord): QuestionRecord {
    switch (question.type) {
      case 'single':
      case 'multi':
        return { ...question, options: shuffle(question.options, this.random) };
      case 'match':
        // right-hand column is shuffled per render, see SessionEngineService
        return question;
    }
  }
}
