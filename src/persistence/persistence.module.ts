import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';

import { AppConfig } from '../config/app.config';
import { InMemoryQuizStore } from './in-memory-quiz.store';
import { QUIZ_PERSISTENCE } from './quiz-persistence';

@Module({
  providers: [
    {
      provide: QUIZ_PERSISTENCE,
      useFactory: (config: ConfigService<AppConfig, true>) =>
        new InMemoryQuizStore(config.get('APPROVED_USER_IDS', { infer: true })),
      inject: [ConfigService],
    },
  ],
  exports: [QUIZ_PERSISTENCE],
})
export class PersistenceModule {}
