import { Module } from '@nestjs/common';

import { PersistenceModule } from '../persistence/persistence.module';
import { QuestionBankService } from './question-bank.service';
import { QuestionSelectorService } from './question-selector.service';
import { SessionEngineService } from './session-engine.service';
import { SessionStore } from './session';
import { RANDOM_SOURCE } from './shuffle';

@Module({
  imports: [PersistenceModule],
  providers: [
    QuestionBankService,
    QuestionSelectorService,
    SessionStore,
    SessionEngineService,
    { provide: RANDOM_SOURCE, useValue: Math.random },
  ],
  exports: [QuestionBankService, SessionEngineService],
})
export class QuizModule {}
