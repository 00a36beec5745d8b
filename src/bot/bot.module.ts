import { Module } from '@nestjs/common';

import { PersistenceModule } from '../persistence/persistence.module';
import { QuizModule } from '../quiz/quiz.module';
import { BotService } from './bot.service';

@Module({
  imports: [QuizModule, PersistenceModule],
  providers: [BotService],
})
export class BotModule {}
