import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { BotModule } from './bot/bot.module';
import { validateConfig } from './config/app.config';
import { HealthController } from './health.controller';

@Module({
  imports: [ConfigModule.forRoot({ isGlobal: true, validate: validateConfig }), BotModule],
  controllers: [HealthController],
})
export class AppModule {}
