import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';

import { AppController } from './app.controller';
import { BotModule } from './bot/bot.module';
import { CommonModule } from './common/common.module';
import { validateEnv } from './config/env.validation';
import { RedisModule } from './redis/redis.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
    RedisModule,
    CommonModule,
    BotModule,
  ],
  controllers: [AppController],
})
export class AppModule {}
