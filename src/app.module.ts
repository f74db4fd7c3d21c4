import { Module } from '@nestjs/common';
import { APP_FILTER } from '@nestjs/core';
import { AppController } from './app.controller.js';
import { AppExceptionFilter } from './common/filters/app-exception.filter.js';
import { ConfigModule } from './config/config.module.js';
import { DrizzleModule } from './db/drizzle.module.js';
import { EngineModule } from './engine/engine.module.js';
import { MonstersModule } from './monsters/monsters.module.js';

@Module({
  imports: [ConfigModule, DrizzleModule, EngineModule, MonstersModule],
  controllers: [AppController],
  providers: [
    {
      provide: APP_FILTER,
      useClass: AppExceptionFilter,
    },
  ],
})
export class AppModule {}
