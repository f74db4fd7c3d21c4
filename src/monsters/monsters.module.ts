import { Module } from '@nestjs/common';
import { EngineModule } from '../engine/engine.module.js';
import {
  DrizzleMonsterRecordStore,
  MONSTER_RECORD_STORE,
} from './monster-record.store.js';
import { MonsterRecordsService } from './monster-records.service.js';
import { MonstersController } from './monsters.controller.js';
import { MonstersService } from './monsters.service.js';

@Module({
  imports: [EngineModule],
  controllers: [MonstersController],
  providers: [
    MonstersService,
    MonsterRecordsService,
    { provide: MONSTER_RECORD_STORE, useClass: DrizzleMonsterRecordStore },
  ],
  exports: [MonstersService, MonsterRecordsService],
})
export class MonstersModule {}
