import { Module } from '@nestjs/common';
import { TraitCodecService } from './codec/trait-codec.service.js';
import { MonsterGeneratorService } from './generator/monster-generator.service.js';
import { PowerService } from './power/power.service.js';

const providers = [
  // seed → Monster
  MonsterGeneratorService,
  // Monster ⇄ packed word
  TraitCodecService,
  // power / sum over either form
  PowerService,
];

@Module({
  providers,
  exports: providers,
})
export class EngineModule {}
