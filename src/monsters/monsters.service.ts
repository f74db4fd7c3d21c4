// Stateless codec operations behind /v1/monsters

import { Injectable } from '@nestjs/common';
import { InvalidInputError } from '../common/errors/app-errors.js';
import {
  CodecConfigService,
  type EncodePolicy,
  type SumMode,
} from '../config/codec-config.service.js';
import { TraitCodecService } from '../engine/codec/trait-codec.service.js';
import { MonsterGeneratorService } from '../engine/generator/monster-generator.service.js';
import { PowerService } from '../engine/power/power.service.js';
import type { EncodableMonster } from '../engine/types/monster.js';
import { formatUint256, parseUint256 } from '../engine/uint256/uint256.js';
import {
  toMonsterView,
  toTraitsView,
  type MonsterView,
  type TraitsView,
} from './monster.views.js';

export interface EncodeResult {
  packed: string;
  power: string;
}

export interface PowerResult {
  powers: string[];
  total: string;
  sumMode: SumMode;
}

@Injectable()
export class MonstersService {
  constructor(
    private readonly generator: MonsterGeneratorService,
    private readonly codec: TraitCodecService,
    private readonly power: PowerService,
    private readonly config: CodecConfigService,
  ) {}

  preview(seed: bigint): { monster: MonsterView; packed: string; power: string } {
    const monster = this.generator.generate(seed);
    const packed = this.codec.encode(monster);
    return {
      monster: toMonsterView(monster),
      packed: this.codec.toHex(packed),
      power: this.power.power(monster).toString(),
    };
  }

  encode(monster: EncodableMonster, policy?: EncodePolicy): EncodeResult {
    const packed = this.codec.encode(monster, policy);
    return {
      packed: this.codec.toHex(packed),
      power: this.power.powerFromPacked(packed).toString(),
    };
  }

  decode(packedText: string, validate: boolean): TraitsView & { packed: string } {
    const packed = parseUint256(packedText, 'packed');
    const traits = validate
      ? this.codec.decodeValidated(packed)
      : this.codec.decode(packed);
    return { ...toTraitsView(traits), packed: formatUint256(packed) };
  }

  powerOf(words: readonly bigint[], mode?: SumMode): PowerResult {
    const { maxBatchSize } = this.config.get();
    if (words.length > maxBatchSize) {
      throw new InvalidInputError(
        `At most ${maxBatchSize} packed words per request`,
        { received: words.length, maxBatchSize },
      );
    }
    const effective = mode ?? this.config.get().sumMode;
    const powers = this.power.batchPowerFromPacked(words);
    return {
      powers: powers.map((p) => p.toString()),
      total: this.power.sumWithMode(powers, effective).toString(),
      sumMode: effective,
    };
  }
}
