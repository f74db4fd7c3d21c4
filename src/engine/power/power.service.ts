// power = (hp + attack + defense + speed) * (rarity + 1), from a Monster or its packed word

import { Injectable } from '@nestjs/common';
import { DomainViolationError } from '../../common/errors/app-errors.js';
import {
  CodecConfigService,
  type SumMode,
} from '../../config/codec-config.service.js';
import { TraitCodecService } from '../codec/trait-codec.service.js';
import type { EncodableMonster, PackedTraits } from '../types/monster.js';
import {
  assertUint256,
  checkedAdd,
  isUint8,
  wrappingAdd,
} from '../uint256/uint256.js';

type PowerInputs = Pick<
  PackedTraits,
  'hp' | 'attack' | 'defense' | 'speed' | 'rarity'
>;

const POWER_FIELDS: readonly (keyof PowerInputs)[] = [
  'hp',
  'attack',
  'defense',
  'speed',
  'rarity',
];

@Injectable()
export class PowerService {
  constructor(
    private readonly codec: TraitCodecService,
    private readonly config: CodecConfigService,
  ) {}

  power(monster: EncodableMonster): bigint {
    for (const field of POWER_FIELDS) {
      if (!isUint8(monster[field])) {
        throw new DomainViolationError(`${field} must be an 8-bit value`, {
          field,
          value: monster[field],
        });
      }
    }
    return this.powerOf(monster);
  }

  powerFromPacked(packed: bigint): bigint {
    return this.powerOf(this.codec.decode(packed));
  }

  /** Same length and order as the input. */
  batchPowerFromPacked(words: readonly bigint[]): bigint[] {
    return words.map((word) => this.powerFromPacked(word));
  }

  /** Reverts past 2^256 - 1. */
  sum(values: readonly bigint[]): bigint {
    return this.accumulate(values, checkedAdd);
  }

  /** Modulo 2^256, no overflow check. */
  sumWrapping(values: readonly bigint[]): bigint {
    return this.accumulate(values, wrappingAdd);
  }

  sumWithMode(values: readonly bigint[], mode?: SumMode): bigint {
    const effective = mode ?? this.config.get().sumMode;
    return effective === 'wrapping'
      ? this.sumWrapping(values)
      : this.sum(values);
  }

  private powerOf(traits: PowerInputs): bigint {
    const statTotal =
      BigInt(traits.hp) +
      BigInt(traits.attack) +
      BigInt(traits.defense) +
      BigInt(traits.speed);
    return statTotal * (BigInt(traits.rarity) + 1n);
  }

  private accumulate(
    values: readonly bigint[],
    add: (a: bigint, b: bigint) => bigint,
  ): bigint {
    let total = 0n;
    values.forEach((value, index) => {
      assertUint256(value, `values[${index}]`);
      total = add(total, value);
    });
    return total;
  }
}
