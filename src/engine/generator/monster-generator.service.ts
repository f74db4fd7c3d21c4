// Seed → Monster. Pure in the seed: each attribute is (seed >> shift) % range,
// rarity and primaryType both reading the unshifted seed.

import { Injectable } from '@nestjs/common';
import { DomainViolationError } from '../../common/errors/app-errors.js';
import {
  Rarity,
  elementName,
  rarityName,
  type ElementType,
  type Monster,
  type MonsterDescription,
} from '../types/monster.js';
import { assertUint256, isUint8 } from '../uint256/uint256.js';
import { NAME_PREFIXES, NAME_SUFFIXES } from './name-tables.js';

/** `roll < upTo` (first match wins) over roll = seed % 100 */
export const RARITY_BANDS: readonly { rarity: Rarity; upTo: number }[] = [
  { rarity: Rarity.Common, upTo: 50 },
  { rarity: Rarity.Uncommon, upTo: 75 },
  { rarity: Rarity.Rare, upTo: 90 },
  { rarity: Rarity.Epic, upTo: 98 },
  { rarity: Rarity.Legendary, upTo: 100 },
];

export const RARITY_ROLL_RANGE = 100;
export const STAT_BONUS_PER_RARITY = 20;
export const STAT_OFFSET_RANGE = 100n;

type StatKey = 'hp' | 'attack' | 'defense' | 'speed';

export const STAT_LAYOUT: Readonly<Record<StatKey, { base: number; shift: bigint }>> = {
  hp: { base: 30, shift: 16n },
  attack: { base: 10, shift: 24n },
  defense: { base: 10, shift: 32n },
  speed: { base: 10, shift: 40n },
};

const TYPE_COUNT = 8n;
const PRIMARY_TYPE_SHIFT = 0n;
const SECONDARY_TYPE_SHIFT = 8n;
const PREFIX_SHIFT = 48n;
const SUFFIX_SHIFT = 56n;

@Injectable()
export class MonsterGeneratorService {
  generate(seed: bigint): Monster {
    assertUint256(seed, 'seed');

    const rarity = this.rollRarity(
      Number(seed % BigInt(RARITY_ROLL_RANGE)),
    );
    const statBonus = rarity * STAT_BONUS_PER_RARITY;

    return {
      name: this.buildName(seed),
      primaryType: this.typeAt(seed, PRIMARY_TYPE_SHIFT),
      secondaryType: this.typeAt(seed, SECONDARY_TYPE_SHIFT),
      hp: this.statAt(seed, 'hp', statBonus),
      attack: this.statAt(seed, 'attack', statBonus),
      defense: this.statAt(seed, 'defense', statBonus),
      speed: this.statAt(seed, 'speed', statBonus),
      rarity,
      seed,
    };
  }

  /** 0~99 → rarity by the 50/25/15/8/2 weighted table */
  rollRarity(roll: number): Rarity {
    if (!Number.isInteger(roll) || roll < 0 || roll >= RARITY_ROLL_RANGE) {
      throw new DomainViolationError(
        `Rarity roll must be an integer in [0, ${RARITY_ROLL_RANGE})`,
        { roll },
      );
    }
    for (const band of RARITY_BANDS) {
      if (roll < band.upTo) return band.rarity;
    }
    return Rarity.Legendary;
  }

  describe(monster: Monster): MonsterDescription {
    return {
      name: monster.name,
      primaryType: elementName(monster.primaryType),
      secondaryType: elementName(monster.secondaryType),
      rarity: rarityName(monster.rarity),
    };
  }

  private typeAt(seed: bigint, shift: bigint): ElementType {
    // % 8 keeps the result inside 0~7, every value an ElementType member
    return Number((seed >> shift) % TYPE_COUNT);
  }

  private statAt(seed: bigint, stat: StatKey, statBonus: number): number {
    const { base, shift } = STAT_LAYOUT[stat];
    const value = base + Number((seed >> shift) % STAT_OFFSET_RANGE) + statBonus;
    // max reachable is 30 + 99 + 80 = 209; the check keeps that true if constants move
    if (!isUint8(value)) {
      throw new DomainViolationError(`${stat} does not fit in 8 bits`, {
        stat,
        value,
      });
    }
    return value;
  }

  private buildName(seed: bigint): string {
    const prefix = NAME_PREFIXES[Number((seed >> PREFIX_SHIFT) % 8n)];
    const suffix = NAME_SUFFIXES[Number((seed >> SUFFIX_SHIFT) % 8n)];
    return `${prefix}${suffix}`;
  }
}
