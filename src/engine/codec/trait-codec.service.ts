// Monster ⇄ 256-bit packed word.
//
// bit  0- 7  primaryType      bit 32-39  defense
// bit  8-15  secondaryType    bit 40-47  speed
// bit 16-23  hp               bit 48-55  rarity
// bit 24-31  attack           bit 56-87  seed & 0xFFFFFFFF
// bit 88-255 zero on encode, ignored on decode
//
// Lossy: name and the upper 224 bits of the seed are dropped.

import { Injectable, Logger } from '@nestjs/common';
import { DomainViolationError } from '../../common/errors/app-errors.js';
import {
  CodecConfigService,
  type EncodePolicy,
} from '../../config/codec-config.service.js';
import {
  isElementType,
  isRarity,
  type EncodableMonster,
  type MonsterTraits,
  type PackedTraits,
} from '../types/monster.js';
import {
  MASK_32,
  MASK_8,
  assertUint256,
  formatUint256,
  fromWordBytes,
  isUint8,
  parseHexUint256,
  toWordBytes,
} from '../uint256/uint256.js';

export type ByteField = Exclude<keyof PackedTraits, 'seedLow32'>;

export const BYTE_FIELD_OFFSETS: Readonly<Record<ByteField, bigint>> = {
  primaryType: 0n,
  secondaryType: 8n,
  hp: 16n,
  attack: 24n,
  defense: 32n,
  speed: 40n,
  rarity: 48n,
};

export const SEED_LOW_OFFSET = 56n;
/** First bit past the layout; everything from here up is zero. */
export const USED_BITS = 88n;

const BYTE_FIELDS: readonly ByteField[] = [
  'primaryType',
  'secondaryType',
  'hp',
  'attack',
  'defense',
  'speed',
  'rarity',
];

@Injectable()
export class TraitCodecService {
  private readonly logger = new Logger(TraitCodecService.name);

  constructor(private readonly config: CodecConfigService) {}

  /** Without an explicit policy the configured one applies. */
  encode(monster: EncodableMonster, policy?: EncodePolicy): bigint {
    const effective = policy ?? this.config.get().encodePolicy;
    assertUint256(monster.seed, 'seed');

    let packed = 0n;
    for (const field of BYTE_FIELDS) {
      const value = this.byteFor(monster, field, effective);
      packed |= BigInt(value) << BYTE_FIELD_OFFSETS[field];
    }
    packed |= (monster.seed & MASK_32) << SEED_LOW_OFFSET;
    return packed;
  }

  /** Never fails for a 256-bit word; enumerated fields come back unchecked. */
  decode(packed: bigint): PackedTraits {
    assertUint256(packed, 'packed');
    const byteAt = (field: ByteField): number =>
      Number((packed >> BYTE_FIELD_OFFSETS[field]) & MASK_8);

    return {
      primaryType: byteAt('primaryType'),
      secondaryType: byteAt('secondaryType'),
      hp: byteAt('hp'),
      attack: byteAt('attack'),
      defense: byteAt('defense'),
      speed: byteAt('speed'),
      rarity: byteAt('rarity'),
      seedLow32: Number((packed >> SEED_LOW_OFFSET) & MASK_32),
    };
  }

  /** decode + domain check, for words read from untrusted storage */
  decodeValidated(packed: bigint): MonsterTraits {
    const traits = this.decode(packed);
    if (!this.isValidTraits(traits)) {
      throw new DomainViolationError('Packed word holds out-of-range traits', {
        packed: formatUint256(packed),
        primaryType: traits.primaryType,
        secondaryType: traits.secondaryType,
        rarity: traits.rarity,
      });
    }
    return traits;
  }

  isValidTraits(traits: PackedTraits): traits is MonsterTraits {
    return (
      isElementType(traits.primaryType) &&
      isElementType(traits.secondaryType) &&
      isRarity(traits.rarity)
    );
  }

  toBytes(packed: bigint): Uint8Array {
    return toWordBytes(packed);
  }

  fromBytes(bytes: Uint8Array): bigint {
    return fromWordBytes(bytes);
  }

  toHex(packed: bigint): string {
    return formatUint256(packed);
  }

  fromHex(text: string): bigint {
    return parseHexUint256(text, 'packed');
  }

  private byteFor(
    monster: EncodableMonster,
    field: ByteField,
    policy: EncodePolicy,
  ): number {
    const value = monster[field];
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new DomainViolationError(
        `${field} must be a non-negative integer`,
        { field, value },
      );
    }

    if (policy === 'truncate') {
      const masked = Number(BigInt(value) & MASK_8);
      if (masked !== value) {
        this.logger.warn(`${field}=${value} truncated to ${masked}`);
      }
      return masked;
    }

    if (!isUint8(value) || !this.inDomain(field, value)) {
      throw new DomainViolationError(`${field}=${value} is out of range`, {
        field,
        value,
      });
    }
    return value;
  }

  private inDomain(field: ByteField, value: number): boolean {
    switch (field) {
      case 'primaryType':
      case 'secondaryType':
        return isElementType(value);
      case 'rarity':
        return isRarity(value);
      default:
        return true;
    }
  }
}
