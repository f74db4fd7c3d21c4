// JSON shapes for the HTTP surface; 256-bit values leave as 0x-hex strings

import {
  ELEMENT_NAMES,
  RARITY_NAMES,
  isElementType,
  isRarity,
  type ElementName,
  type Monster,
  type PackedTraits,
  type RarityName,
} from '../engine/types/monster.js';
import { formatUint256 } from '../engine/uint256/uint256.js';

export interface MonsterView {
  name: string;
  primaryType: number;
  primaryTypeName: ElementName;
  secondaryType: number;
  secondaryTypeName: ElementName;
  hp: number;
  attack: number;
  defense: number;
  speed: number;
  rarity: number;
  rarityName: RarityName;
  seed: string;
}

/** Names are null where a raw byte falls outside its enumeration. */
export interface TraitsView extends PackedTraits {
  primaryTypeName: ElementName | null;
  secondaryTypeName: ElementName | null;
  rarityName: RarityName | null;
  valid: boolean;
}

export interface MonsterRecordView {
  id: number;
  name: string;
  seed: string;
  packed: string;
  traits: TraitsView;
  power: string;
  createdAt: string;
}

export function toMonsterView(monster: Monster): MonsterView {
  return {
    name: monster.name,
    primaryType: monster.primaryType,
    primaryTypeName: ELEMENT_NAMES[monster.primaryType],
    secondaryType: monster.secondaryType,
    secondaryTypeName: ELEMENT_NAMES[monster.secondaryType],
    hp: monster.hp,
    attack: monster.attack,
    defense: monster.defense,
    speed: monster.speed,
    rarity: monster.rarity,
    rarityName: RARITY_NAMES[monster.rarity],
    seed: formatUint256(monster.seed),
  };
}

export function toTraitsView(traits: PackedTraits): TraitsView {
  const primaryTypeName = isElementType(traits.primaryType)
    ? ELEMENT_NAMES[traits.primaryType]
    : null;
  const secondaryTypeName = isElementType(traits.secondaryType)
    ? ELEMENT_NAMES[traits.secondaryType]
    : null;
  const rarityName = isRarity(traits.rarity) ? RARITY_NAMES[traits.rarity] : null;

  return {
    ...traits,
    primaryTypeName,
    secondaryTypeName,
    rarityName,
    valid:
      primaryTypeName !== null &&
      secondaryTypeName !== null &&
      rarityName !== null,
  };
}
