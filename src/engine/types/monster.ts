export enum ElementType {
  Fire = 0,
  Water = 1,
  Grass = 2,
  Electric = 3,
  Psychic = 4,
  Dark = 5,
  Dragon = 6,
  Normal = 7,
}

export enum Rarity {
  Common = 0,
  Uncommon = 1,
  Rare = 2,
  Epic = 3,
  Legendary = 4,
}

export const ELEMENT_TYPE_COUNT = 8;
export const RARITY_COUNT = 5;

export const ELEMENT_NAMES = [
  'Fire',
  'Water',
  'Grass',
  'Electric',
  'Psychic',
  'Dark',
  'Dragon',
  'Normal',
] as const;

export const RARITY_NAMES = [
  'Common',
  'Uncommon',
  'Rare',
  'Epic',
  'Legendary',
] as const;

export type ElementName = (typeof ELEMENT_NAMES)[number];
export type RarityName = (typeof RARITY_NAMES)[number];

/** Generator output. Immutable once created. */
export interface Monster {
  readonly name: string;
  readonly primaryType: ElementType;
  readonly secondaryType: ElementType;
  readonly hp: number;
  readonly attack: number;
  readonly defense: number;
  readonly speed: number;
  readonly rarity: Rarity;
  readonly seed: bigint;
}

/**
 * Codec and power input. Enumerated fields are plain numbers: the encode
 * policy, not the type, decides what happens to an out-of-range value.
 * `name` never reaches the word.
 */
export type EncodableMonster = Omit<
  Monster,
  'name' | 'primaryType' | 'secondaryType' | 'rarity'
> & {
  readonly name?: string;
  readonly primaryType: number;
  readonly secondaryType: number;
  readonly rarity: number;
};

/**
 * Raw fields read back from a packed word. Enumerated fields are plain
 * bytes here: 8..255 can come out of a word nobody validated.
 */
export interface PackedTraits {
  primaryType: number;
  secondaryType: number;
  hp: number;
  attack: number;
  defense: number;
  speed: number;
  rarity: number;
  seedLow32: number;
}

/** PackedTraits whose enumerated fields were checked against their domains. */
export interface MonsterTraits extends PackedTraits {
  primaryType: ElementType;
  secondaryType: ElementType;
  rarity: Rarity;
}

export interface MonsterDescription {
  name: string;
  primaryType: ElementName;
  secondaryType: ElementName;
  rarity: RarityName;
}

export function isElementType(value: number): value is ElementType {
  return Number.isInteger(value) && value >= 0 && value < ELEMENT_TYPE_COUNT;
}

export function isRarity(value: number): value is Rarity {
  return Number.isInteger(value) && value >= 0 && value < RARITY_COUNT;
}

export function elementName(type: ElementType): ElementName {
  return ELEMENT_NAMES[type];
}

export function rarityName(rarity: Rarity): RarityName {
  return RARITY_NAMES[rarity];
}
