import { createHash } from 'crypto';
import { DomainViolationError } from '../../common/errors/app-errors.js';
import { ElementType, Rarity } from '../types/monster.js';
import { U256_MAX } from '../uint256/uint256.js';
import { MonsterGeneratorService } from './monster-generator.service.js';

function hashSeed(label: string): bigint {
  return BigInt(`0x${createHash('sha256').update(label).digest('hex')}`);
}

function expectedRarity(roll: number): Rarity {
  if (roll < 50) return Rarity.Common;
  if (roll < 75) return Rarity.Uncommon;
  if (roll < 90) return Rarity.Rare;
  if (roll < 98) return Rarity.Epic;
  return Rarity.Legendary;
}

describe('MonsterGeneratorService', () => {
  let service: MonsterGeneratorService;

  beforeEach(() => {
    service = new MonsterGeneratorService();
  });

  describe('rollRarity: weighted table', () => {
    it('all 100 residues map to the 50/25/15/8/2 bands', () => {
      for (let roll = 0; roll < 100; roll++) {
        expect(service.rollRarity(roll)).toBe(expectedRarity(roll));
      }
    });

    it('band edges', () => {
      expect(service.rollRarity(49)).toBe(Rarity.Common);
      expect(service.rollRarity(50)).toBe(Rarity.Uncommon);
      expect(service.rollRarity(74)).toBe(Rarity.Uncommon);
      expect(service.rollRarity(75)).toBe(Rarity.Rare);
      expect(service.rollRarity(89)).toBe(Rarity.Rare);
      expect(service.rollRarity(90)).toBe(Rarity.Epic);
      expect(service.rollRarity(97)).toBe(Rarity.Epic);
      expect(service.rollRarity(98)).toBe(Rarity.Legendary);
      expect(service.rollRarity(99)).toBe(Rarity.Legendary);
    });

    it('a roll outside 0~99 is rejected', () => {
      expect(() => service.rollRarity(100)).toThrow(DomainViolationError);
      expect(() => service.rollRarity(-1)).toThrow(DomainViolationError);
      expect(() => service.rollRarity(1.5)).toThrow(DomainViolationError);
    });
  });

  describe('generate: fixed seeds', () => {
    it('seed 0 → all minimums, Flamemon', () => {
      expect(service.generate(0n)).toEqual({
        name: 'Flamemon',
        primaryType: ElementType.Fire,
        secondaryType: ElementType.Fire,
        hp: 30,
        attack: 10,
        defense: 10,
        speed: 10,
        rarity: Rarity.Common,
        seed: 0n,
      });
    });

    it('seed 99 → Legendary, +80 on every stat', () => {
      const m = service.generate(99n);
      expect(m.rarity).toBe(Rarity.Legendary);
      expect(m.primaryType).toBe(ElementType.Electric); // 99 % 8
      expect(m.secondaryType).toBe(ElementType.Fire);
      expect(m.hp).toBe(110);
      expect(m.attack).toBe(90);
      expect(m.defense).toBe(90);
      expect(m.speed).toBe(90);
    });

    it('name reads bits 48+ and 56+', () => {
      // (seed >> 48) % 8 = 5 → Shadow, (seed >> 56) % 8 = 2 → zard
      const seed = (5n << 48n) | (2n << 56n);
      const m = service.generate(seed);
      expect(m.name).toBe('Shadowzard');
      expect(m.rarity).toBe(Rarity.Uncommon);
      expect(m.hp).toBe(82);
      expect(m.attack).toBe(102);
      expect(m.defense).toBe(42);
      expect(m.speed).toBe(82);
    });

    it('seed is kept verbatim', () => {
      const seed = hashSeed('verbatim');
      expect(service.generate(seed).seed).toBe(seed);
    });

    it('seed outside 256 bits is rejected', () => {
      expect(() => service.generate(-1n)).toThrow(DomainViolationError);
      expect(() => service.generate(U256_MAX + 1n)).toThrow(
        DomainViolationError,
      );
    });

    it('max seed still generates', () => {
      const m = service.generate(U256_MAX);
      expect(m.primaryType).toBe(ElementType.Normal);
      expect(m.name).toBe('Wildfang');
    });
  });

  describe('generate: properties', () => {
    it('same seed → same monster', () => {
      for (let i = 0; i < 50; i++) {
        const seed = hashSeed(`det-${i}`);
        expect(service.generate(seed)).toEqual(service.generate(seed));
      }
    });

    it('types are always 0~7', () => {
      for (let i = 0; i < 2000; i++) {
        const m = service.generate(hashSeed(`type-${i}`));
        expect(m.primaryType).toBeGreaterThanOrEqual(0);
        expect(m.primaryType).toBeLessThanOrEqual(7);
        expect(m.secondaryType).toBeGreaterThanOrEqual(0);
        expect(m.secondaryType).toBeLessThanOrEqual(7);
      }
    });

    it('stats fit in 8 bits for every rarity', () => {
      const rolls = [0, 49, 50, 74, 75, 89, 90, 97, 98, 99];
      let highest = 0;
      for (let i = 0; i < 300; i++) {
        const base = hashSeed(`bound-${i}`);
        for (const roll of rolls) {
          const seed = base - (base % 100n) + BigInt(roll);
          const m = service.generate(seed);
          expect(m.rarity).toBe(expectedRarity(roll));

          const bonus = m.rarity * 20;
          for (const [stat, min] of [
            [m.hp, 30],
            [m.attack, 10],
            [m.defense, 10],
            [m.speed, 10],
          ] as const) {
            expect(stat).toBeGreaterThanOrEqual(min + bonus);
            expect(stat).toBeLessThanOrEqual(min + 99 + bonus);
            expect(stat).toBeLessThanOrEqual(255);
            highest = Math.max(highest, stat);
          }
        }
      }
      expect(highest).toBeLessThanOrEqual(209);
    });
  });

  describe('generate: rarity histogram', () => {
    it('10000 consecutive counters hit every residue 100 times', () => {
      const counts = [0, 0, 0, 0, 0];
      const base = 0xc0ffeen << 16n;
      for (let counter = 0; counter < 10000; counter++) {
        counts[service.generate(base | BigInt(counter)).rarity]++;
      }
      expect(counts).toEqual([5000, 2500, 1500, 800, 200]);
    });

    it('hashed counters approximate the weights', () => {
      const N = 5000;
      const counts = [0, 0, 0, 0, 0];
      for (let i = 0; i < N; i++) {
        counts[service.generate(hashSeed(`counter-${i}`)).rarity]++;
      }
      const weights = [0.5, 0.25, 0.15, 0.08, 0.02];
      weights.forEach((weight, rarity) => {
        expect(Math.abs(counts[rarity] / N - weight)).toBeLessThan(0.02);
      });
    });
  });

  describe('describe', () => {
    it('names the element and rarity', () => {
      expect(service.describe(service.generate(99n))).toEqual({
        name: 'Flamemon',
        primaryType: 'Electric',
        secondaryType: 'Fire',
        rarity: 'Legendary',
      });
    });
  });
});
