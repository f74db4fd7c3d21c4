import {
  ArithmeticOverflowError,
  DomainViolationError,
} from '../../common/errors/app-errors.js';
import {
  U256_MAX,
  assertUint256,
  checkedAdd,
  formatUint256,
  fromWordBytes,
  isUint8,
  parseHexUint256,
  parseUint256,
  toWordBytes,
  wrappingAdd,
} from './uint256.js';

describe('uint256: parse / format', () => {
  it('0 → 0x + 64 zeros', () => {
    expect(formatUint256(0n)).toBe(`0x${'0'.repeat(64)}`);
  });

  it('pads to one full word, lower-case', () => {
    const text = formatUint256(0xabcn);
    expect(text).toHaveLength(66);
    expect(text.endsWith('0abc')).toBe(true);
  });

  it('hex and decimal both parse', () => {
    expect(parseUint256('0x10')).toBe(16n);
    expect(parseUint256('0xFF')).toBe(255n);
    expect(parseUint256('255')).toBe(255n);
    expect(parseUint256(' 42 ')).toBe(42n);
  });

  it('64 f digits is the maximum', () => {
    expect(parseUint256(`0x${'f'.repeat(64)}`)).toBe(U256_MAX);
  });

  it('rejects a value past 2^256 - 1', () => {
    expect(() => parseUint256((U256_MAX + 1n).toString())).toThrow(
      DomainViolationError,
    );
  });

  it('rejects malformed text', () => {
    expect(() => parseUint256('abc')).toThrow(DomainViolationError);
    expect(() => parseUint256('-1')).toThrow(DomainViolationError);
    expect(() => parseUint256('0x')).toThrow(DomainViolationError);
    expect(() => parseUint256(`0x${'1'.repeat(65)}`)).toThrow(
      DomainViolationError,
    );
  });

  it('hex-only parse refuses decimal text', () => {
    expect(parseHexUint256('0x10')).toBe(16n);
    expect(() => parseHexUint256('16', 'packed')).toThrow(
      'packed must be 0x-prefixed hex',
    );
  });

  it('format → parse returns the same value', () => {
    const value = 0x123456789abcdef0n;
    expect(parseUint256(formatUint256(value))).toBe(value);
  });
});

describe('uint256: word bytes', () => {
  it('big-endian: low byte last', () => {
    const bytes = toWordBytes(0x0102n);
    expect(bytes).toHaveLength(32);
    expect(bytes[30]).toBe(1);
    expect(bytes[31]).toBe(2);
    expect(bytes.slice(0, 30).every((b) => b === 0)).toBe(true);
  });

  it('max value is 32 × 0xff', () => {
    const bytes = toWordBytes(U256_MAX);
    expect(bytes.every((b) => b === 0xff)).toBe(true);
    expect(fromWordBytes(bytes)).toBe(U256_MAX);
  });

  it('only 32-byte input is a word', () => {
    expect(() => fromWordBytes(new Uint8Array(31))).toThrow(
      DomainViolationError,
    );
    expect(() => fromWordBytes(new Uint8Array(33))).toThrow(
      DomainViolationError,
    );
  });
});

describe('uint256: arithmetic', () => {
  it('checkedAdd overflows past the max', () => {
    expect(checkedAdd(U256_MAX - 1n, 1n)).toBe(U256_MAX);
    expect(() => checkedAdd(U256_MAX, 1n)).toThrow(ArithmeticOverflowError);
  });

  it('wrappingAdd wraps modulo 2^256', () => {
    expect(wrappingAdd(U256_MAX, 1n)).toBe(0n);
    expect(wrappingAdd(U256_MAX, 5n)).toBe(4n);
    expect(wrappingAdd(2n, 3n)).toBe(5n);
  });

  it('assertUint256 rejects negatives', () => {
    expect(() => assertUint256(-1n, 'seed')).toThrow(DomainViolationError);
    expect(assertUint256(7n, 'seed')).toBe(7n);
  });

  it('isUint8', () => {
    expect(isUint8(0)).toBe(true);
    expect(isUint8(255)).toBe(true);
    expect(isUint8(256)).toBe(false);
    expect(isUint8(-1)).toBe(false);
    expect(isUint8(1.5)).toBe(false);
  });
});
