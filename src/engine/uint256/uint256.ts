// 256-bit unsigned word helpers on bigint

import {
  ArithmeticOverflowError,
  DomainViolationError,
} from '../../common/errors/app-errors.js';

export const WORD_BITS = 256n;
export const WORD_BYTES = 32;
export const U256_MAX = (1n << WORD_BITS) - 1n;
export const MASK_8 = 0xFFn;
export const MASK_32 = 0xFFFFFFFFn;

const HEX_PATTERN = /^0x[0-9a-fA-F]{1,64}$/;
const DECIMAL_PATTERN = /^[0-9]{1,78}$/;

export function isUint256(value: bigint): boolean {
  return value >= 0n && value <= U256_MAX;
}

export function assertUint256(value: bigint, field: string): bigint {
  if (!isUint256(value)) {
    throw new DomainViolationError(`${field} is not a 256-bit unsigned value`, {
      field,
      value: value.toString(),
    });
  }
  return value;
}

/** `0x` hex (up to 64 digits) or a decimal string → bigint */
export function parseUint256(text: string, field = 'value'): bigint {
  const trimmed = text.trim();
  if (!HEX_PATTERN.test(trimmed) && !DECIMAL_PATTERN.test(trimmed)) {
    throw new DomainViolationError(
      `${field} must be 0x-prefixed hex or a decimal integer`,
      { field, value: text },
    );
  }
  return assertUint256(BigInt(trimmed), field);
}

/** Like parseUint256, but decimal text is rejected. */
export function parseHexUint256(text: string, field = 'value'): bigint {
  if (!HEX_PATTERN.test(text.trim())) {
    throw new DomainViolationError(`${field} must be 0x-prefixed hex`, {
      field,
      value: text,
    });
  }
  return parseUint256(text, field);
}

/** Always 0x + 64 lower-case digits, the width of one word. */
export function formatUint256(value: bigint): string {
  assertUint256(value, 'value');
  return `0x${value.toString(16).padStart(WORD_BYTES * 2, '0')}`;
}

/** Big-endian, most significant byte first. */
export function toWordBytes(value: bigint): Uint8Array {
  assertUint256(value, 'value');
  const bytes = new Uint8Array(WORD_BYTES);
  let remaining = value;
  for (let i = WORD_BYTES - 1; i >= 0; i--) {
    bytes[i] = Number(remaining & MASK_8);
    remaining >>= 8n;
  }
  return bytes;
}

export function fromWordBytes(bytes: Uint8Array): bigint {
  if (bytes.length !== WORD_BYTES) {
    throw new DomainViolationError(
      `A word is exactly ${WORD_BYTES} bytes, got ${bytes.length}`,
      { length: bytes.length },
    );
  }
  let value = 0n;
  for (const byte of bytes) {
    value = (value << 8n) | BigInt(byte);
  }
  return value;
}

export function checkedAdd(a: bigint, b: bigint): bigint {
  const result = a + b;
  if (result > U256_MAX) {
    throw new ArithmeticOverflowError('uint256 addition overflowed', {
      a: a.toString(),
      b: b.toString(),
    });
  }
  return result;
}

export function wrappingAdd(a: bigint, b: bigint): bigint {
  return (a + b) & U256_MAX;
}

export function isUint8(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= 0xff;
}
