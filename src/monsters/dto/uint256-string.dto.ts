import { z } from 'zod';
import { isUint256 } from '../../engine/uint256/uint256.js';

const UINT256_TEXT = /^(0x[0-9a-fA-F]{1,64}|[0-9]{1,78})$/;

/** 0x-hex or decimal string → bigint in [0, 2^256 - 1] */
export const Uint256StringSchema = z.string().transform((value, ctx) => {
  const trimmed = value.trim();
  if (!UINT256_TEXT.test(trimmed)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'must be 0x-prefixed hex or a decimal integer',
    });
    return z.NEVER;
  }
  const parsed = BigInt(trimmed);
  if (!isUint256(parsed)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: 'must not exceed 2^256 - 1',
    });
    return z.NEVER;
  }
  return parsed;
});
