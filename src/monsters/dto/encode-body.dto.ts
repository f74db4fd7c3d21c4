import { z } from 'zod';
import { ENCODE_POLICIES } from '../../config/codec-config.service.js';
import { Uint256StringSchema } from './uint256-string.dto.js';

// Upper bounds are the codec's call: strict rejects, truncate masks.
const FieldSchema = z.number().int().min(0).max(Number.MAX_SAFE_INTEGER);

export const EncodeBodySchema = z.object({
  monster: z.object({
    name: z.string().max(64).optional(),
    primaryType: FieldSchema,
    secondaryType: FieldSchema,
    hp: FieldSchema,
    attack: FieldSchema,
    defense: FieldSchema,
    speed: FieldSchema,
    rarity: FieldSchema,
    seed: Uint256StringSchema,
  }),
  policy: z.enum(ENCODE_POLICIES).optional(),
});

export type EncodeBody = z.infer<typeof EncodeBodySchema>;
