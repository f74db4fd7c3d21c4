import { z } from 'zod';
import { Uint256StringSchema } from './uint256-string.dto.js';

export const SeedBodySchema = z.object({
  seed: Uint256StringSchema,
});

export type SeedBody = z.infer<typeof SeedBodySchema>;
