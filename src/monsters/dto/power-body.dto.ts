import { z } from 'zod';
import { SUM_MODES } from '../../config/codec-config.service.js';
import { Uint256StringSchema } from './uint256-string.dto.js';

// Batch size cap is runtime configuration, checked by the service.
export const PowerBodySchema = z.object({
  packed: z.array(Uint256StringSchema),
  sumMode: z.enum(SUM_MODES).optional(),
});

export type PowerBody = z.infer<typeof PowerBodySchema>;
