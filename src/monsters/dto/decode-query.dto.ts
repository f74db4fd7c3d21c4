import { z } from 'zod';

export const DecodeQuerySchema = z.object({
  validate: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export type DecodeQuery = z.infer<typeof DecodeQuerySchema>;
