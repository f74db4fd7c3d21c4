import { z } from 'zod';

/** monster_records.id is a serial (int4) column */
export const MAX_RECORD_ID = 2_147_483_647;

export const ListRecordsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(20),
  after: z.coerce.number().int().min(0).max(MAX_RECORD_ID).optional(),
});

export type ListRecordsQuery = z.infer<typeof ListRecordsQuerySchema>;

export const RecordIdSchema = z.coerce.number().int().min(1).max(MAX_RECORD_ID);
