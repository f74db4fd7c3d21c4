import { pgTable, serial, text, timestamp } from 'drizzle-orm/pg-core';

export const monsterRecords = pgTable('monster_records', {
  id: serial('id').primaryKey(),
  name: text('name').notNull(),
  // seed/packed: 0x + 64 hex digits (formatUint256)
  seed: text('seed').notNull().unique(),
  packed: text('packed').notNull(),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});

export type MonsterRecordRow = typeof monsterRecords.$inferSelect;
export type NewMonsterRecord = typeof monsterRecords.$inferInsert;
