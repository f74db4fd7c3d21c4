import { Inject, Injectable } from '@nestjs/common';
import { asc, count, eq, gt } from 'drizzle-orm';
import { DatabaseError } from 'pg';
import { DB, type DrizzleDB } from '../db/drizzle.module.js';
import { ConflictError, InternalError } from '../common/errors/app-errors.js';
import {
  monsterRecords,
  type MonsterRecordRow,
  type NewMonsterRecord,
} from '../db/schema/monster-records.js';

export const MONSTER_RECORD_STORE = Symbol('MONSTER_RECORD_STORE');

// postgres unique_violation
const UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(err: unknown): boolean {
  return err instanceof DatabaseError && err.code === UNIQUE_VIOLATION;
}

/** Persistence seam for minted trait records, keyed by token id. */
export interface MonsterRecordStore {
  /** A seed already stored rejects with ConflictError SEED_ALREADY_MINTED. */
  insert(record: NewMonsterRecord): Promise<MonsterRecordRow>;
  findById(id: number): Promise<MonsterRecordRow | undefined>;
  findBySeed(seed: string): Promise<MonsterRecordRow | undefined>;
  count(): Promise<number>;
  /** id ascending, strictly after `afterId` when given */
  list(limit: number, afterId?: number): Promise<MonsterRecordRow[]>;
}

@Injectable()
export class DrizzleMonsterRecordStore implements MonsterRecordStore {
  constructor(@Inject(DB) private readonly db: DrizzleDB) {}

  async insert(record: NewMonsterRecord): Promise<MonsterRecordRow> {
    let rows: MonsterRecordRow[];
    try {
      rows = await this.db.insert(monsterRecords).values(record).returning();
    } catch (err) {
      // a concurrent mint of the same seed got past findBySeed
      if (isUniqueViolation(err)) {
        throw new ConflictError('SEED_ALREADY_MINTED', 'Seed already minted', {
          seed: record.seed,
        });
      }
      throw err;
    }
    const [row] = rows;
    if (!row) {
      throw new InternalError('Insert returned no row', { seed: record.seed });
    }
    return row;
  }

  async findById(id: number): Promise<MonsterRecordRow | undefined> {
    const [row] = await this.db
      .select()
      .from(monsterRecords)
      .where(eq(monsterRecords.id, id))
      .limit(1);
    return row;
  }

  async findBySeed(seed: string): Promise<MonsterRecordRow | undefined> {
    const [row] = await this.db
      .select()
      .from(monsterRecords)
      .where(eq(monsterRecords.seed, seed))
      .limit(1);
    return row;
  }

  async count(): Promise<number> {
    const [row] = await this.db
      .select({ value: count() })
      .from(monsterRecords);
    return row?.value ?? 0;
  }

  async list(limit: number, afterId?: number): Promise<MonsterRecordRow[]> {
    return this.db
      .select()
      .from(monsterRecords)
      .where(afterId !== undefined ? gt(monsterRecords.id, afterId) : undefined)
      .orderBy(asc(monsterRecords.id))
      .limit(limit);
  }
}
