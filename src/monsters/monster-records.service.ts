// Mint/lookup of trait records. Ownership and transfers belong to the ledger, not here.

import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  ConflictError,
  NotFoundError,
} from '../common/errors/app-errors.js';
import { CodecConfigService } from '../config/codec-config.service.js';
import type { MonsterRecordRow } from '../db/schema/monster-records.js';
import { TraitCodecService } from '../engine/codec/trait-codec.service.js';
import { MonsterGeneratorService } from '../engine/generator/monster-generator.service.js';
import { PowerService } from '../engine/power/power.service.js';
import { formatUint256 } from '../engine/uint256/uint256.js';
import {
  MONSTER_RECORD_STORE,
  type MonsterRecordStore,
} from './monster-record.store.js';
import { toTraitsView, type MonsterRecordView } from './monster.views.js';

export interface MonsterRecordPage {
  items: MonsterRecordView[];
  page: { hasMore: boolean; nextCursor?: number };
}

@Injectable()
export class MonsterRecordsService {
  private readonly logger = new Logger(MonsterRecordsService.name);

  constructor(
    @Inject(MONSTER_RECORD_STORE) private readonly store: MonsterRecordStore,
    private readonly generator: MonsterGeneratorService,
    private readonly codec: TraitCodecService,
    private readonly power: PowerService,
    private readonly config: CodecConfigService,
  ) {}

  async mint(seed: bigint): Promise<MonsterRecordView> {
    const seedHex = formatUint256(seed);

    const existing = await this.store.findBySeed(seedHex);
    if (existing) {
      throw new ConflictError('SEED_ALREADY_MINTED', 'Seed already minted', {
        seed: seedHex,
        id: existing.id,
      });
    }

    const { maxSupply } = this.config.get();
    const minted = await this.store.count();
    if (minted >= maxSupply) {
      throw new ConflictError('SUPPLY_EXHAUSTED', 'Max supply reached', {
        maxSupply,
      });
    }

    const monster = this.generator.generate(seed);
    // generator output is always in range, so strict never rejects it
    const packed = this.codec.encode(monster, 'strict');

    const row = await this.store.insert({
      name: monster.name,
      seed: seedHex,
      packed: this.codec.toHex(packed),
    });
    this.logger.log(`Minted #${row.id} ${row.name} (${row.packed})`);
    return this.toView(row);
  }

  async get(id: number): Promise<MonsterRecordView> {
    const row = await this.store.findById(id);
    if (!row) {
      throw new NotFoundError(`Monster record not found: ${id}`);
    }
    return this.toView(row);
  }

  async list(limit: number, afterId?: number): Promise<MonsterRecordPage> {
    // one extra row tells whether another page exists
    const rows = await this.store.list(limit + 1, afterId);
    const hasMore = rows.length > limit;
    const pageRows = rows.slice(0, limit);
    const last = pageRows[pageRows.length - 1];
    return {
      items: pageRows.map((row) => this.toView(row)),
      page: { hasMore, nextCursor: hasMore && last ? last.id : undefined },
    };
  }

  private toView(row: MonsterRecordRow): MonsterRecordView {
    const packed = this.codec.fromHex(row.packed);
    const traits = this.codec.decodeValidated(packed);
    return {
      id: row.id,
      name: row.name,
      seed: row.seed,
      packed: row.packed,
      traits: toTraitsView(traits),
      power: this.power.powerFromPacked(packed).toString(),
      createdAt: row.createdAt.toISOString(),
    };
  }
}
