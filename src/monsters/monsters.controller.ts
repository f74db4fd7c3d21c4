import {
  Body,
  Controller,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import { MonsterRecordsService } from './monster-records.service.js';
import { MonstersService } from './monsters.service.js';
import { DecodeQuerySchema, type DecodeQuery } from './dto/decode-query.dto.js';
import { EncodeBodySchema, type EncodeBody } from './dto/encode-body.dto.js';
import {
  ListRecordsQuerySchema,
  RecordIdSchema,
  type ListRecordsQuery,
} from './dto/list-records.dto.js';
import { PowerBodySchema, type PowerBody } from './dto/power-body.dto.js';
import { SeedBodySchema, type SeedBody } from './dto/seed-body.dto.js';

@Controller('v1/monsters')
export class MonstersController {
  constructor(
    private readonly monstersService: MonstersService,
    private readonly recordsService: MonsterRecordsService,
  ) {}

  /** Generator preview; nothing is stored */
  @Post('generate')
  @HttpCode(HttpStatus.OK)
  generate(@Body(new ZodValidationPipe(SeedBodySchema)) body: SeedBody) {
    return this.monstersService.preview(body.seed);
  }

  @Post('encode')
  @HttpCode(HttpStatus.OK)
  encode(@Body(new ZodValidationPipe(EncodeBodySchema)) body: EncodeBody) {
    return this.monstersService.encode(body.monster, body.policy);
  }

  @Get('decode/:packed')
  decode(
    @Param('packed') packed: string,
    @Query(new ZodValidationPipe(DecodeQuerySchema)) query: DecodeQuery,
  ) {
    return this.monstersService.decode(packed, query.validate);
  }

  @Post('power')
  @HttpCode(HttpStatus.OK)
  power(@Body(new ZodValidationPipe(PowerBodySchema)) body: PowerBody) {
    return this.monstersService.powerOf(body.packed, body.sumMode);
  }

  @Post()
  @HttpCode(HttpStatus.CREATED)
  async mint(@Body(new ZodValidationPipe(SeedBodySchema)) body: SeedBody) {
    return this.recordsService.mint(body.seed);
  }

  @Get()
  async list(
    @Query(new ZodValidationPipe(ListRecordsQuerySchema))
    query: ListRecordsQuery,
  ) {
    return this.recordsService.list(query.limit, query.after);
  }

  @Get(':id')
  async get(@Param('id', new ZodValidationPipe(RecordIdSchema)) id: number) {
    return this.recordsService.get(id);
  }
}
