// Codec/registry settings: environment defaults + runtime patch

import { Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { InternalError } from '../common/errors/app-errors.js';

export const ENCODE_POLICIES = ['strict', 'truncate'] as const;
export const SUM_MODES = ['checked', 'wrapping'] as const;

export type EncodePolicy = (typeof ENCODE_POLICIES)[number];
export type SumMode = (typeof SUM_MODES)[number];

export const CodecConfigSchema = z.object({
  port: z.coerce.number().int().min(1).max(65535),
  databaseUrl: z.string().optional(),
  encodePolicy: z.enum(ENCODE_POLICIES),
  sumMode: z.enum(SUM_MODES),
  maxBatchSize: z.coerce.number().int().min(1).max(100_000),
  maxSupply: z.coerce.number().int().min(1),
});

export type CodecConfig = z.infer<typeof CodecConfigSchema>;

/** Fields PATCH /v1/settings/codec may change */
export const CodecConfigPatchSchema = CodecConfigSchema.pick({
  encodePolicy: true,
  sumMode: true,
  maxBatchSize: true,
  maxSupply: true,
})
  .partial()
  .strict();

export type CodecConfigPatch = z.infer<typeof CodecConfigPatchSchema>;

/** GET view; the connection string stays private */
export type CodecConfigPublic = Omit<CodecConfig, 'databaseUrl'> & {
  databaseConfigured: boolean;
};

@Injectable()
export class CodecConfigService {
  private readonly logger = new Logger(CodecConfigService.name);
  private config: CodecConfig;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    const parsed = CodecConfigSchema.safeParse({
      port: env.PORT ?? '3000',
      databaseUrl: env.DATABASE_URL,
      encodePolicy: env.ENCODE_POLICY ?? 'strict',
      sumMode: env.SUM_MODE ?? 'checked',
      maxBatchSize: env.MAX_BATCH_SIZE ?? '1000',
      maxSupply: env.MAX_SUPPLY ?? '10000',
    });
    if (!parsed.success) {
      throw new InternalError(
        'Invalid configuration',
        {
          issues: parsed.error.issues.map(
            (i) => `${i.path.join('.')}: ${i.message}`,
          ),
        },
        'CONFIG_INVALID',
      );
    }
    this.config = parsed.data;
    this.logger.log(
      `Config loaded: encodePolicy=${this.config.encodePolicy} sumMode=${this.config.sumMode}`,
    );
  }

  get(): CodecConfig {
    return this.config;
  }

  update(patch: CodecConfigPatch): CodecConfig {
    this.config = { ...this.config, ...patch };
    this.logger.log(`Codec config updated: ${JSON.stringify(patch)}`);
    return this.config;
  }

  getPublic(): CodecConfigPublic {
    const { databaseUrl, ...rest } = this.config;
    return { ...rest, databaseConfigured: !!databaseUrl };
  }
}
