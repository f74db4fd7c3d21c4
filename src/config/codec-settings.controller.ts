// Runtime codec settings; changes apply to the next request

import { Body, Controller, Get, Patch } from '@nestjs/common';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe.js';
import {
  CodecConfigPatchSchema,
  CodecConfigService,
  type CodecConfigPatch,
} from './codec-config.service.js';

@Controller('v1/settings/codec')
export class CodecSettingsController {
  constructor(private readonly configService: CodecConfigService) {}

  @Get()
  getSettings() {
    return this.configService.getPublic();
  }

  @Patch()
  updateSettings(
    @Body(new ZodValidationPipe(CodecConfigPatchSchema)) body: CodecConfigPatch,
  ) {
    this.configService.update(body);
    return {
      message: 'Codec settings updated.',
      ...this.configService.getPublic(),
    };
  }
}
