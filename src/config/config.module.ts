import { Global, Module } from '@nestjs/common';
import { CodecConfigService } from './codec-config.service.js';
import { CodecSettingsController } from './codec-settings.controller.js';

@Global()
@Module({
  controllers: [CodecSettingsController],
  providers: [
    {
      provide: CodecConfigService,
      useFactory: () => new CodecConfigService(process.env),
    },
  ],
  exports: [CodecConfigService],
})
export class ConfigModule {}
