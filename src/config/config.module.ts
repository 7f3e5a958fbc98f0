import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule, ConfigService } from '@nestjs/config';
import configuration, { AppConfig } from './configuration';

export const PIPELINE_SETTINGS = 'PipelineSettings';

@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      cache: true,
    }),
  ],
  providers: [
    {
      provide: PIPELINE_SETTINGS,
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) =>
        configService.get('pipeline', { infer: true }),
    },
  ],
  exports: [PIPELINE_SETTINGS],
})
export class ConfigModule {}
