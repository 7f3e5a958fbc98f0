import { Module } from '@nestjs/common';

// Shared services (existing infrastructure)
import { S3Module } from '../shared/aws/s3/s3.module';
import { SsmModule } from '../shared/aws/ssm/ssm.module';
import { LoggingModule } from '../shared/logging/logging.module';

// Injection tokens (string symbols for DI)
import {
  EVENT_PUBLISHER_PORT,
  FILE_STORAGE_PORT,
  IMAGE_CODEC_PORT,
  PARAMETER_STORE_PORT,
} from '../application/ports/output/injection-tokens';

// Adapters (implementations)
import { S3FileStorageAdapter } from './adapters/storage/s3-file-storage.adapter';
import { SsmParameterStoreAdapter } from './adapters/parameters/ssm-parameter-store.adapter';
import { SharpImageCodecAdapter } from './adapters/imaging/sharp-image-codec.adapter';
import { ConsoleEventPublisherAdapter } from './adapters/events/console-event-publisher.adapter';

/**
 * Infrastructure Module
 * Provides implementations (adapters) for all output ports
 *
 * This module:
 * 1. Imports shared infrastructure modules (AWS services, logging)
 * 2. Binds adapters to port tokens
 * 3. Exports the tokens so they can be injected into use cases
 */
@Module({
  imports: [LoggingModule, S3Module, SsmModule],
  providers: [
    // Storage adapters
    {
      provide: FILE_STORAGE_PORT,
      useClass: S3FileStorageAdapter,
    },

    // Configuration adapters
    {
      provide: PARAMETER_STORE_PORT,
      useClass: SsmParameterStoreAdapter,
    },

    // Image codec adapter
    {
      provide: IMAGE_CODEC_PORT,
      useClass: SharpImageCodecAdapter,
    },

    // Event publisher adapter
    {
      provide: EVENT_PUBLISHER_PORT,
      useClass: ConsoleEventPublisherAdapter,
    },
  ],
  exports: [FILE_STORAGE_PORT, PARAMETER_STORE_PORT, IMAGE_CODEC_PORT, EVENT_PUBLISHER_PORT],
})
export class InfrastructureModule {}
