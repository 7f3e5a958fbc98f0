import { Module } from '@nestjs/common';
import { InfrastructureModule } from '../infrastructure/infrastructure.module';

// Use Cases
import { ProcessBatchUseCase, ProcessFileUseCase } from './use-cases';

// Application services
import { ConfigCacheService } from './services/config-cache.service';
import { ImageClassifierService } from './services/image-classifier.service';
import { MetadataStripperService } from './services/metadata-stripper.service';
import { MetadataVerifierService } from './services/metadata-verifier.service';

/**
 * Application Module
 * Contains all use cases and application services
 *
 * Use cases depend on output ports (interfaces) only. The implementations
 * (adapters) are bound to the port tokens by the InfrastructureModule.
 */
@Module({
  imports: [InfrastructureModule],
  providers: [
    // Services
    ConfigCacheService,
    ImageClassifierService,
    MetadataStripperService,
    MetadataVerifierService,

    // Use Cases
    ProcessFileUseCase,
    ProcessBatchUseCase,
  ],
  exports: [
    // Export use cases so they can be used by driving adapters (consumers)
    ProcessBatchUseCase,
  ],
})
export class ApplicationModule {}
