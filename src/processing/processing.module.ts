import { Module } from '@nestjs/common';
import { SharedModule } from '../shared/shared.module';
import { ApplicationModule } from '../application/application.module';
import { IngestEventConsumer } from './consumers/ingest-event.consumer';

@Module({
  imports: [SharedModule, ApplicationModule],
  providers: [IngestEventConsumer],
})
export class ProcessingModule {}
