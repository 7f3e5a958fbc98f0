import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SqsModule } from '@ssut/nestjs-sqs';
import { SQSClient } from '@aws-sdk/client-sqs';
import { AppConfig } from './config/configuration';
import { ConfigModule } from './config/config.module';
import { SharedModule } from './shared/shared.module';
import { ProcessingModule } from './processing/processing.module';
import { INGEST_EVENTS_QUEUE } from './processing/consumers/ingest-event.consumer';

/**
 * Application Module
 * SQS-driven service that sanitizes JPEG uploads from the ingest bucket
 * Uses @ssut/nestjs-sqs for consuming S3 event notifications
 */
@Module({
  imports: [
    ConfigModule,
    SharedModule,

    SqsModule.registerAsync({
      imports: [ConfigModule],
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const awsConfig = configService.get('aws', { infer: true });
        const sqsConfig = configService.get('sqs', { infer: true });

        // Create SQS client with LocalStack support
        const sqsClient = new SQSClient({
          region: awsConfig.region,
          ...(awsConfig.endpoint && {
            endpoint: awsConfig.endpoint,
            credentials: awsConfig.credentials,
          }),
        });

        return {
          consumers: [
            {
              name: INGEST_EVENTS_QUEUE,
              queueUrl: sqsConfig.ingestEventsUrl,
              region: awsConfig.region,
              sqs: sqsClient,
              batchSize: sqsConfig.batchSize,
              waitTimeSeconds: sqsConfig.waitTimeSeconds,
              visibilityTimeout: sqsConfig.visibilityTimeout,
            },
          ],
          producers: [],
        };
      },
    }),

    ProcessingModule,
  ],
})
export class AppModule {}
