import { Injectable } from '@nestjs/common';
import { SqsMessageHandler } from '@ssut/nestjs-sqs';
import { Message } from '@aws-sdk/client-sqs';
import { PinoLoggerService } from '../../shared/logging/pino-logger.service';
import { ProcessBatchUseCase } from '../../application/use-cases/process-batch.use-case';
import { BatchSummary } from '../../domain/value-objects/batch-result.vo';
import { errorMessage } from '../../domain/errors/pipeline.error';
import {
  isS3TestEvent,
  ParsedRecords,
  toFileEvents,
  validateS3EventNotification,
} from '../dto/s3-event-notification.dto';

export const INGEST_EVENTS_QUEUE = 'ingest-events-queue';

/**
 * Ingest Event Consumer
 * Listens to the queue S3 publishes ingest-bucket notifications to.
 * One message is one batch.
 */
@Injectable()
export class IngestEventConsumer {
  constructor(
    private readonly logger: PinoLoggerService,
    private readonly processBatch: ProcessBatchUseCase,
  ) {}

  @SqsMessageHandler(INGEST_EVENTS_QUEUE, false)
  async handleMessage(message: Message): Promise<BatchSummary | null> {
    const messageId = message.MessageId || 'unknown';
    const messageLogger = this.logger.withMessageId(messageId);

    // Parse message body
    let body: unknown;
    try {
      body = JSON.parse(message.Body || '{}');
    } catch (error) {
      messageLogger.error(
        { error: errorMessage(error) },
        'Failed to parse message body',
      );
      // Return without throwing to delete invalid message
      return null;
    }

    if (isS3TestEvent(body)) {
      messageLogger.info('Ignoring s3:TestEvent notification');
      return null;
    }

    let parsed: ParsedRecords;
    try {
      parsed = toFileEvents(validateS3EventNotification(body));
    } catch (error) {
      messageLogger.error(
        { error: errorMessage(error) },
        'Invalid S3 event notification',
      );
      return null;
    }

    const result = await this.processBatch.execute({
      batchId: messageId,
      events: parsed.events,
      rejected: parsed.rejected,
    });
    const summary = result.toSummary();

    messageLogger.info(
      { ...summary, failedKeys: [...result.failedKeys] },
      'Batch processed',
    );

    if (result.isConfigurationError) {
      // Re-throw to trigger SQS retry (message will not be deleted)
      throw new Error(summary.message ?? 'Configuration retrieval failed');
    }

    return summary;
  }
}
