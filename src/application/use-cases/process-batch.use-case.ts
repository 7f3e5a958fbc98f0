import { Inject, Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { ProcessBatchCommand, ProcessBatchPort } from '../ports/input/process-batch.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import { EVENT_PUBLISHER_PORT } from '../ports/output/injection-tokens';
import { ConfigCacheService } from '../services/config-cache.service';
import { ProcessFileUseCase } from './process-file.use-case';
import { BatchCompletedEvent } from '../../domain/events/batch-completed.event';
import { BatchResultVO, BatchStatus } from '../../domain/value-objects/batch-result.vo';
import { isSuccessfulOutcome } from '../../domain/value-objects/processing-outcome.vo';
import { errorMessage } from '../../domain/errors/pipeline.error';

/**
 * Process Batch Use Case
 * Pulls config once, then processes each event in order with per-file isolation
 */
@Injectable()
export class ProcessBatchUseCase implements ProcessBatchPort {
  private readonly logger = new Logger(ProcessBatchUseCase.name);

  constructor(
    private readonly configCache: ConfigCacheService,
    private readonly processFile: ProcessFileUseCase,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
  ) {}

  async execute(command: ProcessBatchCommand): Promise<BatchResultVO> {
    const batchId = command.batchId ?? uuidv4();
    const startTime = Date.now();
    const { events } = command;
    const rejected = command.rejected ?? [];
    const total = events.length + rejected.length;

    const config = await this.configCache.get();
    if (!config.ok) {
      this.logger.error(`Batch ${batchId}: configuration retrieval failed: ${config.error.message}`);
      const result = BatchResultVO.configurationError(total);
      await this.publishCompleted(batchId, result, startTime);
      return result;
    }

    const succeededKeys: string[] = [];
    const failedKeys: string[] = [];

    for (const event of events) {
      try {
        const fileResult = await this.processFile.execute({ event, config: config.value });
        if (isSuccessfulOutcome(fileResult.outcome)) {
          succeededKeys.push(event.objectKey);
        } else {
          failedKeys.push(event.objectKey);
        }
      } catch (error) {
        this.logger.error(`Failed to process record ${event.objectKey}: ${errorMessage(error)}`);
        failedKeys.push(event.objectKey);
      }
    }

    for (const record of rejected) {
      this.logger.warn(`Invalid record ${record.objectKey}: ${record.reason}`);
      failedKeys.push(record.objectKey);
    }

    const result = BatchResultVO.fromOutcomes(total, succeededKeys, failedKeys);
    this.logOutcome(batchId, result);
    await this.publishCompleted(batchId, result, startTime);

    return result;
  }

  private logOutcome(batchId: string, result: BatchResultVO): void {
    switch (result.status) {
      case BatchStatus.SUCCESS:
        this.logger.log(`Batch ${batchId}: successfully processed all ${result.totalCount} records`);
        break;
      case BatchStatus.ERROR:
        this.logger.error(`Batch ${batchId}: all ${result.totalCount} records failed to process`);
        break;
      case BatchStatus.PARTIAL_FAILURE:
        this.logger.warn(
          `Batch ${batchId}: processed ${result.succeededCount}/${result.totalCount} records. ${result.failedKeys.length} failed.`,
        );
        break;
    }
  }

  private async publishCompleted(
    batchId: string,
    result: BatchResultVO,
    startTime: number,
  ): Promise<void> {
    try {
      await this.eventPublisher.publish(
        new BatchCompletedEvent({
          batchId,
          summary: result.toSummary(),
          failedKeys: result.failedKeys,
          durationMs: Date.now() - startTime,
        }),
      );
    } catch (error) {
      this.logger.error(`Failed to publish batch.completed for ${batchId}: ${errorMessage(error)}`);
    }
  }
}
