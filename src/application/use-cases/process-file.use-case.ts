import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { extname, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { PIPELINE_SETTINGS } from '../../config/config.module';
import { PipelineSettings } from '../../config/configuration';
import {
  ProcessFileCommand,
  ProcessFilePort,
  ProcessFileResult,
} from '../ports/input/process-file.port';
import { FileStoragePort } from '../ports/output/file-storage.port';
import { EventPublisherPort } from '../ports/output/event-publisher.port';
import {
  EVENT_PUBLISHER_PORT,
  FILE_STORAGE_PORT,
} from '../ports/output/injection-tokens';
import { ImageClassifierService } from '../services/image-classifier.service';
import { MetadataStripperService, StripResult } from '../services/metadata-stripper.service';
import { MetadataVerifierService } from '../services/metadata-verifier.service';
import { DomainEvent } from '../../domain/events/base.event';
import { FileDiscardedEvent } from '../../domain/events/file-discarded.event';
import { FileFailedEvent } from '../../domain/events/file-failed.event';
import { FileRelocatedEvent } from '../../domain/events/file-relocated.event';
import { FileEvent } from '../../domain/value-objects/file-event.vo';
import { PipelineConfigVO } from '../../domain/value-objects/pipeline-config.vo';
import {
  FileProcessingState,
  ProcessingOutcome,
} from '../../domain/value-objects/processing-outcome.vo';
import {
  PipelineError,
  PipelineErrorKind,
  StepResult,
  errorMessage,
  fail,
  ok,
} from '../../domain/errors/pipeline.error';

interface FileContext {
  event: FileEvent;
  config: PipelineConfigVO;
  startTime: number;
  state: FileProcessingState;
}

/**
 * Process File Use Case
 *
 * Per-file state machine:
 *
 *   RECEIVED → DOWNLOADED → CLASSIFIED → STRIPPED → VERIFIED → RELOCATED
 *
 * - missing or oversized declared size: discard without downloading
 * - download failure: FAILED, source untouched
 * - not a JPEG, strip failure, verification failure: discard
 * - verified: upload to the destination (SSE-KMS), then delete the source
 *
 * Exactly one source mutation (relocate or discard) happens per file that
 * reaches the download step. The scratch copy is removed on every exit path.
 */
@Injectable()
export class ProcessFileUseCase implements ProcessFilePort {
  private readonly logger = new Logger(ProcessFileUseCase.name);

  constructor(
    @Inject(FILE_STORAGE_PORT) private readonly fileStorage: FileStoragePort,
    @Inject(EVENT_PUBLISHER_PORT) private readonly eventPublisher: EventPublisherPort,
    private readonly classifier: ImageClassifierService,
    private readonly stripper: MetadataStripperService,
    private readonly verifier: MetadataVerifierService,
    @Inject(PIPELINE_SETTINGS) private readonly settings: PipelineSettings,
  ) {}

  async execute(command: ProcessFileCommand): Promise<ProcessFileResult> {
    const ctx: FileContext = {
      event: command.event,
      config: command.config,
      startTime: Date.now(),
      state: FileProcessingState.RECEIVED,
    };

    try {
      return await this.run(ctx);
    } catch (error) {
      const failure = new PipelineError(
        PipelineErrorKind.UNEXPECTED,
        `Unexpected error: ${errorMessage(error)}`,
        error,
      );
      return this.failed(ctx, failure, false);
    }
  }

  private async run(ctx: FileContext): Promise<ProcessFileResult> {
    const { event, config } = ctx;

    const sizeCheck = this.checkDeclaredSize(event, config);
    if (!sizeCheck.ok) {
      return this.discard(ctx, sizeCheck.error);
    }

    this.logger.log(`Processing file ${event.objectKey} from ${event.sourceLocation}`);

    const scratchPath = await this.allocateScratchPath(event.objectKey);

    try {
      const downloaded = await this.download(event, scratchPath);
      if (!downloaded.ok) {
        return this.failed(ctx, downloaded.error, false);
      }
      ctx.state = FileProcessingState.DOWNLOADED;

      const classified = await this.classify(scratchPath, event.objectKey);
      if (!classified.ok) {
        return this.discard(ctx, classified.error);
      }
      ctx.state = FileProcessingState.CLASSIFIED;

      // A failed strip may have left the scratch copy unusable; the source is discarded
      const stripped = await this.strip(scratchPath, event.objectKey);
      if (!stripped.ok) {
        return this.discard(ctx, stripped.error);
      }
      ctx.state = FileProcessingState.STRIPPED;

      const verified = await this.verify(scratchPath, event.objectKey);
      if (!verified.ok) {
        return this.discard(ctx, verified.error);
      }
      ctx.state = FileProcessingState.VERIFIED;

      return await this.relocate(ctx, scratchPath, stripped.value === 'stripped');
    } finally {
      await this.removeScratchFile(scratchPath);
    }
  }

  private checkDeclaredSize(event: FileEvent, config: PipelineConfigVO): StepResult {
    if (event.declaredSizeBytes === undefined) {
      return fail(
        PipelineErrorKind.SIZE_REJECTION,
        `File ${event.objectKey} size missing from event`,
      );
    }

    if (event.declaredSizeBytes > config.maxFileSizeBytes) {
      return fail(
        PipelineErrorKind.SIZE_REJECTION,
        `File ${event.objectKey} size ${event.declaredSizeBytes} exceeds ${config.maxFileSizeBytes}`,
      );
    }

    return ok(undefined);
  }

  private async download(event: FileEvent, scratchPath: string): Promise<StepResult> {
    try {
      await this.fileStorage.downloadFile(event.sourceLocation, event.objectKey, scratchPath);
      this.logger.debug(`Downloaded ${event.objectKey} to ${scratchPath}`);
      return ok(undefined);
    } catch (error) {
      return fail(
        PipelineErrorKind.TRANSPORT_FAILURE,
        `Failed to download ${event.objectKey} from ${event.sourceLocation}: ${errorMessage(error)}`,
        error,
      );
    }
  }

  private async classify(scratchPath: string, key: string): Promise<StepResult> {
    if (await this.classifier.isValidJpeg(scratchPath)) {
      return ok(undefined);
    }
    return fail(
      PipelineErrorKind.CLASSIFICATION_REJECTION,
      `File ${key} is not a valid JPEG`,
    );
  }

  private async strip(scratchPath: string, key: string): Promise<StepResult<StripResult>> {
    try {
      return ok(await this.stripper.strip(scratchPath));
    } catch (error) {
      return fail(
        PipelineErrorKind.TRANSFORM_FAILURE,
        `Failed to strip metadata from ${key}: ${errorMessage(error)}`,
        error,
      );
    }
  }

  private async verify(scratchPath: string, key: string): Promise<StepResult> {
    try {
      if (await this.verifier.isMetadataAbsent(scratchPath)) {
        return ok(undefined);
      }
      return fail(PipelineErrorKind.TRANSFORM_FAILURE, `Metadata still present in ${key}`);
    } catch (error) {
      return fail(
        PipelineErrorKind.TRANSFORM_FAILURE,
        `Failed to check metadata removal for ${key}: ${errorMessage(error)}`,
        error,
      );
    }
  }

  private async relocate(
    ctx: FileContext,
    scratchPath: string,
    metadataStripped: boolean,
  ): Promise<ProcessFileResult> {
    const { event, config } = ctx;

    try {
      await this.fileStorage.uploadFile(config.destinationLocation, event.objectKey, scratchPath, {
        contentType: 'image/jpeg',
        kmsKeyId: config.destinationEncryptionKeyRef,
      });
    } catch (error) {
      const failure = new PipelineError(
        PipelineErrorKind.TRANSPORT_FAILURE,
        `Failed to upload ${event.objectKey} to ${config.destinationLocation}: ${errorMessage(error)}`,
        error,
      );
      return this.handleUploadFailure(ctx, failure);
    }

    const removed = await this.deleteSource(event);
    if (!removed.ok) {
      return this.failed(ctx, removed.error, false);
    }

    ctx.state = FileProcessingState.RELOCATED;
    const processingDurationMs = Date.now() - ctx.startTime;

    this.logger.log(
      `Relocated ${event.objectKey} to ${config.destinationLocation} in ${processingDurationMs}ms`,
    );

    await this.publish(
      new FileRelocatedEvent({
        objectKey: event.objectKey,
        sourceLocation: event.sourceLocation,
        destinationLocation: config.destinationLocation,
        metadataStripped,
        processingDurationMs,
      }),
    );

    return {
      outcome: ProcessingOutcome.RELOCATED,
      objectKey: event.objectKey,
      finalState: ctx.state,
      sourceDiscarded: false,
      processingDurationMs,
    };
  }

  private async handleUploadFailure(
    ctx: FileContext,
    failure: PipelineError,
  ): Promise<ProcessFileResult> {
    if (this.settings.uploadFailurePolicy === 'retain') {
      this.logger.warn(`${failure.message}; source object retained for redelivery`);
      return this.failed(ctx, failure, false);
    }

    const removed = await this.deleteSource(ctx.event);
    return this.failed(ctx, failure, removed.ok);
  }

  /**
   * Delete the source object after a rejection. When the delete itself
   * fails the file is reported FAILED, since it is still sitting in the
   * ingest bucket.
   */
  private async discard(ctx: FileContext, rejection: PipelineError): Promise<ProcessFileResult> {
    const { event } = ctx;
    this.logger.warn(`${rejection.message}, deleting`);

    const removed = await this.deleteSource(event);
    if (!removed.ok) {
      return this.failed(ctx, removed.error, false);
    }

    await this.publish(
      new FileDiscardedEvent({
        objectKey: event.objectKey,
        sourceLocation: event.sourceLocation,
        errorKind: rejection.kind,
        reason: rejection.message,
      }),
    );

    return {
      outcome: ProcessingOutcome.DISCARDED,
      objectKey: event.objectKey,
      finalState: ctx.state,
      errorKind: rejection.kind,
      reason: rejection.message,
      sourceDiscarded: true,
      processingDurationMs: Date.now() - ctx.startTime,
    };
  }

  private async failed(
    ctx: FileContext,
    failure: PipelineError,
    sourceDiscarded: boolean,
  ): Promise<ProcessFileResult> {
    const { event } = ctx;
    this.logger.error(`Failed to process ${event.objectKey}: ${failure.message}`);

    await this.publish(
      new FileFailedEvent({
        objectKey: event.objectKey,
        sourceLocation: event.sourceLocation,
        errorKind: failure.kind,
        errorMessage: failure.message,
        sourceDiscarded,
      }),
    );

    return {
      outcome: ProcessingOutcome.FAILED,
      objectKey: event.objectKey,
      finalState: ctx.state,
      errorKind: failure.kind,
      reason: failure.message,
      sourceDiscarded,
      processingDurationMs: Date.now() - ctx.startTime,
    };
  }

  private async deleteSource(event: FileEvent): Promise<StepResult> {
    try {
      await this.fileStorage.deleteFile(event.sourceLocation, event.objectKey);
      return ok(undefined);
    } catch (error) {
      return fail(
        PipelineErrorKind.TRANSPORT_FAILURE,
        `Failed to delete ${event.objectKey} from ${event.sourceLocation}: ${errorMessage(error)}`,
        error,
      );
    }
  }

  /**
   * Scratch files keep the key's extension so the classifier sees it.
   */
  private async allocateScratchPath(key: string): Promise<string> {
    await fs.mkdir(this.settings.scratchDir, { recursive: true });
    return join(this.settings.scratchDir, `${uuidv4()}${extname(key)}`);
  }

  private async removeScratchFile(scratchPath: string): Promise<void> {
    try {
      await fs.rm(scratchPath, { force: true });
      this.logger.debug(`Cleaned up scratch file ${scratchPath}`);
    } catch (error) {
      this.logger.error(`Failed to remove scratch file ${scratchPath}: ${errorMessage(error)}`);
    }
  }

  private async publish(event: DomainEvent): Promise<void> {
    try {
      await this.eventPublisher.publish(event);
    } catch (error) {
      this.logger.error(`Failed to publish event ${event.eventName}: ${errorMessage(error)}`);
    }
  }
}
