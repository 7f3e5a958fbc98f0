import { Inject, Injectable, Logger } from '@nestjs/common';
import { promises as fs } from 'fs';
import { basename, dirname, extname, join } from 'path';
import { v4 as uuidv4 } from 'uuid';
import { EmbeddedMetadataKind, ImageCodecPort } from '../ports/output/image-codec.port';
import { IMAGE_CODEC_PORT } from '../ports/output/injection-tokens';
import {
  MetadataStripError,
  StripFailureReason,
  errorMessage,
} from '../../domain/errors/pipeline.error';

export type StripResult = 'already-clean' | 'stripped';

function isSystemError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Metadata Stripper
 *
 * Replaces a JPEG with a metadata-free re-encoding, atomically:
 *
 * 1. inspect; no metadata means no mutation
 * 2. encode into a temp file in the same directory (same filesystem, same extension)
 * 3. rename the temp file over the original once the write has completed
 *
 * The original is never partially overwritten. On failure the temp file is
 * removed and a `MetadataStripError` is thrown; a crash between 2 and 3
 * leaves the original intact next to an orphaned temp file.
 */
@Injectable()
export class MetadataStripperService {
  private readonly logger = new Logger(MetadataStripperService.name);

  constructor(@Inject(IMAGE_CODEC_PORT) private readonly codec: ImageCodecPort) {}

  async strip(filePath: string): Promise<StripResult> {
    let present: EmbeddedMetadataKind[];
    try {
      present = (await this.codec.inspect(filePath)).metadata;
    } catch (error) {
      throw this.toStripError('inspect', filePath, error);
    }

    if (present.length === 0) {
      this.logger.log(`No metadata present in ${filePath}, no stripping needed`);
      return 'already-clean';
    }

    const tempPath = this.tempPathFor(filePath);

    try {
      await this.codec.writeWithoutMetadata(filePath, tempPath);
    } catch (error) {
      await this.removeTempFile(tempPath);
      throw this.toStripError('encode', filePath, error);
    }

    try {
      await fs.rename(tempPath, filePath);
    } catch (error) {
      await this.removeTempFile(tempPath);
      throw this.toStripError('replace', filePath, error);
    }

    this.logger.log(`Metadata (${present.join(', ')}) stripped from ${filePath}`);
    return 'stripped';
  }

  private tempPathFor(filePath: string): string {
    const ext = extname(filePath);
    return join(dirname(filePath), `.${basename(filePath, ext)}.${uuidv4()}.tmp${ext}`);
  }

  private async removeTempFile(tempPath: string): Promise<void> {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (error) {
      this.logger.error(`Failed to remove temp file ${tempPath}: ${errorMessage(error)}`);
    }
  }

  /**
   * Filesystem errors are access failures; anything the codec raises
   * while decoding or encoding is an encoding failure.
   */
  private toStripError(
    phase: 'inspect' | 'encode' | 'replace',
    filePath: string,
    error: unknown,
  ): MetadataStripError {
    const reason =
      phase === 'replace' || isSystemError(error)
        ? StripFailureReason.ACCESS_FAILURE
        : StripFailureReason.ENCODING_FAILURE;

    const message =
      reason === StripFailureReason.ACCESS_FAILURE
        ? `Failed to access file for metadata stripping: ${errorMessage(error)}`
        : `Failed to process image for metadata stripping: ${errorMessage(error)}`;

    this.logger.error(`${message} (${phase}, ${filePath})`);
    return new MetadataStripError(reason, message, error);
  }
}
