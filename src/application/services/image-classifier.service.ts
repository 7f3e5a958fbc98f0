import { Inject, Injectable, Logger } from '@nestjs/common';
import { extname } from 'path';
import { ImageCodecPort } from '../ports/output/image-codec.port';
import { IMAGE_CODEC_PORT } from '../ports/output/injection-tokens';
import { errorMessage } from '../../domain/errors/pipeline.error';

export const JPEG_EXTENSIONS: readonly string[] = ['.jpg', '.jpeg'];

export function hasJpegExtension(filePath: string): boolean {
  return JPEG_EXTENSIONS.includes(extname(filePath).toLowerCase());
}

/**
 * Image Classifier
 * Decides whether a local file is a structurally valid JPEG. Never throws.
 */
@Injectable()
export class ImageClassifierService {
  private readonly logger = new Logger(ImageClassifierService.name);

  constructor(@Inject(IMAGE_CODEC_PORT) private readonly codec: ImageCodecPort) {}

  async isValidJpeg(filePath: string): Promise<boolean> {
    if (!hasJpegExtension(filePath)) {
      this.logger.debug(
        `File ${filePath} rejected: invalid extension '${extname(filePath)}'`,
      );
      return false;
    }

    try {
      const inspection = await this.codec.inspect(filePath);
      if (inspection.format !== 'jpeg') {
        this.logger.warn(`File ${filePath} is ${inspection.format ?? 'unknown'}, not JPEG`);
        return false;
      }

      // Header parsing alone misses truncated or corrupt scan data
      await this.codec.verifyIntegrity(filePath);

      return true;
    } catch (error) {
      this.logger.warn(`File ${filePath} failed JPEG validation: ${errorMessage(error)}`);
      return false;
    }
  }
}
