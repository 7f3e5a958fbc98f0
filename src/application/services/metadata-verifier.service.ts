import { Inject, Injectable, Logger } from '@nestjs/common';
import { ImageCodecPort } from '../ports/output/image-codec.port';
import { IMAGE_CODEC_PORT } from '../ports/output/injection-tokens';

/**
 * Metadata Verifier
 * Re-inspects a stripped file. Inspection errors propagate to the caller.
 */
@Injectable()
export class MetadataVerifierService {
  private readonly logger = new Logger(MetadataVerifierService.name);

  constructor(@Inject(IMAGE_CODEC_PORT) private readonly codec: ImageCodecPort) {}

  async isMetadataAbsent(filePath: string): Promise<boolean> {
    const { metadata } = await this.codec.inspect(filePath);

    if (metadata.length > 0) {
      this.logger.error(`Metadata still present in ${filePath}: ${metadata.join(', ')}`);
      return false;
    }

    return true;
  }
}
