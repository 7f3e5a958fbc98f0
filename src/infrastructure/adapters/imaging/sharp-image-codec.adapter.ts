import { Injectable } from '@nestjs/common';
import sharp from 'sharp';
import {
  EmbeddedMetadataKind,
  ImageCodecPort,
  ImageInspection,
} from '../../../application/ports/output/image-codec.port';

const JPEG_QUALITY = 90;

/**
 * Sharp (libvips) Image Codec Adapter
 *
 * Output written by sharp carries no EXIF, XMP, IPTC or ICC data unless
 * explicitly requested, so a plain re-encode is a metadata-free copy.
 */
@Injectable()
export class SharpImageCodecAdapter implements ImageCodecPort {
  constructor() {
    // libvips caches decoded files by path; stripped files are rewritten in place
    sharp.cache(false);
  }

  async inspect(filePath: string): Promise<ImageInspection> {
    const info = await sharp(filePath).metadata();

    const metadata: EmbeddedMetadataKind[] = [];
    if (info.exif && info.exif.length > 0) {
      metadata.push('exif');
    }
    if (info.xmp && info.xmp.length > 0) {
      metadata.push('xmp');
    }
    if (info.iptc && info.iptc.length > 0) {
      metadata.push('iptc');
    }

    return {
      format: info.format,
      width: info.width,
      height: info.height,
      metadata,
    };
  }

  async verifyIntegrity(filePath: string): Promise<void> {
    // stats() decodes every pixel; failOn 'warning' turns libjpeg warnings
    // (premature end of data, corrupt segments) into errors
    await sharp(filePath, { failOn: 'warning' }).stats();
  }

  async writeWithoutMetadata(sourcePath: string, targetPath: string): Promise<void> {
    await sharp(sourcePath, { failOn: 'warning' })
      .jpeg({ quality: JPEG_QUALITY })
      .toFile(targetPath);
  }
}
