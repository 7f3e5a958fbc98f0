/**
 * Embedded metadata blocks the pipeline removes.
 */
export type EmbeddedMetadataKind = 'exif' | 'xmp' | 'iptc';

export interface ImageInspection {
  /** Format detected from the file contents, e.g. `jpeg`, `png`. */
  format?: string;
  width?: number;
  height?: number;
  metadata: EmbeddedMetadataKind[];
}

/**
 * Image Codec Port (Driven Port)
 * Decoding and re-encoding primitives behind the classifier, stripper and verifier
 */
export interface ImageCodecPort {
  /**
   * Read the image header: format and embedded metadata blocks.
   * Rejects when the contents are not a recognised image.
   */
  inspect(filePath: string): Promise<ImageInspection>;

  /**
   * Decode the full image on a fresh handle. Rejects on any structural error
   * (truncation, corrupt segments).
   */
  verifyIntegrity(filePath: string): Promise<void>;

  /**
   * Re-encode `sourcePath` as JPEG without embedded metadata into `targetPath`.
   * Resolves only after the target has been fully written and closed.
   */
  writeWithoutMetadata(sourcePath: string, targetPath: string): Promise<void>;
}
