import sharp from 'sharp';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { PipelineConfigVO } from '../../../src/domain/value-objects/pipeline-config.vo';
import { PipelineSettings } from '../../../src/config/configuration';

export const TEST_FIXTURES = {
  projectName: 'test-project',
  ingestBucket: 'test-ingest-bucket',
  processedBucket: 'test-processed-bucket',
  kmsKeyArn: 'arn:aws:kms:us-east-1:000000000000:key/test-key',
  maxFileSizeBytes: 1024 * 1024,
} as const;

const baseImage = () =>
  sharp({
    create: {
      width: 64,
      height: 64,
      channels: 3,
      background: { r: 40, g: 120, b: 200 },
      noise: { type: 'gaussian', mean: 128, sigma: 40 },
    },
  });

/**
 * JPEG carrying no EXIF, XMP or IPTC block
 */
export async function createCleanJpeg(): Promise<Buffer> {
  return baseImage().jpeg({ quality: 80 }).toBuffer();
}

/**
 * JPEG carrying an EXIF block
 */
export async function createJpegWithExif(): Promise<Buffer> {
  return baseImage()
    .jpeg({ quality: 80 })
    .withMetadata({ exif: { IFD0: { Copyright: 'test-owner', Artist: 'test-artist' } } })
    .toBuffer();
}

const APP1 = 0xe1;
const APP13 = 0xed;

function jpegSegment(marker: number, payload: Buffer): Buffer {
  const header = Buffer.alloc(4);
  header.writeUInt8(0xff, 0);
  header.writeUInt8(marker, 1);
  // Length counts its own two bytes
  header.writeUInt16BE(payload.length + 2, 2);
  return Buffer.concat([header, payload]);
}

function insertAfterSoi(jpeg: Buffer, segment: Buffer): Buffer {
  return Buffer.concat([jpeg.subarray(0, 2), segment, jpeg.subarray(2)]);
}

/**
 * JPEG carrying an XMP packet in an APP1 segment
 */
export async function createJpegWithXmp(): Promise<Buffer> {
  const packet =
    '<x:xmpmeta xmlns:x="adobe:ns:meta/">' +
    '<rdf:RDF xmlns:rdf="http://www.w3.org/1999/02/22-rdf-syntax-ns#">' +
    '<rdf:Description rdf:about="" xmlns:dc="http://purl.org/dc/elements/1.1/">' +
    '<dc:creator>test-author</dc:creator>' +
    '</rdf:Description></rdf:RDF></x:xmpmeta>';
  const payload = Buffer.concat([
    Buffer.from('http://ns.adobe.com/xap/1.0/\0', 'latin1'),
    Buffer.from(packet, 'utf8'),
  ]);
  return insertAfterSoi(await createCleanJpeg(), jpegSegment(APP1, payload));
}

/**
 * JPEG carrying an IPTC caption in a Photoshop APP13 segment (8BIM resource 0x0404)
 */
export async function createJpegWithIptc(): Promise<Buffer> {
  const caption = Buffer.from('test caption', 'latin1');
  const iim = Buffer.concat([Buffer.from([0x1c, 0x02, 0x78, 0x00, caption.length]), caption]);
  const size = Buffer.alloc(4);
  size.writeUInt32BE(iim.length, 0);
  const resource = Buffer.concat([
    Buffer.from('8BIM', 'latin1'),
    Buffer.from([0x04, 0x04]),
    // Empty Pascal-string name, padded to even length
    Buffer.from([0x00, 0x00]),
    size,
    iim,
    iim.length % 2 === 1 ? Buffer.from([0x00]) : Buffer.alloc(0),
  ]);
  const payload = Buffer.concat([Buffer.from('Photoshop 3.0\0', 'latin1'), resource]);
  return insertAfterSoi(await createCleanJpeg(), jpegSegment(APP13, payload));
}

export async function createPng(): Promise<Buffer> {
  return baseImage().png().toBuffer();
}

export async function createWebp(): Promise<Buffer> {
  return baseImage().webp().toBuffer();
}

/**
 * A JPEG cut off in the middle of its scan data; the header still parses
 */
export async function createTruncatedJpeg(): Promise<Buffer> {
  const jpeg = await createCleanJpeg();
  return jpeg.subarray(0, Math.floor(jpeg.length * 0.6));
}

export function createJunkBytes(): Buffer {
  return Buffer.from('this is not an image, only plain text bytes');
}

export async function createTempDir(prefix = 'jpeg-sanitizer-test-'): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFixture(dir: string, name: string, content: Buffer): Promise<string> {
  const filePath = path.join(dir, name);
  await fs.writeFile(filePath, content);
  return filePath;
}

export function createPipelineSettings(overrides: Partial<PipelineSettings> = {}): PipelineSettings {
  return {
    projectName: TEST_FIXTURES.projectName,
    configCacheTtlSeconds: 300,
    scratchDir: path.join(os.tmpdir(), 'jpeg-sanitizer-test-scratch'),
    uploadFailurePolicy: 'discard',
    ...overrides,
  };
}

export function createPipelineConfig(
  overrides: Partial<{ maxFileSizeBytes: number; sourceLocation: string }> = {},
): PipelineConfigVO {
  return PipelineConfigVO.create({
    sourceLocation: overrides.sourceLocation ?? TEST_FIXTURES.ingestBucket,
    destinationLocation: TEST_FIXTURES.processedBucket,
    maxFileSizeBytes: overrides.maxFileSizeBytes ?? TEST_FIXTURES.maxFileSizeBytes,
    destinationEncryptionKeyRef: TEST_FIXTURES.kmsKeyArn,
    fetchedAt: new Date(),
  });
}
