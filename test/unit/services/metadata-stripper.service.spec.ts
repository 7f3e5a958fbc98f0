import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { promises as fs } from 'fs';
import { MetadataStripperService } from '../../../src/application/services/metadata-stripper.service';
import { MetadataVerifierService } from '../../../src/application/services/metadata-verifier.service';
import {
  ImageCodecPort,
  ImageInspection,
} from '../../../src/application/ports/output/image-codec.port';
import { SharpImageCodecAdapter } from '../../../src/infrastructure/adapters/imaging/sharp-image-codec.adapter';
import {
  MetadataStripError,
  StripFailureReason,
} from '../../../src/domain/errors/pipeline.error';
import {
  createCleanJpeg,
  createJpegWithExif,
  createJpegWithIptc,
  createJpegWithXmp,
  createJunkBytes,
  createTempDir,
  removeTempDir,
  writeFixture,
} from '../helpers/image-fixtures';

/**
 * Delegates inspection to sharp, then writes half a file and fails
 */
class FailingEncodeCodec implements ImageCodecPort {
  private readonly delegate = new SharpImageCodecAdapter();

  constructor(private readonly failure: Error) {}

  inspect(filePath: string): Promise<ImageInspection> {
    return this.delegate.inspect(filePath);
  }

  verifyIntegrity(filePath: string): Promise<void> {
    return this.delegate.verifyIntegrity(filePath);
  }

  async writeWithoutMetadata(_sourcePath: string, targetPath: string): Promise<void> {
    await fs.writeFile(targetPath, Buffer.from([0xff, 0xd8, 0xff]));
    throw this.failure;
  }
}

describe('MetadataStripperService', () => {
  let dir: string;
  let codec: SharpImageCodecAdapter;
  let stripper: MetadataStripperService;
  let verifier: MetadataVerifierService;

  beforeEach(async () => {
    dir = await createTempDir();
    codec = new SharpImageCodecAdapter();
    stripper = new MetadataStripperService(codec);
    verifier = new MetadataVerifierService(codec);
  });

  afterEach(async () => {
    await removeTempDir(dir);
  });

  it('should leave a file without metadata byte-for-byte unchanged', async () => {
    const original = await createCleanJpeg();
    const filePath = await writeFixture(dir, 'clean.jpg', original);

    expect(await stripper.strip(filePath)).toBe('already-clean');

    expect((await fs.readFile(filePath)).equals(original)).toBe(true);
    expect(await fs.readdir(dir)).toEqual(['clean.jpg']);
  });

  it('should strip EXIF so the verifier finds no metadata', async () => {
    const filePath = await writeFixture(dir, 'photo.jpg', await createJpegWithExif());
    expect(await verifier.isMetadataAbsent(filePath)).toBe(false);

    expect(await stripper.strip(filePath)).toBe('stripped');

    expect(await verifier.isMetadataAbsent(filePath)).toBe(true);
    const inspection = await codec.inspect(filePath);
    expect(inspection.format).toBe('jpeg');
    expect(inspection.width).toBe(64);
    expect(inspection.height).toBe(64);
    expect(await fs.readdir(dir)).toEqual(['photo.jpg']);
  });

  it.each([
    ['XMP', 'xmp', createJpegWithXmp],
    ['IPTC', 'iptc', createJpegWithIptc],
  ])('should strip an %s block', async (_label, kind, createFixture) => {
    const filePath = await writeFixture(dir, 'photo.jpg', await createFixture());
    expect((await codec.inspect(filePath)).metadata).toEqual([kind]);

    expect(await stripper.strip(filePath)).toBe('stripped');

    expect((await codec.inspect(filePath)).metadata).toEqual([]);
    expect(await verifier.isMetadataAbsent(filePath)).toBe(true);
    expect(await fs.readdir(dir)).toEqual(['photo.jpg']);
  });

  it('should be a no-op the second time', async () => {
    const filePath = await writeFixture(dir, 'photo.jpeg', await createJpegWithExif());

    await stripper.strip(filePath);
    const afterFirst = await fs.readFile(filePath);

    expect(await stripper.strip(filePath)).toBe('already-clean');
    expect((await fs.readFile(filePath)).equals(afterFirst)).toBe(true);
  });

  it('should keep the original and remove the temp file when encoding fails', async () => {
    const original = await createJpegWithExif();
    const filePath = await writeFixture(dir, 'photo.jpg', original);
    const failing = new MetadataStripperService(new FailingEncodeCodec(new Error('VipsJpeg: out of memory')));

    const error = await failing.strip(filePath).catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(MetadataStripError);
    expect(error instanceof MetadataStripError && error.reason).toBe(
      StripFailureReason.ENCODING_FAILURE,
    );
    expect(error instanceof MetadataStripError && error.message).toBe(
      'Failed to process image for metadata stripping: VipsJpeg: out of memory',
    );
    expect((await fs.readFile(filePath)).equals(original)).toBe(true);
    expect(await fs.readdir(dir)).toEqual(['photo.jpg']);
  });

  it('should report filesystem errors as access failures', async () => {
    const filePath = await writeFixture(dir, 'photo.jpg', await createJpegWithExif());
    const denied = Object.assign(new Error('EACCES: permission denied'), { code: 'EACCES' });
    const failing = new MetadataStripperService(new FailingEncodeCodec(denied));

    await expect(failing.strip(filePath)).rejects.toMatchObject({
      name: 'MetadataStripError',
      reason: StripFailureReason.ACCESS_FAILURE,
      message: 'Failed to access file for metadata stripping: EACCES: permission denied',
    });
    expect(await fs.readdir(dir)).toEqual(['photo.jpg']);
  });

  it('should report an undecodable file as an encoding failure', async () => {
    const filePath = await writeFixture(dir, 'junk.jpg', createJunkBytes());

    await expect(stripper.strip(filePath)).rejects.toMatchObject({
      reason: StripFailureReason.ENCODING_FAILURE,
    });
  });
});
