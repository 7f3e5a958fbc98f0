import { describe, it, expect, beforeAll, afterAll, vi } from 'vitest';
import {
  ImageClassifierService,
  hasJpegExtension,
} from '../../../src/application/services/image-classifier.service';
import { SharpImageCodecAdapter } from '../../../src/infrastructure/adapters/imaging/sharp-image-codec.adapter';
import {
  createCleanJpeg,
  createJpegWithExif,
  createJunkBytes,
  createPng,
  createTempDir,
  createTruncatedJpeg,
  createWebp,
  removeTempDir,
  writeFixture,
} from '../helpers/image-fixtures';

describe('ImageClassifierService', () => {
  let dir: string;
  let codec: SharpImageCodecAdapter;
  let classifier: ImageClassifierService;

  beforeAll(async () => {
    dir = await createTempDir();
    codec = new SharpImageCodecAdapter();
    classifier = new ImageClassifierService(codec);
  });

  afterAll(async () => {
    await removeTempDir(dir);
  });

  describe('hasJpegExtension', () => {
    it.each(['a.jpg', 'a.jpeg', 'A.JPG', 'dir/b.JpEg'])('should accept %s', (name) => {
      expect(hasJpegExtension(name)).toBe(true);
    });

    it.each(['a.png', 'a.jpg.txt', 'jpg', 'a.jpe', 'a'])('should reject %s', (name) => {
      expect(hasJpegExtension(name)).toBe(false);
    });
  });

  describe('isValidJpeg', () => {
    it('should accept a clean JPEG', async () => {
      const filePath = await writeFixture(dir, 'clean.jpg', await createCleanJpeg());

      expect(await classifier.isValidJpeg(filePath)).toBe(true);
    });

    it('should accept a JPEG with metadata and an upper-case extension', async () => {
      const filePath = await writeFixture(dir, 'with-exif.JPEG', await createJpegWithExif());

      expect(await classifier.isValidJpeg(filePath)).toBe(true);
    });

    it('should reject a file without a JPEG extension before opening it', async () => {
      const inspect = vi.spyOn(codec, 'inspect');
      const filePath = await writeFixture(dir, 'real-jpeg.png', await createCleanJpeg());

      expect(await classifier.isValidJpeg(filePath)).toBe(false);
      expect(inspect).not.toHaveBeenCalled();

      inspect.mockRestore();
    });

    it('should reject a PNG renamed to .jpg', async () => {
      const filePath = await writeFixture(dir, 'renamed-png.jpg', await createPng());

      expect(await classifier.isValidJpeg(filePath)).toBe(false);
    });

    it('should reject a WebP renamed to .jpeg', async () => {
      const filePath = await writeFixture(dir, 'renamed-webp.jpeg', await createWebp());

      expect(await classifier.isValidJpeg(filePath)).toBe(false);
    });

    it('should reject bytes that are not an image', async () => {
      const filePath = await writeFixture(dir, 'junk.jpg', createJunkBytes());

      expect(await classifier.isValidJpeg(filePath)).toBe(false);
    });

    it('should reject a truncated JPEG whose header still parses', async () => {
      const filePath = await writeFixture(dir, 'truncated.jpg', await createTruncatedJpeg());

      expect(await classifier.isValidJpeg(filePath)).toBe(false);
    });

    it('should return false instead of throwing for a missing file', async () => {
      expect(await classifier.isValidJpeg(`${dir}/does-not-exist.jpg`)).toBe(false);
    });
  });
});
