import { describe, it, expect } from 'vitest';
import {
  PipelineConfigProps,
  PipelineConfigVO,
} from '../../../src/domain/value-objects/pipeline-config.vo';

describe('PipelineConfigVO', () => {
  const createProps = (overrides: Partial<PipelineConfigProps> = {}): PipelineConfigProps => ({
    sourceLocation: 'ingest',
    destinationLocation: 'processed',
    maxFileSizeBytes: 2048,
    destinationEncryptionKeyRef: 'alias/test-key',
    fetchedAt: new Date('2026-01-01T00:00:00.000Z'),
    ...overrides,
  });

  it('should create a frozen config', () => {
    const config = PipelineConfigVO.create(createProps());

    expect(config.sourceLocation).toBe('ingest');
    expect(config.destinationLocation).toBe('processed');
    expect(config.maxFileSizeBytes).toBe(2048);
    expect(config.destinationEncryptionKeyRef).toBe('alias/test-key');
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('should compute age relative to the given time', () => {
    const config = PipelineConfigVO.create(createProps());

    expect(config.ageMs(Date.parse('2026-01-01T00:04:59.000Z'))).toBe(299_000);
  });

  it('should not expose its fetch time for mutation', () => {
    const config = PipelineConfigVO.create(createProps());

    config.fetchedAt.setFullYear(1999);

    expect(config.fetchedAt.toISOString()).toBe('2026-01-01T00:00:00.000Z');
  });

  it.each([
    [{ sourceLocation: '  ' }, 'Source location cannot be empty'],
    [{ destinationLocation: '' }, 'Destination location cannot be empty'],
    [{ maxFileSizeBytes: 0 }, 'Max file size must be a positive integer'],
    [{ maxFileSizeBytes: 1.5 }, 'Max file size must be a positive integer'],
    [{ destinationEncryptionKeyRef: ' ' }, 'Destination encryption key reference cannot be empty'],
  ])('should reject invalid props %o', (overrides, message) => {
    expect(() => PipelineConfigVO.create(createProps(overrides))).toThrow(message);
  });

  it('should serialize to JSON', () => {
    expect(PipelineConfigVO.create(createProps()).toJSON()).toEqual({
      sourceLocation: 'ingest',
      destinationLocation: 'processed',
      maxFileSizeBytes: 2048,
      destinationEncryptionKeyRef: 'alias/test-key',
      fetchedAt: '2026-01-01T00:00:00.000Z',
    });
  });
});
