import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  S3Client,
  GetObjectCommand,
  DeleteObjectCommand,
  HeadBucketCommand,
  ServerSideEncryption,
} from '@aws-sdk/client-s3';
import { Upload } from '@aws-sdk/lib-storage';
import { Readable } from 'stream';
import { createReadStream, createWriteStream, promises as fs } from 'fs';
import { pipeline } from 'stream/promises';
import { AppConfig } from '../../../config/configuration';

export interface UploadOptions {
  contentType?: string;
  /** Enables SSE-KMS with this key. */
  kmsKeyId?: string;
}

export interface DownloadResult {
  filePath: string;
  size: number;
  contentType?: string;
  etag?: string;
}

const MISSING_BUCKET_ERRORS = new Set(['NotFound', 'NoSuchBucket', 'Forbidden']);

@Injectable()
export class S3Service implements OnModuleDestroy {
  private readonly logger = new Logger(S3Service.name);
  private readonly client: S3Client;

  constructor(private readonly configService: ConfigService<AppConfig>) {
    const awsConfig = this.configService.get('aws', { infer: true });

    this.client = new S3Client({
      region: awsConfig?.region,
      ...(awsConfig?.endpoint && { endpoint: awsConfig.endpoint, forcePathStyle: true }),
      ...(awsConfig?.credentials && { credentials: awsConfig.credentials }),
    });
  }

  async uploadFile(
    bucket: string,
    key: string,
    filePath: string,
    options?: UploadOptions,
  ): Promise<{ key: string; etag: string; size: number }> {
    const stats = await fs.stat(filePath);
    const fileStream = createReadStream(filePath);

    const upload = new Upload({
      client: this.client,
      params: {
        Bucket: bucket,
        Key: key,
        Body: fileStream,
        ContentType: options?.contentType,
        ...(options?.kmsKeyId && {
          ServerSideEncryption: ServerSideEncryption.aws_kms,
          SSEKMSKeyId: options.kmsKeyId,
        }),
      },
      queueSize: 4,
      partSize: 10 * 1024 * 1024, // 10MB parts
      leavePartsOnError: false,
    });

    upload.on('httpUploadProgress', (progress) => {
      this.logger.debug(
        `Upload progress ${bucket}/${key}: ${progress.loaded ?? 0}/${progress.total ?? '?'}`,
      );
    });

    const result = await upload.done();

    this.logger.log(`File uploaded to ${bucket}/${key} (${stats.size} bytes)`);

    return {
      key,
      etag: ('ETag' in result && result.ETag) || '',
      size: stats.size,
    };
  }

  async downloadToFile(bucket: string, key: string, destPath: string): Promise<DownloadResult> {
    const response = await this.client.send(
      new GetObjectCommand({
        Bucket: bucket,
        Key: key,
      }),
    );

    const body = response.Body;
    if (!(body instanceof Readable)) {
      throw new Error(`Object ${bucket}/${key} returned no readable body`);
    }

    const writeStream = createWriteStream(destPath);
    await pipeline(body, writeStream);

    const stats = await fs.stat(destPath);

    this.logger.log(`File downloaded from ${bucket}/${key} to ${destPath} (${stats.size} bytes)`);

    return {
      filePath: destPath,
      size: stats.size,
      contentType: response.ContentType,
      etag: response.ETag,
    };
  }

  async deleteObject(bucket: string, key: string): Promise<void> {
    await this.client.send(
      new DeleteObjectCommand({
        Bucket: bucket,
        Key: key,
      }),
    );

    this.logger.log(`Object deleted: ${bucket}/${key}`);
  }

  /**
   * Returns false for buckets that do not exist or are not accessible;
   * other errors propagate.
   */
  async headBucket(bucket: string): Promise<boolean> {
    try {
      await this.client.send(new HeadBucketCommand({ Bucket: bucket }));
      return true;
    } catch (error: unknown) {
      if (
        error &&
        typeof error === 'object' &&
        'name' in error &&
        typeof error.name === 'string' &&
        MISSING_BUCKET_ERRORS.has(error.name)
      ) {
        return false;
      }
      throw error;
    }
  }

  onModuleDestroy() {
    this.client.destroy();
  }
}
