import { Injectable, Logger } from '@nestjs/common';
import {
  FileStoragePort,
  UploadFileOptions,
  UploadResult,
} from '../../../application/ports/output/file-storage.port';
import { S3Service } from '../../../shared/aws/s3/s3.service';

/**
 * S3 File Storage Adapter
 * Implements FileStoragePort using AWS S3
 */
@Injectable()
export class S3FileStorageAdapter implements FileStoragePort {
  private readonly logger = new Logger(S3FileStorageAdapter.name);

  constructor(private readonly s3Service: S3Service) {}

  async downloadFile(bucket: string, key: string, destinationPath: string): Promise<void> {
    this.logger.debug(`Downloading file from S3: ${bucket}/${key} to ${destinationPath}`);

    await this.s3Service.downloadToFile(bucket, key, destinationPath);
  }

  async uploadFile(
    bucket: string,
    key: string,
    filePath: string,
    options?: UploadFileOptions,
  ): Promise<UploadResult> {
    this.logger.debug(`Uploading file to S3: ${bucket}/${key} from ${filePath}`);

    const result = await this.s3Service.uploadFile(bucket, key, filePath, {
      contentType: options?.contentType,
      kmsKeyId: options?.kmsKeyId,
    });

    return {
      key,
      bucket,
      etag: result.etag,
      location: `s3://${bucket}/${key}`,
    };
  }

  async deleteFile(bucket: string, key: string): Promise<void> {
    this.logger.debug(`Deleting file from S3: ${bucket}/${key}`);

    await this.s3Service.deleteObject(bucket, key);
  }

  async bucketExists(bucket: string): Promise<boolean> {
    return this.s3Service.headBucket(bucket);
  }
}
