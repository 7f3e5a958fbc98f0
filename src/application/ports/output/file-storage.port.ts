/**
 * Upload File Options
 */
export interface UploadFileOptions {
  contentType?: string;
  /** KMS key ARN or alias; the object is written with SSE-KMS when set. */
  kmsKeyId?: string;
}

/**
 * Upload Result
 */
export interface UploadResult {
  key: string;
  bucket: string;
  etag: string;
  location: string;
}

/**
 * File Storage Port (Driven Port)
 * Blob store operations used by the pipeline (S3)
 */
export interface FileStoragePort {
  /**
   * Download an object to a local path
   */
  downloadFile(bucket: string, key: string, destinationPath: string): Promise<void>;

  /**
   * Upload a local file
   */
  uploadFile(
    bucket: string,
    key: string,
    filePath: string,
    options?: UploadFileOptions,
  ): Promise<UploadResult>;

  /**
   * Delete an object
   */
  deleteFile(bucket: string, key: string): Promise<void>;

  /**
   * Check that a bucket exists and is reachable with the current credentials
   */
  bucketExists(bucket: string): Promise<boolean>;
}
