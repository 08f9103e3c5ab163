/**
 * @cache-mirror/upload
 * 
 * Upload layer.
 * 
 * Supported targets:
 * - MinIO (S3 compatible)
 * 
 * Features:
 * - Upload tasks with a single promised outcome
 * - Per-account target routing
 */

export type {
  RemoteUploader,
  RemoteUploadOptions,
  RemoteUploadResult,
  UploadOutcome,
  UploadTask,
  UploadTaskFactory,
} from './types.js';

// Upload task
export { FileUploadTask, buildRemoteKey, type FileUploadTaskOptions } from './task.js';

// Task factory
export { RemoteUploadTaskFactory, type UploaderResolver } from './factory.js';

// MinIO client
export { MinioUploader, type MinioConfig } from './targets/minio.js';
