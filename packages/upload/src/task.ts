/**
 * File Upload Task
 * 
 * Uploads one cached file to `<repoId>/<path in repo>` on a remote target.
 */

import { UploadError, describeAccount, type Account } from '@cache-mirror/core';
import { createLogger, getErrorMessage, joinRepoPath } from '@cache-mirror/utils';
import type { RemoteUploader, UploadOutcome, UploadTask } from './types.js';

const logger = createLogger({ component: 'upload-task' });

export interface FileUploadTaskOptions {
  account: Account;
  repoId: string;
  parentPath: string;
  localPath: string;
  fileName: string;
  isUpdate: boolean;
  // Absent when no target is configured for the account
  uploader?: RemoteUploader;
}

/**
 * Build the object key for a file inside a repo
 */
export function buildRemoteKey(repoId: string, pathInRepo: string): string {
  return `${repoId}${pathInRepo}`;
}

export class FileUploadTask implements UploadTask {
  readonly account: Account;
  readonly repoId: string;
  readonly path: string;
  readonly localFilePath: string;

  private readonly isUpdate: boolean;
  private readonly uploader?: RemoteUploader;
  private completion: Promise<UploadOutcome> | null = null;

  constructor(options: FileUploadTaskOptions) {
    this.account = options.account;
    this.repoId = options.repoId;
    this.path = joinRepoPath(options.parentPath, options.fileName);
    this.localFilePath = options.localPath;
    this.isUpdate = options.isUpdate;
    this.uploader = options.uploader;
  }

  start(): Promise<UploadOutcome> {
    if (!this.completion) {
      this.completion = this.run();
    }
    return this.completion;
  }

  private async run(): Promise<UploadOutcome> {
    const remoteKey = buildRemoteKey(this.repoId, this.path);

    try {
      if (!this.uploader) {
        throw new UploadError(
          this.repoId,
          this.path,
          `no upload target configured for ${describeAccount(this.account)}`
        );
      }

      logger.debug({ remoteKey, localPath: this.localFilePath }, 'Uploading file');
      const result = await this.uploader.upload(this.localFilePath, remoteKey, {
        overwrite: this.isUpdate,
      });

      return {
        success: true,
        repoId: this.repoId,
        path: this.path,
        localFilePath: this.localFilePath,
        etag: result.etag,
      };
    } catch (error) {
      logger.warn({ remoteKey, error: getErrorMessage(error) }, 'Upload failed');
      return {
        success: false,
        repoId: this.repoId,
        path: this.path,
        localFilePath: this.localFilePath,
        error: getErrorMessage(error),
      };
    }
  }
}
