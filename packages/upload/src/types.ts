/**
 * Upload Types
 * 
 * Contract between the auto-update manager and the transfer layer.
 */

import type { Account } from '@cache-mirror/core';

export interface RemoteUploadOptions {
  // Replace an existing remote object instead of refusing
  overwrite: boolean;
}

export interface RemoteUploadResult {
  key: string;
  etag: string;
}

/**
 * A storage target able to receive one local file
 */
export interface RemoteUploader {
  upload(
    localPath: string,
    remoteKey: string,
    options: RemoteUploadOptions
  ): Promise<RemoteUploadResult>;
}

/**
 * Completion of an upload task, delivered exactly once
 */
export interface UploadOutcome {
  success: boolean;
  repoId: string;
  path: string;
  localFilePath: string;
  etag?: string;
  error?: string;
}

/**
 * One upload of a cached file to its remote location
 */
export interface UploadTask {
  readonly account: Account;
  readonly repoId: string;
  // Remote path of the uploaded file
  readonly path: string;
  readonly localFilePath: string;
  /**
   * Begin the transfer. Resolves with the outcome and never rejects;
   * calling it again returns the same completion.
   */
  start(): Promise<UploadOutcome>;
}

export interface UploadTaskFactory {
  createUploadTask(
    account: Account,
    repoId: string,
    parentPath: string,
    localPath: string,
    fileName: string,
    isUpdate: boolean
  ): UploadTask;
}
