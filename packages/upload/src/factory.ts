/**
 * Upload Task Factory
 * 
 * Routes upload tasks to the remote target configured for their account.
 */

import type { Account } from '@cache-mirror/core';
import { FileUploadTask } from './task.js';
import type { RemoteUploader, UploadTask, UploadTaskFactory } from './types.js';

export type UploaderResolver = (account: Account) => RemoteUploader | undefined;

export class RemoteUploadTaskFactory implements UploadTaskFactory {
  private readonly resolveUploader: UploaderResolver;

  constructor(resolveUploader: UploaderResolver) {
    this.resolveUploader = resolveUploader;
  }

  /**
   * Use one target for every account
   */
  static forTarget(uploader: RemoteUploader): RemoteUploadTaskFactory {
    return new RemoteUploadTaskFactory(() => uploader);
  }

  createUploadTask(
    account: Account,
    repoId: string,
    parentPath: string,
    localPath: string,
    fileName: string,
    isUpdate: boolean
  ): UploadTask {
    return new FileUploadTask({
      account,
      repoId,
      parentPath,
      localPath,
      fileName,
      isUpdate,
      uploader: this.resolveUploader(account),
    });
  }
}
