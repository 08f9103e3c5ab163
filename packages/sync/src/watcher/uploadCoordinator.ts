/**
 * Upload Coordinator
 * 
 * Starts the re-upload of a changed cache file and settles its watch once
 * the transfer reports back: a success restores monitoring, a failure drops
 * the record for good. Nothing is retried here.
 */

import type { WatchRecord, WatchState } from '@cache-mirror/core';
import type { UploadOutcome, UploadTask, UploadTaskFactory } from '@cache-mirror/upload';
import { createLogger, getBaseName, getErrorMessage, getParentPath } from '@cache-mirror/utils';
import type { NotificationSink } from '../types.js';
import type { WatchRegistry } from './watchRegistry.js';

const logger = createLogger({ component: 'upload-coordinator' });

/**
 * What the coordinator needs from its owner
 */
export interface UploadCoordinatorContext {
  registry: WatchRegistry;
  factory: UploadTaskFactory;
  notifications: NotificationSink;
  resumeWatch(localPath: string): void;
  transition(localPath: string, to: WatchState, reason: string): void;
  fileUpdated(repoId: string, pathInRepo: string): void;
  // Called once per upload, whether or not the record is still registered
  uploadSettled(record: WatchRecord): void;
}

export class UploadCoordinator {
  private inFlight: Set<Promise<void>> = new Set();
  private readonly context: UploadCoordinatorContext;

  constructor(context: UploadCoordinatorContext) {
    this.context = context;
  }

  /**
   * Upload the record's current file content. Returns without waiting.
   */
  startUpload(record: WatchRecord): UploadTask {
    const { localPath } = record;

    this.context.transition(localPath, 'MODIFIED_UPLOADING', 'cache file changed');

    const task = this.context.factory.createUploadTask(
      record.account,
      record.repoId,
      getParentPath(record.pathInRepo),
      localPath,
      getBaseName(localPath),
      true
    );

    logger.debug({ localPath, repoId: record.repoId }, 'Start uploading new version of file');
    record.uploading = true;

    const completion: Promise<void> = task.start()
      .then((outcome) => this.onUploadFinished(record, task, outcome))
      .catch((error: unknown) => {
        logger.error({ localPath, error: getErrorMessage(error) }, 'Failed to settle upload');
      })
      .finally(() => {
        this.inFlight.delete(completion);
      });
    this.inFlight.add(completion);

    return task;
  }

  get activeUploads(): number {
    return this.inFlight.size;
  }

  /**
   * Resolves once every upload started so far has been settled
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all(this.inFlight);
    }
  }

  private onUploadFinished(record: WatchRecord, task: UploadTask, outcome: UploadOutcome): void {
    try {
      this.settleRecord(record, task, outcome);
    } finally {
      this.context.uploadSettled(record);
    }
  }

  private settleRecord(record: WatchRecord, task: UploadTask, outcome: UploadOutcome): void {
    const localPath = task.localFilePath;
    const fileName = getBaseName(localPath);
    const { registry, notifications } = this.context;

    // A record dropped while in flight may have been replaced by a new watch
    // of the same path; that one is not ours to settle.
    const owned = registry.get(localPath) === record;

    if (!outcome.success) {
      logger.warn({ localPath, error: outcome.error }, 'Failed to upload new version of file');
      notifications.showMessage(
        'Upload Failure',
        `File "${fileName}"\nfailed to upload.`,
        task.repoId
      );
      if (owned) {
        registry.delete(localPath);
        this.context.transition(localPath, 'REMOVED', 'upload failed');
      }
      return;
    }

    logger.info({ localPath, repoId: task.repoId, path: task.path }, 'Uploaded new version of file');
    notifications.showMessage(
      'Upload Success',
      `File "${fileName}"\nuploaded successfully.`,
      task.repoId
    );
    this.context.fileUpdated(task.repoId, task.path);

    if (!owned) {
      logger.debug({ localPath }, 'Record dropped while uploading, not resuming watch');
      return;
    }

    record.uploading = false;
    this.context.resumeWatch(localPath);
    this.context.transition(localPath, 'WATCHING', 'upload succeeded');
  }
}
