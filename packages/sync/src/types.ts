/**
 * Sync Types
 * 
 * Collaborators the auto-update manager is handed at construction.
 */

import type { Account } from '@cache-mirror/core';

/**
 * User-visible message surface (tray balloon, terminal line, ...)
 */
export interface NotificationSink {
  showMessage(title: string, message: string, repoId: string): void;
}

export interface AccountProvider {
  currentAccount(): Account | null;
}

export interface DownloadCanceller {
  cancelAllDownloadTasks(): void;
}

/**
 * In-memory index of cached files, cleared before the disk teardown
 */
export interface FileCacheIndex {
  cleanCurrentAccountCache(): void;
}

export type WatchResult =
  | 'watching'          // new record registered
  | 'already-watching'  // existing record kept
  | 'missing-file'      // nothing cached at the resolved path
  | 'deferred';         // waiting for a recreation recheck
