/**
 * Watch Types
 */

import type { Account } from './account.js';

/**
 * One locally cached file under watch, keyed by localPath in the registry
 */
export interface WatchRecord {
  account: Account;
  repoId: string;
  pathInRepo: string;
  localPath: string;
  uploading: boolean;
}

/**
 * Snapshot of a record whose file disappeared, waiting for its recheck
 */
export interface DeferredEntry {
  record: WatchRecord;
  enqueuedAt: number;
}
