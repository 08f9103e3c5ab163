/**
 * Watch Registry
 * 
 * Source of truth for which cache files are watched, keyed by local path.
 * Holds at most one record per path.
 */

import { isSameAccount, type Account, type WatchRecord } from '@cache-mirror/core';

export class WatchRegistry {
  private records: Map<string, WatchRecord> = new Map();

  get(localPath: string): WatchRecord | undefined {
    return this.records.get(localPath);
  }

  has(localPath: string): boolean {
    return this.records.has(localPath);
  }

  /**
   * Insert or replace the record for its local path
   */
  set(record: WatchRecord): void {
    this.records.set(record.localPath, record);
  }

  delete(localPath: string): boolean {
    return this.records.delete(localPath);
  }

  get size(): number {
    return this.records.size;
  }

  entries(): WatchRecord[] {
    return Array.from(this.records.values());
  }

  /**
   * Drop every record owned by the account, returning their local paths
   */
  removeAllForAccount(account: Account): string[] {
    const removed: string[] = [];
    for (const [localPath, record] of this.records) {
      if (isSameAccount(record.account, account)) {
        this.records.delete(localPath);
        removed.push(localPath);
      }
    }
    return removed;
  }

  clear(): void {
    this.records.clear();
  }
}
