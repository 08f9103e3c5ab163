/**
 * Deferred-Recreation Queue
 * 
 * Some applications save by deleting the file and writing a new one. A
 * watched file that disappears is parked here, and a one-shot timer checks
 * after a short delay whether it came back.
 * 
 * Recheck order:
 * - fifo: every timer consumes the oldest parked entry, whichever entry
 *   scheduled it. Compatible with the historical behaviour.
 * - per-path: every timer consumes the entry that scheduled it.
 */

import { isSameAccount, type Account, type DeferredEntry, type WatchRecord } from '@cache-mirror/core';
import { createLogger, getErrorMessage } from '@cache-mirror/utils';

const logger = createLogger({ component: 'deferred-queue' });

export const DEFAULT_RECREATE_CHECK_DELAY_MS = 5000;

export type RecheckOrder = 'fifo' | 'per-path';

export interface DeferredQueueOptions {
  delayMs?: number;
  order?: RecheckOrder;
  now?: () => number;
}

export type RecheckHandler = (entry: DeferredEntry) => void;

export class DeferredRecreationQueue {
  private entries: DeferredEntry[] = [];
  // One pending timer per parked entry
  private timers: Map<DeferredEntry, NodeJS.Timeout> = new Map();
  private readonly delayMs: number;
  private readonly order: RecheckOrder;
  private readonly now: () => number;
  private readonly onRecheck: RecheckHandler;

  constructor(onRecheck: RecheckHandler, options: DeferredQueueOptions = {}) {
    this.onRecheck = onRecheck;
    this.delayMs = options.delayMs ?? DEFAULT_RECREATE_CHECK_DELAY_MS;
    this.order = options.order ?? 'fifo';
    this.now = options.now ?? Date.now;
  }

  /**
   * Park a snapshot of the record and schedule its recheck
   */
  enqueue(record: WatchRecord): DeferredEntry {
    const entry: DeferredEntry = {
      record: { ...record, uploading: false },
      enqueuedAt: this.now(),
    };
    this.entries.push(entry);
    this.timers.set(entry, setTimeout(() => this.fire(entry), this.delayMs));
    return entry;
  }

  has(repoId: string, pathInRepo: string): boolean {
    return this.entries.some(
      (entry) => entry.record.repoId === repoId && entry.record.pathInRepo === pathInRepo
    );
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Entries in recheck order, oldest first
   */
  pending(): ReadonlyArray<DeferredEntry> {
    return [...this.entries];
  }

  /**
   * Drop the account's parked entries and cancel their timers
   */
  removeAllForAccount(account: Account): DeferredEntry[] {
    const removed = this.entries.filter((entry) => isSameAccount(entry.record.account, account));
    for (const entry of removed) {
      this.cancelTimer(entry);
    }
    this.entries = this.entries.filter((entry) => !removed.includes(entry));
    return removed;
  }

  /**
   * Drop everything without running any recheck
   */
  clear(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
    this.entries = [];
  }

  private fire(scheduledBy: DeferredEntry): void {
    this.timers.delete(scheduledBy);

    const entry = this.order === 'fifo' ? this.entries.shift() : this.take(scheduledBy);
    if (!entry) {
      return;
    }

    if (entry !== scheduledBy) {
      // The consumed entry's timer now belongs to the one still parked
      const timer = this.timers.get(entry);
      if (timer) {
        this.timers.delete(entry);
        this.timers.set(scheduledBy, timer);
      }
      logger.debug(
        { consumed: entry.record.localPath, scheduledBy: scheduledBy.record.localPath },
        'Recheck consumed an older entry'
      );
    }

    try {
      this.onRecheck(entry);
    } catch (error) {
      logger.error({ localPath: entry.record.localPath, error: getErrorMessage(error) }, 'Recreation recheck failed');
    }
  }

  private take(entry: DeferredEntry): DeferredEntry | undefined {
    const index = this.entries.indexOf(entry);
    if (index === -1) {
      return undefined;
    }
    this.entries.splice(index, 1);
    return entry;
  }

  private cancelTimer(entry: DeferredEntry): void {
    const timer = this.timers.get(entry);
    if (timer) {
      clearTimeout(timer);
      this.timers.delete(entry);
    }
  }
}
