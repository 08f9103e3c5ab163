/**
 * Auto Update Manager
 * 
 * Re-uploads cached files that the user edits in place with native
 * applications.
 * 
 * Every watched path moves through WATCHING → MODIFIED_UPLOADING or
 * DELETED_DEFERRED and back, until it is REMOVED. On a change notification:
 * 1. notifications the platform quirk filter flags are ignored
 * 2. the OS watch on the path is dropped while the change is handled
 * 3. paths without a record are ignored
 * 4. a missing file is parked in the deferred-recreation queue
 * 5. an existing file is handed to the upload coordinator
 */

import { EventEmitter } from 'node:events';
import {
  NotFoundError,
  WatchStateMachine,
  describeAccount,
  isSameAccount,
  type Account,
  type DeferredEntry,
  type WatchRecord,
  type WatchState,
  type WatchStateTransition,
} from '@cache-mirror/core';
import type { UploadTaskFactory } from '@cache-mirror/upload';
import { createLogger, fileExistsSync, getErrorMessage, normalizeRepoPath } from '@cache-mirror/utils';
import type { CacheLayout } from '../cache/cacheLayout.js';
import type {
  AccountProvider,
  DownloadCanceller,
  FileCacheIndex,
  NotificationSink,
  WatchResult,
} from '../types.js';
import { CachedFilesCleaner, CleanupWorkerPool } from './cacheCleaner.js';
import { DeferredRecreationQueue, type RecheckOrder } from './deferredQueue.js';
import { CacheFileWatcher, ensureUnwatched, ensureWatched, type WatchPrimitive } from './fileWatcher.js';
import { createPlatformQuirkFilter, type SpuriousChangeFilter } from './quirkFilter.js';
import { UploadCoordinator } from './uploadCoordinator.js';
import { WatchRegistry } from './watchRegistry.js';

const logger = createLogger({ component: 'auto-update' });

export interface AutoUpdateManagerOptions {
  layout: CacheLayout;
  uploads: UploadTaskFactory;
  notifications: NotificationSink;
  accounts: AccountProvider;
  downloads: DownloadCanceller;
  cacheIndex: FileCacheIndex;

  // Defaults to native fs.watch
  watcher?: WatchPrimitive;

  // Defaults to the running platform's filter
  quirkFilter?: SpuriousChangeFilter;

  cleanupPool?: CleanupWorkerPool;

  // Delay before checking whether a deleted file was recreated
  recreateCheckDelayMs?: number;

  recheckOrder?: RecheckOrder;
}

export class AutoUpdateManager extends EventEmitter {
  private readonly layout: CacheLayout;
  private readonly notifications: NotificationSink;
  private readonly accounts: AccountProvider;
  private readonly downloads: DownloadCanceller;
  private readonly cacheIndex: FileCacheIndex;
  private readonly watcher: WatchPrimitive;
  private readonly quirkFilter: SpuriousChangeFilter;
  private readonly cleanupPool: CleanupWorkerPool;

  private readonly registry = new WatchRegistry();
  private readonly deferred: DeferredRecreationQueue;
  private readonly coordinator: UploadCoordinator;
  private lifecycles: Map<string, WatchStateMachine> = new Map();
  // Records unwatched while uploading; dropped once the upload settles
  private pendingUnwatch: Set<WatchRecord> = new Set();

  constructor(options: AutoUpdateManagerOptions) {
    super();
    this.layout = options.layout;
    this.notifications = options.notifications;
    this.accounts = options.accounts;
    this.downloads = options.downloads;
    this.cacheIndex = options.cacheIndex;
    this.watcher = options.watcher ?? new CacheFileWatcher();
    this.quirkFilter = options.quirkFilter ?? createPlatformQuirkFilter();
    this.cleanupPool = options.cleanupPool ?? new CleanupWorkerPool();

    this.deferred = new DeferredRecreationQueue(
      (entry) => this.checkFileRecreated(entry),
      {
        delayMs: options.recreateCheckDelayMs,
        order: options.recheckOrder,
      }
    );

    this.coordinator = new UploadCoordinator({
      registry: this.registry,
      factory: options.uploads,
      notifications: this.notifications,
      resumeWatch: (localPath) => {
        ensureWatched(this.watcher, localPath);
      },
      transition: (localPath, to, reason) => this.transition(localPath, to, reason),
      fileUpdated: (repoId, pathInRepo) => {
        this.emit('fileUpdated', repoId, pathInRepo);
      },
      uploadSettled: (record) => this.onUploadSettled(record),
    });

    this.watcher.onChange((localPath) => this.onFileChanged(localPath));
  }

  /**
   * Purge the cache left over from a previous session
   */
  start(): void {
    this.cleanCachedFiles();
  }

  /**
   * Stop watching, drop pending rechecks and wait for in-flight work
   */
  async stop(): Promise<void> {
    this.watcher.close();
    this.deferred.clear();
    await this.whenIdle();
  }

  /**
   * Resolves once in-flight uploads and queued teardown jobs have settled
   */
  async whenIdle(): Promise<void> {
    await this.coordinator.whenIdle();
    await this.cleanupPool.onIdle();
  }

  /**
   * Start tracking the cached copy of a remote file
   */
  watch(account: Account, repoId: string, pathInRepo: string): WatchResult {
    const normalizedPath = normalizeRepoPath(pathInRepo);
    const localPath = this.layout.localCachePath(repoId, normalizedPath);
    logger.debug({ localPath }, 'Watch cache file');

    if (!fileExistsSync(localPath)) {
      logger.warn({ localPath }, 'Unable to watch non-existent cache file');
      return 'missing-file';
    }

    // An edit in flight must not be tracked twice
    if (this.deferred.has(repoId, normalizedPath)) {
      logger.debug({ localPath }, 'Cache file is waiting for a recreation check');
      return 'deferred';
    }

    const existing = this.registry.get(localPath);
    if (existing) {
      // Watching again takes back an unwatch deferred by an upload
      this.pendingUnwatch.delete(existing);
      if (!existing.uploading) {
        ensureWatched(this.watcher, localPath);
      }
      if (!isSameAccount(existing.account, account)) {
        logger.debug(
          { localPath, owner: describeAccount(existing.account) },
          'Cache file already watched for another account'
        );
      }
      return 'already-watching';
    }

    ensureWatched(this.watcher, localPath);
    this.registry.set({
      account,
      repoId,
      pathInRepo: normalizedPath,
      localPath,
      uploading: false,
    });
    this.lifecycles.set(localPath, new WatchStateMachine(localPath));
    return 'watching';
  }

  /**
   * Stop tracking a cache file. Unknown paths are ignored; a file with an
   * upload in flight is dropped once the upload settles.
   */
  unwatch(localPath: string): boolean {
    const record = this.registry.get(localPath);
    if (!record) {
      ensureUnwatched(this.watcher, localPath);
      return false;
    }

    if (record.uploading) {
      logger.debug({ localPath }, 'Upload in flight, unwatching once it settles');
      this.pendingUnwatch.add(record);
      return true;
    }

    ensureUnwatched(this.watcher, localPath);
    this.registry.delete(localPath);
    this.pendingUnwatch.delete(record);
    this.transition(localPath, 'REMOVED', 'unwatched');
    return true;
  }

  /**
   * Report that a viewer opened a cached file
   */
  fileOpened(localPath: string): void {
    this.quirkFilter.fileOpened(localPath);
  }

  /**
   * Forget the current account's cache and wipe the cache from disk.
   * The disk work is handed to the cleanup pool and not awaited.
   */
  cleanCachedFiles(): void {
    logger.debug('Cancel all download tasks');
    this.downloads.cancelAllDownloadTasks();

    const account = this.accounts.currentAccount();
    if (account) {
      this.removeAllForAccount(account);
    }

    this.cacheIndex.cleanCurrentAccountCache();
    this.cleanupPool.submit(new CachedFilesCleaner(this.layout));
  }

  /**
   * Drop every watched and parked file of the account
   */
  removeAllForAccount(account: Account): number {
    const removedPaths = this.registry.removeAllForAccount(account);
    for (const localPath of removedPaths) {
      ensureUnwatched(this.watcher, localPath);
      this.transition(localPath, 'REMOVED', 'account cache cleared');
    }

    const removedEntries = this.deferred.removeAllForAccount(account);
    for (const entry of removedEntries) {
      this.transition(entry.record.localPath, 'REMOVED', 'account cache cleared');
    }

    const removed = removedPaths.length + removedEntries.length;
    logger.info({ account: describeAccount(account), removed }, 'Removed watches for account');
    return removed;
  }

  getState(localPath: string): WatchState {
    return this.lifecycles.get(localPath)?.getState() ?? 'REMOVED';
  }

  getHistory(localPath: string): ReadonlyArray<WatchStateTransition> {
    return this.lifecycles.get(localPath)?.getHistory() ?? [];
  }

  isWatching(localPath: string): boolean {
    return this.registry.has(localPath);
  }

  isUploading(localPath: string): boolean {
    return this.registry.get(localPath)?.uploading ?? false;
  }

  get watchedCount(): number {
    return this.registry.size;
  }

  get pendingRecreations(): number {
    return this.deferred.size;
  }

  onFileUpdated(listener: (repoId: string, pathInRepo: string) => void): this {
    return this.on('fileUpdated', listener);
  }

  /**
   * Classify a change notification for a cache file
   */
  handleFileChanged(localPath: string): void {
    logger.debug({ localPath }, 'Detected cache file changed');

    if (this.quirkFilter.isSpurious(localPath)) {
      logger.debug({ localPath }, 'Ignoring change right after open');
      return;
    }

    ensureUnwatched(this.watcher, localPath);

    const record = this.registry.get(localPath);
    if (!record) {
      return;
    }

    if (record.uploading) {
      logger.debug({ localPath }, 'Upload already in flight');
      return;
    }

    if (!fileExistsSync(localPath)) {
      logger.debug({ localPath }, 'Detected cache file renamed or removed');
      this.transition(localPath, 'DELETED_DEFERRED', 'cache file missing');
      this.registry.delete(localPath);
      this.deferred.enqueue(record);
      return;
    }

    this.coordinator.startUpload(record);
  }

  private onFileChanged(localPath: string): void {
    try {
      this.handleFileChanged(localPath);
    } catch (error) {
      logger.error({ localPath, error: getErrorMessage(error) }, 'Failed to handle cache file change');
    }
  }

  private onUploadSettled(record: WatchRecord): void {
    if (this.pendingUnwatch.delete(record) && this.registry.get(record.localPath) === record) {
      this.unwatch(record.localPath);
    }
  }

  private checkFileRecreated(entry: DeferredEntry): void {
    const { record } = entry;
    const localPath = this.layout.localCachePath(record.repoId, record.pathInRepo);

    if (!fileExistsSync(localPath)) {
      logger.debug({ localPath }, 'Cache file was not recreated');
      this.transition(localPath, 'REMOVED', 'not recreated');
      return;
    }

    logger.debug({ localPath }, 'Detected recreated file');
    ensureWatched(this.watcher, localPath);
    this.registry.set({ ...record, localPath, uploading: false });
    this.transition(localPath, 'WATCHING', 'file recreated');

    // Applications that save by delete-and-recreate still changed the content
    this.handleFileChanged(localPath);
  }

  private transition(localPath: string, to: WatchState, reason: string): void {
    const machine = this.lifecycles.get(localPath);
    if (!machine) {
      throw new NotFoundError('Watch lifecycle', localPath);
    }

    const transition = machine.transitionTo(to, reason);
    logger.debug({ localPath, from: transition.from, to: transition.to, reason }, 'Watch state changed');

    if (machine.isTerminal()) {
      this.lifecycles.delete(localPath);
    }
  }
}
